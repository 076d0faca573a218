import type { Library, Track } from "./library.ts"

export interface QueueEntry {
  album: string
  track: Track
}

/** Next cursor position, wrapping to the start. */
export function advance(cursor: number, length: number): number {
  return (cursor + 1) % length
}

/** Previous cursor position. Stops at 0 rather than wrapping. */
export function retreat(cursor: number): number {
  return Math.max(0, cursor - 1)
}

/** One entry per track across every album, Fisher-Yates shuffled. */
export function buildQueue(
  library: Library,
  random: () => number = Math.random,
): QueueEntry[] {
  const entries: QueueEntry[] = []
  for (const [album, tracks] of library) {
    for (const track of tracks) entries.push({ album, track })
  }

  for (let i = entries.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const a = entries[i]
    const b = entries[j]
    if (a && b) {
      entries[i] = b
      entries[j] = a
    }
  }
  return entries
}

/**
 * Shuffled entries plus the cursor of the one that is playing. Every
 * mutation is synchronous, so readers between awaits always see a
 * consistent cursor and entry list.
 */
export class PlaybackQueue {
  private entries: QueueEntry[]
  private index = 0

  constructor(entries: readonly QueueEntry[]) {
    this.entries = [...entries]
  }

  static fromLibrary(library: Library, random?: () => number): PlaybackQueue {
    return new PlaybackQueue(buildQueue(library, random))
  }

  get length(): number {
    return this.entries.length
  }

  get cursor(): number {
    return this.index
  }

  isEmpty(): boolean {
    return this.entries.length === 0
  }

  current(): QueueEntry {
    const entry = this.entries[this.index]
    if (!entry) {
      throw new RangeError("Playback queue is empty")
    }
    return entry
  }

  advance(): QueueEntry {
    this.index = advance(this.index, this.entries.length)
    return this.current()
  }

  retreat(): QueueEntry {
    this.index = retreat(this.index)
    return this.current()
  }

  /**
   * Puts `entry` first and points the cursor at it. Everything else shifts
   * one position later, so the following advance plays what used to be
   * first.
   */
  insertFront(entry: QueueEntry): void {
    this.entries.unshift(entry)
    this.index = 0
  }

  /** Copies of the entries, down to the tracks. */
  snapshot(): QueueEntry[] {
    return this.entries.map(({ album, track }) => ({ album, track: { ...track } }))
  }
}
