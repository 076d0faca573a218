export interface HistoryEntry {
  readonly timestamp: string
  readonly album: string
  readonly track: string
  readonly commentary: string
}

/** Somewhere a copy of the history is mirrored to (CSV file, database). */
export interface HistorySink {
  readonly name: string
  write(entry: HistoryEntry): Promise<void> | void
  close?(): Promise<void> | void
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  )
}

/** Append-only record of played tracks, oldest first. */
export class HistoryLog {
  private readonly entries: HistoryEntry[] = []

  append(entry: HistoryEntry): HistoryEntry {
    const frozen = Object.freeze({ ...entry })
    this.entries.push(frozen)
    return frozen
  }

  /** The last `limit` entries in playback order (all of them when omitted). */
  recent(limit?: number): HistoryEntry[] {
    if (limit === undefined) return [...this.entries]
    if (limit <= 0) return []
    return this.entries.slice(-limit)
  }
}
