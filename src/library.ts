import { readdir, stat } from "node:fs/promises"
import { basename, dirname, extname, join } from "node:path"
import { LibraryError } from "./errors.ts"

/** Extensions recognized as playable audio (compared lowercased). */
export const SUPPORTED_EXTENSIONS = [
  ".mp3",
  ".wav",
  ".ogg",
  ".flac",
  ".aac",
  ".m4a",
] as const

export interface Track {
  /** Name of the album (parent directory) the track belongs to. */
  album: string
  /** Absolute or root-relative location of the file. */
  path: string
  /** File name without its extension. */
  name: string
}

/** Album name to its tracks, ordered by path. */
export type Library = ReadonlyMap<string, readonly Track[]>

export function isAudioFile(path: string): boolean {
  const ext = extname(path).toLowerCase()
  return SUPPORTED_EXTENSIONS.some((supported) => supported === ext)
}

export function trackFromPath(path: string): Track {
  return {
    album: basename(dirname(path)),
    path,
    name: basename(path, extname(path)),
  }
}

/**
 * Recursively scans `root` for audio files and groups them by their parent
 * directory's name. Directories without audio are left out, so an empty map
 * means nothing playable was found.
 */
export async function discoverAlbums(root: string): Promise<Library> {
  const info = await stat(root).catch((error: unknown) => {
    throw new LibraryError(`Music root is not readable: ${root}`, {
      cause: String(error),
    })
  })
  if (!info.isDirectory()) {
    throw new LibraryError(`Music root is not a directory: ${root}`)
  }

  const files: string[] = []
  await walk(root, files)
  files.sort()

  const albums = new Map<string, Track[]>()
  for (const file of files) {
    const track = trackFromPath(file)
    const tracks = albums.get(track.album)
    if (tracks) {
      tracks.push(track)
    } else {
      albums.set(track.album, [track])
    }
  }
  return albums
}

async function walk(dir: string, into: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const path = join(dir, entry.name)
    if (entry.isDirectory()) {
      await walk(path, into)
    } else if (entry.isFile() && isAudioFile(entry.name)) {
      into.push(path)
    }
  }
}

export function countTracks(library: Library): number {
  let count = 0
  for (const tracks of library.values()) count += tracks.length
  return count
}

export function allTracks(library: Library): Track[] {
  return [...library.values()].flat()
}

function normalizeTitle(text: string): string {
  return text
    .toLowerCase()
    .replace(/["'`“”‘’*]/g, "")
    .replace(/\s+/g, " ")
    .trim()
}

/**
 * Finds the track a free-text answer most likely names. Only the first
 * non-empty line of the answer is considered. A track matches when its name
 * and the answer contain one another, ignoring case and quotes; the longest
 * matching name wins, then library order.
 */
export function findTrackByTitle(library: Library, answer: string): Track | null {
  const line = answer
    .split("\n")
    .map(normalizeTitle)
    .find((candidate) => candidate.length > 0)
  if (!line) return null

  let best: Track | null = null
  let bestLength = 0
  for (const track of allTracks(library)) {
    const name = normalizeTitle(track.name)
    if (name.length === 0) continue
    if ((line.includes(name) || name.includes(line)) && name.length > bestLength) {
      best = track
      bestLength = name.length
    }
  }
  return best
}
