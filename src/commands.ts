import type { TrackInfo } from "./dj.ts"
import type { HistoryEntry } from "./history.ts"
import type { VoiceInfo } from "./tts.ts"

export type Command =
  | { kind: "skip" }
  | { kind: "previous" }
  | { kind: "pause" }
  | { kind: "resume" }
  | { kind: "mood"; mood: string | null }
  | { kind: "now" }
  | { kind: "voice"; query: string }
  | { kind: "unrecognized"; input: string }

export interface CommandResult {
  ok: boolean
  command: Command["kind"]
  message: string
  nowPlaying?: TrackInfo
  entry?: HistoryEntry | null
  mood?: string | null
  voice?: VoiceInfo | null
}

const ALIASES: Record<string, "skip" | "previous" | "pause" | "resume" | "now"> = {
  skip: "skip",
  next: "skip",
  prev: "previous",
  previous: "previous",
  back: "previous",
  pause: "pause",
  stop: "pause",
  play: "resume",
  resume: "resume",
  now: "now",
}

/**
 * Parses a typed command. The keyword is case-insensitive, the argument
 * keeps its case.
 */
export function parseCommand(input: string): Command {
  const text = input.trim()
  const space = text.search(/\s/)
  const keyword = (space === -1 ? text : text.slice(0, space)).toLowerCase()
  const argument = space === -1 ? "" : text.slice(space).trim()

  if (keyword === "mood") {
    return { kind: "mood", mood: argument === "" ? null : argument }
  }
  if (keyword === "voice" && argument !== "") {
    return { kind: "voice", query: argument }
  }

  const kind = Object.hasOwn(ALIASES, keyword) ? ALIASES[keyword] : undefined
  if (kind && argument === "") {
    return { kind }
  }
  return { kind: "unrecognized", input: text }
}
