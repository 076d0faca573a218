import { type OpenAIProvider, createOpenAI } from "@ai-sdk/openai"
import { generateText } from "ai"
import {
  COMMENTARY_TIMEOUT_MS,
  DJ_HISTORY_COUNT,
  DJ_MAX_TOKENS,
  DJ_MODEL,
  DJ_TEMPERATURE,
} from "./config.ts"
import type { HistoryEntry, HistoryLog } from "./history.ts"

export interface TrackInfo {
  album: string
  track: string
}

/**
 * Where the DJ's words come from. Either call may be slow or fail; callers
 * are expected to time out and substitute their own fallback.
 */
export interface CommentarySource {
  commentary(track: TrackInfo): Promise<string>
  /** Free-text answer naming the track that best fits `mood`. */
  suggestTrack(mood: string, current: TrackInfo, candidates: readonly string[]): Promise<string>
  close?(): Promise<void> | void
}

/** Track titles offered to the model when it is asked to pick for a mood. */
export const MAX_MOOD_CANDIDATES = 60

export interface DjCommentatorOptions {
  model?: string
  apiKey?: string
  /** OpenAI-compatible endpoint, e.g. a local Ollama at http://localhost:11434/v1. */
  baseUrl?: string
  timeoutMs?: number
  history?: HistoryLog
  provider?: OpenAIProvider
}

const SYSTEM_PROMPT = `You are a laid-back radio DJ on a small late-night station. Your job is to briefly introduce songs from the listener's own record collection.

Guidelines:
- Keep it SHORT (1-2 sentences, under 30 words)
- Always say the song title and the album it comes from
- Only add a fact if you know something genuinely interesting about the record
- If you don't know anything notable, just say the title and album simply
- NO flowery language, NO generic descriptions like "ethereal sounds" or "let this wash over you"
- NO telling people how to feel or what to experience
- Don't use emojis`

/** DJ commentary from a chat model through the AI SDK. */
export class DjCommentator implements CommentarySource {
  private readonly openai: OpenAIProvider
  private readonly model: string
  private readonly timeoutMs: number
  private readonly history?: HistoryLog
  private controller = new AbortController()

  constructor(options: DjCommentatorOptions = {}) {
    this.openai =
      options.provider ??
      createOpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
      })
    this.model = options.model ?? DJ_MODEL
    this.timeoutMs = options.timeoutMs ?? COMMENTARY_TIMEOUT_MS
    this.history = options.history
  }

  /**
   * Generates DJ commentary for a track based on history.
   * Focuses on the song title and interesting facts about the music.
   */
  async commentary(track: TrackInfo): Promise<string> {
    const recent = this.history?.recent(DJ_HISTORY_COUNT) ?? []
    const historyContext = formatHistoryContext(recent)

    const { text } = await generateText({
      model: this.openai.chat(this.model),
      maxOutputTokens: DJ_MAX_TOKENS,
      temperature: DJ_TEMPERATURE,
      abortSignal: this.signal(),
      system: historyContext ? `${SYSTEM_PROMPT}\n\n${historyContext}` : SYSTEM_PROMPT,
      prompt: `Introduce "${track.track}" from the album "${track.album}".`,
    })

    return text.trim()
  }

  async suggestTrack(
    mood: string,
    current: TrackInfo,
    candidates: readonly string[],
  ): Promise<string> {
    const list = candidates
      .slice(0, MAX_MOOD_CANDIDATES)
      .map((title) => `- ${title}`)
      .join("\n")

    const { text } = await generateText({
      model: this.openai.chat(this.model),
      maxOutputTokens: 40,
      temperature: 0.7,
      abortSignal: this.signal(),
      system:
        "You pick the next song for a radio show. Answer with the exact title of one song from the list and nothing else.",
      prompt: `Now playing: "${current.track}" from "${current.album}".
The listener asked for this mood: ${mood}

Songs available:
${list}`,
    })

    return text.trim()
  }

  /** Aborts every request still in flight. */
  close(): void {
    this.controller.abort()
    this.controller = new AbortController()
  }

  private signal(): AbortSignal {
    return AbortSignal.any([this.controller.signal, AbortSignal.timeout(this.timeoutMs)])
  }
}

export function formatHistoryContext(entries: readonly HistoryEntry[]): string {
  if (entries.length === 0) {
    return ""
  }

  const lines = entries.map(
    (e, i) => `${i + 1}. "${e.track}" from ${e.album} - Your intro: "${e.commentary}"`,
  )

  return `Recent intros (avoid repeating yourself):
${lines.join("\n")}`
}
