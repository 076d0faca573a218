import { unlink, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import OpenAI from "openai"
import pLimit from "p-limit"
import { type ClipHandle, playClip } from "./clip.ts"
import { type ClipPlayer, TTS_MODEL, TTS_VOICE, TTS_VOLUME } from "./config.ts"
import { errorMessage } from "./errors.ts"
import { getLogger } from "./logger.ts"

const logger = getLogger("tts")

export const VOICES = [
  "alloy",
  "ash",
  "ballad",
  "coral",
  "echo",
  "fable",
  "juniper",
  "maple",
  "marin",
  "nova",
  "onyx",
  "sage",
  "shimmer",
  "verse",
] as const

export type Voice = (typeof VOICES)[number]

export interface VoiceInfo {
  name: string
  id: string
}

/**
 * Speaks text over the music. `speak` hands the text off and returns at
 * once; utterances play one after another, never on top of each other.
 */
export interface VoiceOutput {
  listVoices(): VoiceInfo[]
  /** Case-insensitive substring match on voice names; first match wins and sticks. */
  selectVoice(query: string): VoiceInfo | null
  currentVoice(): VoiceInfo | null
  speak(text: string): void
  /** Resolves when every utterance dispatched so far has finished. */
  idle(): Promise<void>
  cancel(): Promise<void>
}

/** Voice names: the first match for `query` in enumeration order, or null. */
export function matchVoice(voices: readonly VoiceInfo[], query: string): VoiceInfo | null {
  const needle = query.trim().toLowerCase()
  if (needle === "") return null
  return voices.find((voice) => voice.name.toLowerCase().includes(needle)) ?? null
}

function voiceInfo(voice: Voice): VoiceInfo {
  return { name: voice.charAt(0).toUpperCase() + voice.slice(1), id: voice }
}

export interface OpenAiVoiceOptions {
  client?: OpenAI
  model?: string
  voice?: string
  /** Playback volume, 0.0 to 1.0. */
  volume?: number
  player: ClipPlayer
}

/** Text to speech through the OpenAI speech API, played with a clip player. */
export class OpenAiVoice implements VoiceOutput {
  private readonly client: OpenAI
  private readonly model: string
  private readonly volume: number
  private readonly player: ClipPlayer
  private readonly queue = pLimit(1)
  private voice: Voice = TTS_VOICE
  /** Bumped by `cancel`; utterances queued before it are dropped. */
  private epoch = 0
  private current: ClipHandle | null = null
  private currentAudioPath: string | null = null

  constructor(options: OpenAiVoiceOptions) {
    this.client = options.client ?? new OpenAI()
    this.model = options.model ?? TTS_MODEL
    this.volume = options.volume ?? TTS_VOLUME
    this.player = options.player
    if (options.voice && !this.selectVoice(options.voice)) {
      logger.warn("No voice matched, keeping default", {
        query: options.voice,
        voice: this.voice,
      })
    }
  }

  listVoices(): VoiceInfo[] {
    return VOICES.map(voiceInfo)
  }

  selectVoice(query: string): VoiceInfo | null {
    const match = matchVoice(this.listVoices(), query)
    const voice = VOICES.find((candidate) => candidate === match?.id)
    if (!voice) return null
    this.voice = voice
    return voiceInfo(voice)
  }

  currentVoice(): VoiceInfo {
    return voiceInfo(this.voice)
  }

  speak(text: string): void {
    const voice = this.voice
    const epoch = this.epoch
    this.queue(() => this.say(text, voice, epoch)).catch((error: unknown) =>
      logger.error("Speech failed", { error: errorMessage(error) }),
    )
  }

  async idle(): Promise<void> {
    await this.queue(async () => undefined)
  }

  /** Drops queued utterances and cuts off the one playing. */
  async cancel(): Promise<void> {
    this.epoch++
    this.current?.kill()
    this.current = null
    await this.removeAudio()
  }

  private async say(text: string, voice: Voice, epoch: number): Promise<void> {
    if (epoch !== this.epoch) return

    let audioPath: string
    try {
      audioPath = await this.generateSpeech(text, voice)
    } catch (error) {
      logger.error("Speech synthesis failed", { error: errorMessage(error) })
      return
    }
    if (epoch !== this.epoch) {
      await unlink(audioPath).catch((error: unknown) =>
        logger.debug("Could not remove speech audio", { audioPath, error: errorMessage(error) }),
      )
      return
    }
    await this.playAudio(audioPath)
  }

  /** Generates speech audio and returns the path. Does not play it. */
  protected async generateSpeech(text: string, voice: Voice): Promise<string> {
    const response = await this.client.audio.speech.create({
      model: this.model,
      voice,
      input: text,
      response_format: "wav",
    })

    const audioPath = join(tmpdir(), `radio-dj-${Date.now()}.wav`)
    await writeFile(audioPath, Buffer.from(await response.arrayBuffer()))
    return audioPath
  }

  /** Plays an audio file to the end, then deletes it. */
  protected async playAudio(audioPath: string): Promise<void> {
    this.currentAudioPath = audioPath
    const clip = playClip(this.player, audioPath, this.volume)
    this.current = clip

    const completed = await clip.done
    if (!completed && this.current === clip) {
      logger.warn("Speech playback failed", { audioPath })
    }

    if (this.current === clip) this.current = null
    await this.removeAudio()
  }

  private async removeAudio(): Promise<void> {
    const path = this.currentAudioPath
    if (!path) return
    this.currentAudioPath = null
    await unlink(path).catch((error: unknown) =>
      logger.debug("Could not remove speech audio", { path, error: errorMessage(error) }),
    )
  }
}
