import { setTimeout as sleep } from "node:timers/promises"
import pLimit from "p-limit"
import { type CommandResult, parseCommand } from "./commands.ts"
import {
  COMMENTARY_TIMEOUT_MS,
  DJ_SPEAKING_VOLUME,
  FADE_DURATION_MS,
  FX_NAME,
  HEALTH_CHECK_INTERVAL_MS,
  MUSIC_VOLUME,
} from "./config.ts"
import { type CommentarySource, MAX_MOOD_CANDIDATES, type TrackInfo } from "./dj.ts"
import { EmptyLibraryError, RadioStateError, errorMessage } from "./errors.ts"
import type { FxPlayer } from "./fx.ts"
import { type HistoryEntry, HistoryLog, type HistorySink, formatTimestamp } from "./history.ts"
import { type Library, type Track, findTrackByTitle } from "./library.ts"
import { getLogger } from "./logger.ts"
import type { MediaPlayer } from "./player.ts"
import { PlaybackQueue, type QueueEntry, buildQueue } from "./queue.ts"
import type { VoiceInfo, VoiceOutput } from "./tts.ts"
import { clampVolume, fadeVolume } from "./volume.ts"

const logger = getLogger("radio")

/** What the DJ says when the commentary source fails or times out. */
export const FALLBACK_COMMENTARY = "Stay tuned, more music is on the way."

export type RadioState = "idle" | "playing" | "commentating" | "paused" | "stopped"

export interface Levels {
  music: number
  duck: number
}

export interface RadioStatus {
  state: RadioState
  nowPlaying: TrackInfo | null
  mood: string | null
  voice: VoiceInfo | null
  cursor: number
  queueLength: number
  levels: Levels
}

export interface RadioDeps {
  library: Library
  player: MediaPlayer
  commentary: CommentarySource
  voice: VoiceOutput
  fx: FxPlayer
  history?: HistoryLog
  sinks?: HistorySink[]
}

export interface RadioOptions {
  musicVolume?: number
  duckVolume?: number
  fadeMs?: number
  fxName?: string
  healthCheckMs?: number
  commentaryTimeoutMs?: number
  /** Source of randomness for the shuffle. */
  random?: () => number
}

interface TrackStart {
  entry: QueueEntry
  generation: number
  startedAt: Date
}

interface Started {
  /** Settles once the track's commentary is in the history. */
  recorded: Promise<HistoryEntry>
}

/**
 * The DJ. Owns the queue cursor, drives the player and hosts every track
 * start.
 *
 * Every mutation (track end, skip, previous, pause, resume, mood, voice,
 * levels, health checks, stop) runs through one serialized queue, whether
 * it comes from a user or from the player's end-of-track event. Commentary
 * and mood lookups run outside it so a slow model never holds up a skip.
 *
 * Speech is dispatched without waiting for it to finish, and the volume is
 * restored right away. A skip can therefore start the next track, and duck
 * again, while the previous line is still being spoken. Only the newest
 * track start gets its intro spoken.
 */
export class Radio {
  private readonly exclusive = pLimit(1)
  private readonly queue: PlaybackQueue
  private readonly historyLog: HistoryLog
  private readonly sinks: HistorySink[]
  private readonly random: () => number
  private readonly fadeMs: number
  private readonly fxName: string
  private readonly healthCheckMs: number
  private readonly commentaryTimeoutMs: number
  private readonly supervisor = new AbortController()
  private levels: Levels
  private state: RadioState = "idle"
  private mood: string | null = null
  private generation = 0
  private pendingTransitions = 0
  private recording: Promise<unknown> = Promise.resolve()

  constructor(
    private readonly deps: RadioDeps,
    options: RadioOptions = {},
  ) {
    this.random = options.random ?? Math.random
    this.queue = PlaybackQueue.fromLibrary(deps.library, this.random)
    this.historyLog = deps.history ?? new HistoryLog()
    this.sinks = deps.sinks ?? []
    this.levels = {
      music: clampVolume(options.musicVolume ?? MUSIC_VOLUME),
      duck: clampVolume(options.duckVolume ?? DJ_SPEAKING_VOLUME),
    }
    this.fadeMs = options.fadeMs ?? FADE_DURATION_MS
    this.fxName = options.fxName ?? FX_NAME
    this.healthCheckMs = options.healthCheckMs ?? HEALTH_CHECK_INTERVAL_MS
    this.commentaryTimeoutMs = options.commentaryTimeoutMs ?? COMMENTARY_TIMEOUT_MS

    deps.player.onTrackEnd(() => this.handleTrackEnd())
  }

  /**
   * Plays the first track, then supervises the player until `stop()`.
   * Resolves only once the radio has stopped.
   */
  async start(): Promise<void> {
    await this.open()
    await this.supervise()
  }

  /** Starts playback without the supervisor loop. Resolves with the first history entry. */
  async open(): Promise<HistoryEntry | null> {
    if (this.state !== "idle") {
      throw new RadioStateError(`Radio cannot start while ${this.state}`)
    }
    if (this.queue.isEmpty()) {
      throw new EmptyLibraryError("No playable tracks in the library")
    }

    this.state = "playing"
    logger.info("Radio on air", { tracks: this.queue.length })
    const started = await this.exclusive(() => this.beginPlaying())
    return started ? started.recorded : null
  }

  async stop(): Promise<void> {
    if (this.state === "stopped") return
    this.supervisor.abort()

    await this.exclusive(async () => {
      const wasIdle = this.state === "idle"
      this.state = "stopped"
      if (!wasIdle) {
        await this.deps.player.stop().catch((error: unknown) =>
          logger.warn("Player did not stop cleanly", { error: errorMessage(error) }),
        )
      }
      await this.deps.player.close().catch((error: unknown) =>
        logger.warn("Player did not close cleanly", { error: errorMessage(error) }),
      )
    })

    await this.deps.voice.cancel()
    await this.deps.commentary.close?.()
    await this.recording

    for (const sink of this.sinks) {
      try {
        await sink.close?.()
      } catch (error) {
        logger.error("History sink did not close cleanly", {
          sink: sink.name,
          error: errorMessage(error),
        })
      }
    }
    logger.info("Radio stopped")
  }

  /** Moves to the next track, as if the current one had ended. */
  async skip(): Promise<HistoryEntry | null> {
    if (!this.isRunning()) {
      logger.warn("Ignoring skip", { state: this.state })
      return null
    }
    return this.transition()
  }

  async previous(): Promise<HistoryEntry | null> {
    if (!this.isRunning()) {
      logger.warn("Ignoring previous", { state: this.state })
      return null
    }

    const started = await this.exclusive(async () => {
      if (!this.isRunning()) return null
      this.queue.retreat()
      return this.beginPlaying()
    })
    return started ? started.recorded : null
  }

  async pause(): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.state !== "playing" && this.state !== "commentating") return false
      try {
        await this.deps.player.setPaused(true)
      } catch (error) {
        logger.error("Could not pause", { error: errorMessage(error) })
        return false
      }
      this.state = "paused"
      return true
    })
  }

  async resume(): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.state !== "paused") return false
      try {
        await this.deps.player.setPaused(false)
      } catch (error) {
        logger.error("Could not resume", { error: errorMessage(error) })
        return false
      }
      this.state = "playing"
      return true
    })
  }

  /** Sets the hint consulted at every track change; null or blank clears it. */
  async setMood(text: string | null): Promise<string | null> {
    return this.exclusive(() => {
      const mood = text?.trim() ?? ""
      this.mood = mood === "" ? null : mood
      logger.info(this.mood ? "Mood set" : "Mood cleared", { mood: this.mood })
      return this.mood
    })
  }

  listVoices(): VoiceInfo[] {
    return this.deps.voice.listVoices()
  }

  async selectVoice(query: string): Promise<VoiceInfo | null> {
    return this.exclusive(() => {
      const voice = this.deps.voice.selectVoice(query)
      if (voice) {
        logger.info("Voice selected", { voice: voice.name })
      } else {
        logger.info("No voice matched", { query })
      }
      return voice
    })
  }

  /** Adjusts the live music and duck levels (0-100). */
  async setLevels(levels: Partial<Levels>): Promise<Levels> {
    return this.exclusive(async () => {
      this.levels = {
        music: clampVolume(levels.music ?? this.levels.music),
        duck: clampVolume(levels.duck ?? this.levels.duck),
      }
      if (this.state === "playing") {
        await this.deps.player.setVolume(this.levels.music).catch((error: unknown) =>
          logger.warn("Volume change failed", { error: errorMessage(error) }),
        )
      }
      return { ...this.levels }
    })
  }

  /** Ducks the music, speaks `text` to the end, then brings the music back. */
  async announce(text: string): Promise<void> {
    if (!this.isRunning()) return
    const generation = this.generation

    await this.fade(this.levels.music, this.levels.duck)
    this.deps.voice.speak(text)
    await this.deps.voice.idle()

    if (generation === this.generation && this.isRunning()) {
      await this.fade(this.levels.duck, this.levels.music)
    }
  }

  playFx(name: string): void {
    this.deps.fx.play(name)
  }

  async perform(input: string): Promise<CommandResult> {
    const command = parseCommand(input)

    switch (command.kind) {
      case "skip":
      case "previous": {
        const entry = command.kind === "skip" ? await this.skip() : await this.previous()
        return {
          ok: entry !== null,
          command: command.kind,
          message: entry ? `Now playing ${entry.album} - ${entry.track}` : "Radio is not playing",
          entry,
        }
      }
      case "pause": {
        const ok = await this.pause()
        return { ok, command: "pause", message: ok ? "Paused" : "Nothing to pause" }
      }
      case "resume": {
        const ok = await this.resume()
        return { ok, command: "resume", message: ok ? "Playing" : "Not paused" }
      }
      case "mood": {
        const mood = await this.setMood(command.mood)
        return {
          ok: true,
          command: "mood",
          message: mood ? `Mood set: ${mood}` : "Mood cleared",
          mood,
        }
      }
      case "now": {
        const nowPlaying = this.currentTrackInfo()
        return {
          ok: nowPlaying !== null,
          command: "now",
          message: nowPlaying ? `${nowPlaying.album} - ${nowPlaying.track}` : "Nothing queued",
          ...(nowPlaying ? { nowPlaying } : {}),
        }
      }
      case "voice": {
        const voice = await this.selectVoice(command.query)
        return {
          ok: voice !== null,
          command: "voice",
          message: voice ? `Voice set: ${voice.name}` : `No voice matched "${command.query}"`,
          voice,
        }
      }
      case "unrecognized":
        return {
          ok: false,
          command: "unrecognized",
          message: `Unrecognized command: ${command.input}`,
        }
    }
  }

  currentTrackInfo(): TrackInfo | null {
    if (this.queue.isEmpty()) return null
    const { album, track } = this.queue.current()
    return { album, track: track.name }
  }

  history(limit?: number): HistoryEntry[] {
    return this.historyLog.recent(limit)
  }

  status(): RadioStatus {
    return {
      state: this.state,
      nowPlaying: this.currentTrackInfo(),
      mood: this.mood,
      voice: this.deps.voice.currentVoice(),
      cursor: this.queue.cursor,
      queueLength: this.queue.length,
      levels: { ...this.levels },
    }
  }

  queueSnapshot(): QueueEntry[] {
    return this.queue.snapshot()
  }

  /** Resolves once every track started so far has its history entry. */
  async settled(): Promise<void> {
    await this.recording
  }

  /**
   * One supervisor tick: if the player stopped on its own while a track
   * should be audible, restart the current track. Returns true when it did.
   */
  async checkHealth(): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.state !== "playing" && this.state !== "commentating") return false
      if (this.pendingTransitions > 0) return false

      const { player } = this.deps
      try {
        if (await player.isPlaying()) return false
        // The track may have ended while we were asking.
        if (this.pendingTransitions > 0) return false

        const { album, track } = this.queue.current()
        logger.warn("Player stalled, replaying current track", { album, track: track.name })
        await player.play(track.path)
        await player.setVolume(
          this.state === "commentating" ? this.levels.duck : this.levels.music,
        )
        return true
      } catch (error) {
        logger.error("Health check failed", { error: errorMessage(error) })
        return false
      }
    })
  }

  private isRunning(): boolean {
    return this.state !== "idle" && this.state !== "stopped"
  }

  private async supervise(): Promise<void> {
    const { signal } = this.supervisor
    while (!signal.aborted) {
      const aborted = await sleep(this.healthCheckMs, false, { signal }).catch(
        (error: unknown) => {
          if (signal.aborted) return true
          throw error
        },
      )
      if (aborted) break
      await this.checkHealth()
    }
  }

  private handleTrackEnd(): void {
    if (!this.isRunning()) return
    this.transition().catch((error: unknown) =>
      logger.error("Could not advance after track end", { error: errorMessage(error) }),
    )
  }

  /** Advance, honoring the mood hint, and start whatever is current. */
  private async transition(): Promise<HistoryEntry | null> {
    this.pendingTransitions++
    let started: Started | null = null
    try {
      const pick = await this.pickForMood()
      started = await this.exclusive(async () => {
        if (!this.isRunning()) return null
        this.queue.advance()
        if (pick) {
          this.queue.insertFront({ album: pick.album, track: pick })
        }
        return this.beginPlaying()
      })
    } finally {
      this.pendingTransitions--
    }
    return started ? started.recorded : null
  }

  /** Asks the commentary source for a track fitting the mood. Never throws. */
  private async pickForMood(): Promise<Track | null> {
    const mood = this.mood
    if (!mood || this.queue.isEmpty()) return null

    const { album, track } = this.queue.current()
    const candidates = buildQueue(this.deps.library, this.random)
      .map((entry) => entry.track.name)
      .filter((name) => name !== track.name)
      .slice(0, MAX_MOOD_CANDIDATES)

    let answer: string
    try {
      answer = await withTimeout(
        this.deps.commentary.suggestTrack(mood, { album, track: track.name }, candidates),
        this.commentaryTimeoutMs,
      )
    } catch (error) {
      logger.warn("Mood lookup failed", { mood, error: errorMessage(error) })
      return null
    }

    const match = findTrackByTitle(this.deps.library, answer)
    if (!match || match.path === track.path) {
      logger.info("No track matched the mood suggestion", { mood, answer })
      return null
    }
    logger.info("Picked a track for the mood", { mood, album: match.album, track: match.name })
    return match
  }

  /**
   * Loads and starts the current entry, then kicks off its hosting.
   * Runs inside the exclusive section; the hosting itself does not.
   */
  private async beginPlaying(): Promise<Started | null> {
    const entry = this.queue.current()
    const { player } = this.deps

    try {
      await player.stop()
      await player.play(entry.track.path)
      await player.setVolume(this.levels.music)
    } catch (error) {
      logger.error("Could not start track", {
        album: entry.album,
        track: entry.track.name,
        error: errorMessage(error),
      })
      this.state = "playing"
      return null
    }

    this.state = "commentating"
    this.generation += 1
    const start: TrackStart = { entry, generation: this.generation, startedAt: new Date() }
    logger.info("Now playing", { album: entry.album, track: entry.track.name })

    const commentary = this.host(start)
    const recorded = this.recording
      .then(() => commentary)
      .then((text) => this.record(start, text))
    this.recording = recorded.catch((error: unknown) =>
      logger.error("Could not record history", { error: errorMessage(error) }),
    )
    return { recorded }
  }

  /** Duck, FX, commentary, speech, restore. Never throws. */
  private async host(start: TrackStart): Promise<string> {
    const { album, track } = start.entry
    const isCurrent = () => start.generation === this.generation

    if (isCurrent()) {
      await this.fade(this.levels.music, this.levels.duck)
      this.deps.fx.play(this.fxName)
    }

    const text = await this.fetchCommentary({ album, track: track.name })

    // An intro for a track that was already skipped is recorded, not spoken.
    if (isCurrent() && this.state !== "stopped") {
      this.deps.voice.speak(text)
    }

    // A newer track start owns the volume now.
    if (isCurrent() && this.isRunning()) {
      await this.fade(this.levels.duck, this.levels.music)
      if (this.state === "commentating") this.state = "playing"
    }
    return text
  }

  private async fetchCommentary(info: TrackInfo): Promise<string> {
    try {
      const text = await withTimeout(
        this.deps.commentary.commentary(info),
        this.commentaryTimeoutMs,
      )
      return text.trim() === "" ? FALLBACK_COMMENTARY : text.trim()
    } catch (error) {
      logger.warn("Commentary unavailable, using fallback", {
        ...info,
        error: errorMessage(error),
      })
      return FALLBACK_COMMENTARY
    }
  }

  private async record(start: TrackStart, commentary: string): Promise<HistoryEntry> {
    const entry = this.historyLog.append({
      timestamp: formatTimestamp(start.startedAt),
      album: start.entry.album,
      track: start.entry.track.name,
      commentary,
    })

    for (const sink of this.sinks) {
      try {
        await sink.write(entry)
      } catch (error) {
        logger.error("History sink failed", { sink: sink.name, error: errorMessage(error) })
      }
    }
    return entry
  }

  private async fade(from: number, to: number): Promise<void> {
    try {
      await fadeVolume((volume) => this.deps.player.setVolume(volume), from, to, {
        durationMs: this.fadeMs,
      })
    } catch (error) {
      logger.warn("Volume change failed", { error: errorMessage(error) })
    }
  }
}

async function withTimeout<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Timed out after ${ms}ms`)), ms)
  })
  try {
    return await Promise.race([work, timeout])
  } finally {
    clearTimeout(timer)
  }
}
