import { createConnection } from "node:net"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { createInterface } from "node:readline"
import type { Duplex } from "node:stream"
import { setTimeout as sleep } from "node:timers/promises"
import { execa } from "execa"
import { PlayerError, errorMessage } from "./errors.ts"
import { getLogger } from "./logger.ts"
import { clampVolume } from "./volume.ts"

const logger = getLogger("player")

/**
 * The engine that plays the music. The radio is its only driver. End of
 * track is reported through `onTrackEnd` from the engine's own event
 * context, never as a result of a call.
 */
export interface MediaPlayer {
  /** Replace whatever is loaded with `path` and start playing it. */
  play(path: string): Promise<void>
  stop(): Promise<void>
  setPaused(paused: boolean): Promise<void>
  /** 0-100. */
  setVolume(volume: number): Promise<void>
  isPlaying(): Promise<boolean>
  onTrackEnd(listener: () => void): void
  close(): Promise<void>
}

export interface MpvEvent {
  event: string
  reason?: string
  [key: string]: unknown
}

interface Pending {
  resolve: (data: unknown) => void
  reject: (error: Error) => void
}

/** Line-delimited JSON IPC with a running mpv. */
export class MpvClient {
  private nextId = 1
  private closed = false
  private readonly pending = new Map<number, Pending>()
  private readonly listeners: ((event: MpvEvent) => void)[] = []

  constructor(private readonly socket: Duplex) {
    createInterface({ input: socket }).on("line", (line) => this.receive(line))
    socket.on("close", () => this.fail(new PlayerError("mpv connection closed")))
    socket.on("error", (error) => this.fail(new PlayerError(error.message)))
  }

  onEvent(listener: (event: MpvEvent) => void): void {
    this.listeners.push(listener)
  }

  command(...args: unknown[]): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new PlayerError("mpv connection closed"))
    }

    const requestId = this.nextId++
    return new Promise((resolve, reject) => {
      this.pending.set(requestId, { resolve, reject })
      this.socket.write(`${JSON.stringify({ command: args, request_id: requestId })}\n`)
    })
  }

  async getProperty(name: string): Promise<unknown> {
    return this.command("get_property", name)
  }

  async setProperty(name: string, value: unknown): Promise<void> {
    await this.command("set_property", name, value)
  }

  close(): void {
    this.fail(new PlayerError("mpv connection closed"))
    this.socket.end()
  }

  private receive(line: string): void {
    if (line.trim() === "") return

    let message: unknown
    try {
      message = JSON.parse(line)
    } catch {
      logger.warn("Ignoring malformed mpv message", { line })
      return
    }
    if (typeof message !== "object" || message === null) return

    if ("event" in message && typeof message.event === "string") {
      const event: MpvEvent = { ...message, event: message.event }
      for (const listener of this.listeners) listener(event)
      return
    }

    if (!("request_id" in message) || typeof message.request_id !== "number") return
    const pending = this.pending.get(message.request_id)
    if (!pending) return
    this.pending.delete(message.request_id)

    const error = "error" in message ? message.error : "success"
    if (error === "success") {
      pending.resolve("data" in message ? message.data : undefined)
    } else {
      pending.reject(new PlayerError(`mpv: ${String(error)}`))
    }
  }

  private fail(error: PlayerError): void {
    this.closed = true
    for (const pending of this.pending.values()) pending.reject(error)
    this.pending.clear()
  }
}

export interface MpvLaunchOptions {
  binary?: string
  socketPath?: string
  connectAttempts?: number
}

/** Music playback through an idle mpv process controlled over its IPC socket. */
export class MpvPlayer implements MediaPlayer {
  private readonly endListeners: (() => void)[] = []

  constructor(
    private readonly client: MpvClient,
    private readonly child: { kill(): boolean } | null = null,
  ) {
    client.onEvent((event) => {
      if (event.event !== "end-file") return
      // "stop" comes from our own loadfile/stop calls.
      if (event.reason === "eof" || event.reason === "error") {
        if (event.reason === "error") {
          logger.warn("mpv could not play the file", { error: event.file_error })
        }
        for (const listener of this.endListeners) listener()
      }
    })
  }

  /** Starts mpv in idle mode and connects to its IPC socket. */
  static async launch({
    binary = "mpv",
    socketPath = join(tmpdir(), `radio-dj-mpv-${process.pid}.sock`),
    connectAttempts = 50,
  }: MpvLaunchOptions = {}): Promise<MpvPlayer> {
    const child = execa(
      binary,
      [
        "--idle=yes",
        "--no-video",
        "--no-terminal",
        "--really-quiet",
        `--input-ipc-server=${socketPath}`,
      ],
      { stdio: "ignore", reject: false },
    )

    for (let attempt = 1; attempt <= connectAttempts; attempt++) {
      try {
        const socket = await connect(socketPath)
        logger.debug("Connected to mpv", { socketPath, attempt })
        return new MpvPlayer(new MpvClient(socket), child)
      } catch (error) {
        if (child.exitCode !== null) {
          throw new PlayerError(`mpv exited with code ${child.exitCode}`)
        }
        if (attempt === connectAttempts) {
          child.kill()
          throw new PlayerError(`Could not connect to mpv: ${errorMessage(error)}`)
        }
        await sleep(100)
      }
    }
    throw new PlayerError("Could not connect to mpv")
  }

  async play(path: string): Promise<void> {
    await this.client.command("loadfile", path, "replace")
    await this.client.setProperty("pause", false)
  }

  async stop(): Promise<void> {
    await this.client.command("stop")
  }

  async setPaused(paused: boolean): Promise<void> {
    await this.client.setProperty("pause", paused)
  }

  async setVolume(volume: number): Promise<void> {
    await this.client.setProperty("volume", clampVolume(volume))
  }

  async isPlaying(): Promise<boolean> {
    const [idle, paused] = await Promise.all([
      this.client.getProperty("idle-active"),
      this.client.getProperty("pause"),
    ])
    return idle === false && paused === false
  }

  onTrackEnd(listener: () => void): void {
    this.endListeners.push(listener)
  }

  async close(): Promise<void> {
    try {
      await this.client.command("quit")
    } catch (error) {
      logger.debug("mpv quit failed", { error: errorMessage(error) })
    }
    this.client.close()
    this.child?.kill()
  }
}

function connect(path: string): Promise<Duplex> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(path)
    socket.once("connect", () => {
      socket.off("error", reject)
      resolve(socket)
    })
    socket.once("error", reject)
  })
}
