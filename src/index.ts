import "dotenv/config"
import type { Server } from "node:http"
import { createInterface } from "node:readline"
import { ANNOUNCEMENT_RETENTION_DAYS, USAGE, loadConfig, wantsHelp } from "./config.ts"
import { CsvHistorySink } from "./csv.ts"
import { SqliteHistorySink } from "./db.ts"
import { DjCommentator } from "./dj.ts"
import { RadioError, errorMessage } from "./errors.ts"
import { ClipFxPlayer } from "./fx.ts"
import { HistoryLog, type HistorySink } from "./history.ts"
import { countTracks, discoverAlbums } from "./library.ts"
import { getLogger } from "./logger.ts"
import { MpvPlayer } from "./player.ts"
import { Radio } from "./radio.ts"
import { createApp } from "./server.ts"
import { OpenAiVoice } from "./tts.ts"

const logger = getLogger("main")

if (wantsHelp()) {
  console.log(USAGE)
  process.exit(0)
}

try {
  await main()
} catch (error) {
  logger.error(errorMessage(error), error instanceof RadioError ? { code: error.code } : {})
  process.exit(1)
}

async function main(): Promise<void> {
  const config = loadConfig()

  logger.info(`Scanning ${config.root}`)
  const library = await discoverAlbums(config.root)
  if (library.size === 0) {
    logger.error("No audio files found, aborting")
    process.exit(1)
  }
  logger.info(`Found ${library.size} albums, ${countTracks(library)} tracks`)

  const sinks: HistorySink[] = []
  if (config.csv) {
    sinks.push(new CsvHistorySink(config.csv))
  }
  if (config.db) {
    const db = await SqliteHistorySink.open(config.db)
    // Clean old plays on startup
    const removed = await db.cleanOld(ANNOUNCEMENT_RETENTION_DAYS)
    if (removed > 0) logger.info(`Removed ${removed} old plays from ${config.db}`)
    sinks.push(db)
  }

  const history = new HistoryLog()
  const radio = new Radio(
    {
      library,
      player: await MpvPlayer.launch({ binary: config.player }),
      commentary: new DjCommentator({
        model: config.model,
        apiKey: config.apiKey,
        baseUrl: config.baseUrl,
        timeoutMs: config.commentaryTimeoutMs,
        history,
      }),
      voice: new OpenAiVoice({
        model: config.ttsModel,
        voice: config.voice,
        volume: config.ttsVolume,
        player: config.clipPlayer,
      }),
      fx: new ClipFxPlayer(config.fxDir, config.clipPlayer),
      history,
      sinks,
    },
    {
      musicVolume: config.musicVolume,
      duckVolume: config.duckVolume,
      fadeMs: config.fadeMs,
      healthCheckMs: config.healthCheckMs,
      commentaryTimeoutMs: config.commentaryTimeoutMs,
    },
  )

  let server: Server | null = null
  if (config.port !== undefined) {
    const port = config.port
    server = createApp(radio).listen(port, () => {
      logger.info(`Control API listening on http://localhost:${port}`)
    })
  }

  if (process.stdin.isTTY) {
    attachConsole(radio)
  }

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`)
    server?.close()
    radio
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Shutdown failed", { error: errorMessage(error) })
        process.exit(1)
      })
  }
  process.once("SIGINT", () => shutdown("SIGINT"))
  process.once("SIGTERM", () => shutdown("SIGTERM"))

  await radio.start()
}

/** Typed commands on the terminal: skip, prev, pause, play, mood <text>, voice <match>, now. */
function attachConsole(radio: Radio): void {
  const lines = createInterface({ input: process.stdin })
  lines.on("line", (line) => {
    if (line.trim() === "") return
    radio
      .perform(line)
      .then((result) => {
        if (result.ok) logger.info(result.message)
        else logger.warn(result.message)
      })
      .catch((error: unknown) => logger.error("Command failed", { error: errorMessage(error) }))
  })
}
