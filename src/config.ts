import { homedir } from "node:os"
import { join } from "node:path"
import { parseArgs } from "node:util"
import { z } from "zod"
import { ConfigError } from "./errors.ts"

/** Music volume while a track plays (0-100). */
export const MUSIC_VOLUME = 80

/** Volume to duck the music to while the DJ is on air (0-100). */
export const DJ_SPEAKING_VOLUME = 20

/** Duration of volume fade in/out in milliseconds. */
export const FADE_DURATION_MS = 300

/** Number of steps for volume fade (higher = smoother). */
export const FADE_STEPS = 10

/** TTS model to use. */
export const TTS_MODEL = "gpt-4o-mini-tts"

/** Default TTS voice. */
export const TTS_VOICE = "marin"

/** TTS playback volume (0.0 to 1.0). */
export const TTS_VOLUME = 0.6

/** LLM model for DJ commentary. */
export const DJ_MODEL = "gpt-4.1-mini"

/** Temperature for DJ commentary generation. */
export const DJ_TEMPERATURE = 1

/** Max tokens for DJ commentary. */
export const DJ_MAX_TOKENS = 150

/** Number of recent plays to use for context. */
export const DJ_HISTORY_COUNT = 5

/** Give up on a commentary request after this long. */
export const COMMENTARY_TIMEOUT_MS = 8000

/** Days to keep plays in the SQLite log before cleanup. */
export const ANNOUNCEMENT_RETENTION_DAYS = 30

/** How often the supervisor checks that the player is still going. */
export const HEALTH_CHECK_INTERVAL_MS = 500

/** Sound effect fired at every track start. */
export const FX_NAME = "airhorn"

/** Port for the HTTP control API. */
export const CONTROL_PORT = 8080

/** Default path of the SQLite play log when `--db` is given without a value. */
export const DB_PATH = join(homedir(), ".config", "radio-dj.sqlite")

export const CLIP_PLAYERS = ["afplay", "ffplay", "mpv"] as const
export type ClipPlayer = (typeof CLIP_PLAYERS)[number]

const volume = z.coerce.number().int().min(0).max(100)

const optionalPath = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional()

export const ConfigSchema = z.object({
  root: z.string().trim().min(1),
  csv: optionalPath,
  db: optionalPath,
  fxDir: optionalPath,
  musicVolume: volume.default(MUSIC_VOLUME),
  duckVolume: volume.default(DJ_SPEAKING_VOLUME),
  fadeMs: z.coerce.number().int().min(0).default(FADE_DURATION_MS),
  model: z.string().min(1).default(DJ_MODEL),
  baseUrl: optionalPath,
  apiKey: z.string().optional(),
  voice: z.string().min(1).default(TTS_VOICE),
  ttsModel: z.string().min(1).default(TTS_MODEL),
  ttsVolume: z.coerce.number().min(0).max(1).default(TTS_VOLUME),
  commentaryTimeoutMs: z.coerce.number().int().positive().default(COMMENTARY_TIMEOUT_MS),
  healthCheckMs: z.coerce.number().int().positive().default(HEALTH_CHECK_INTERVAL_MS),
  port: z.coerce.number().int().min(0).max(65535).optional(),
  player: z.string().min(1).default("mpv"),
  clipPlayer: z
    .enum(CLIP_PLAYERS)
    .default(process.platform === "darwin" ? "afplay" : "ffplay"),
})

export type RadioConfig = z.infer<typeof ConfigSchema>

export const USAGE = `Usage: radio-dj [options]

  --root <dir>          Root directory containing your music (default: cwd)
  --csv <file>          Append playback history to a CSV file
  --db [file]           Append playback history to SQLite (default: ${DB_PATH})
  --fx <dir>            Directory with short FX files (e.g. airhorn.wav)
  --duck <0-100>        Music volume while the DJ speaks (default: ${DJ_SPEAKING_VOLUME})
  --vol <0-100>         Music volume (default: ${MUSIC_VOLUME})
  --model <name>        Commentary model (default: ${DJ_MODEL})
  --voice <match>       TTS voice, matched by substring (default: ${TTS_VOICE})
  --port <port>         Serve the HTTP control API on this port
  --player <path>       mpv binary used for music (default: mpv)
  --clip-player <name>  afplay | ffplay | mpv, used for FX and speech
  --help                Show this message
`

/** Parses CLI flags, letting them win over environment variables. */
export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): RadioConfig {
  let values: ReturnType<typeof parseFlags>["values"]
  try {
    values = parseFlags(argv).values
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error))
  }

  const db = values.db ?? env.RADIO_DB
  const result = ConfigSchema.safeParse({
    root: values.root ?? env.RADIO_ROOT ?? process.cwd(),
    csv: values.csv ?? env.RADIO_CSV,
    db: db === "" ? DB_PATH : db,
    fxDir: values.fx ?? env.RADIO_FX_DIR,
    musicVolume: values.vol ?? env.RADIO_VOLUME,
    duckVolume: values.duck ?? env.RADIO_DUCK,
    fadeMs: env.RADIO_FADE_MS,
    model: values.model ?? env.DJ_MODEL,
    baseUrl: env.OPENAI_BASE_URL,
    apiKey: env.OPENAI_API_KEY,
    voice: values.voice ?? env.TTS_VOICE,
    ttsModel: env.TTS_MODEL,
    ttsVolume: env.TTS_VOLUME,
    commentaryTimeoutMs: env.DJ_TIMEOUT_MS,
    healthCheckMs: env.RADIO_HEALTH_CHECK_MS,
    port: values.port ?? env.RADIO_PORT,
    player: values.player ?? env.RADIO_PLAYER,
    clipPlayer: values["clip-player"] ?? env.RADIO_CLIP_PLAYER,
  })

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    )
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, {
      issues,
    })
  }

  return result.data
}

/** True when `--help` was passed. */
export function wantsHelp(argv: string[] = process.argv.slice(2)): boolean {
  return argv.includes("--help") || argv.includes("-h")
}

function parseFlags(argv: string[]) {
  // `--db` may come without a value; parseArgs has no optional values,
  // so a bare flag is rewritten to an empty string first.
  const normalized = argv.flatMap((arg, i) =>
    arg === "--db" && (argv[i + 1] === undefined || argv[i + 1]?.startsWith("--"))
      ? ["--db="]
      : [arg],
  )

  return parseArgs({
    args: normalized,
    strict: true,
    allowPositionals: false,
    options: {
      root: { type: "string" },
      csv: { type: "string" },
      db: { type: "string" },
      fx: { type: "string" },
      duck: { type: "string" },
      vol: { type: "string" },
      model: { type: "string" },
      voice: { type: "string" },
      port: { type: "string" },
      player: { type: "string" },
      "clip-player": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  })
}
