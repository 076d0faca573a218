import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express"
import { ZodError, z } from "zod"
import { RadioError, RadioStateError, errorMessage } from "./errors.ts"
import { getLogger } from "./logger.ts"
import type { Radio } from "./radio.ts"

const logger = getLogger("server")

const volume = z.number().int().min(0).max(100)

const CommandBody = z.object({ cmd: z.string() })
const MoodBody = z.object({ mood: z.string().nullable() })
const VoiceBody = z.object({ query: z.string().trim().min(1) })
const SayBody = z.object({ text: z.string().trim().min(1).max(1000) })
const LevelsBody = z
  .object({ music: volume.optional(), duck: volume.optional() })
  .refine((levels) => levels.music !== undefined || levels.duck !== undefined, {
    message: "Provide music and/or duck",
  })
const HistoryQuery = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(12),
})
const FxParams = z.object({ name: z.string().regex(/^[\w-]+$/) })

type Handler = (req: Request, res: Response) => Promise<unknown> | unknown

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next)
  }
}

const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
  if (error instanceof ZodError) {
    res.status(400).json({ error: "Invalid request", issues: error.issues })
    return
  }
  if (error instanceof SyntaxError && "body" in error) {
    res.status(400).json({ error: "Malformed JSON body" })
    return
  }
  if (error instanceof RadioStateError) {
    res.status(409).json({ error: error.message, code: error.code })
    return
  }

  logger.error("Request failed", { error: errorMessage(error) })
  const code = error instanceof RadioError ? error.code : "INTERNAL_ERROR"
  res.status(500).json({ error: errorMessage(error), code })
}

/** HTTP control surface for a running radio. */
export function createApp(radio: Radio): Express {
  const app = express()
  app.use(express.json())

  const api = express.Router()

  api.get(
    "/now",
    route((_req, res) => res.json(radio.currentTrackInfo())),
  )

  api.get(
    "/status",
    route((_req, res) => res.json(radio.status())),
  )

  api.get(
    "/history",
    route((req, res) => {
      const { limit } = HistoryQuery.parse(req.query)
      res.json(radio.history(limit))
    }),
  )

  api.post(
    "/skip",
    route(async (_req, res) => res.json({ entry: await radio.skip() })),
  )

  api.post(
    "/previous",
    route(async (_req, res) => res.json({ entry: await radio.previous() })),
  )

  api.post(
    "/pause",
    route(async (_req, res) => res.json({ changed: await radio.pause() })),
  )

  api.post(
    "/play",
    route(async (_req, res) => res.json({ changed: await radio.resume() })),
  )

  api.post(
    "/command",
    route(async (req, res) => {
      const { cmd } = CommandBody.parse(req.body)
      res.json(await radio.perform(cmd))
    }),
  )

  api.put(
    "/mood",
    route(async (req, res) => {
      const { mood } = MoodBody.parse(req.body)
      res.json({ mood: await radio.setMood(mood) })
    }),
  )

  api.get(
    "/voices",
    route((_req, res) => res.json(radio.listVoices())),
  )

  api.post(
    "/voice",
    route(async (req, res) => {
      const { query } = VoiceBody.parse(req.body)
      const voice = await radio.selectVoice(query)
      if (!voice) {
        res.status(404).json({ error: `No voice matched "${query}"` })
        return
      }
      res.json(voice)
    }),
  )

  api.post(
    "/say",
    route((req, res) => {
      const { text } = SayBody.parse(req.body)
      radio
        .announce(text)
        .catch((error: unknown) =>
          logger.error("Announcement failed", { error: errorMessage(error) }),
        )
      res.status(202).json({ queued: true })
    }),
  )

  api.post(
    "/fx/:name",
    route((req, res) => {
      const { name } = FxParams.parse(req.params)
      radio.playFx(name)
      res.status(202).json({ fired: name })
    }),
  )

  api.put(
    "/levels",
    route(async (req, res) => {
      const levels = LevelsBody.parse(req.body)
      res.json(await radio.setLevels(levels))
    }),
  )

  app.use("/api", api)
  app.use(errorHandler)
  return app
}
