import winston from "winston"

function logLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL

  switch (process.env.NODE_ENV) {
    case "production":
      return "info"
    case "test":
      return "warn"
    default:
      return "debug"
  }
}

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "HH:mm:ss" }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : ""
    return `[${String(timestamp)}] ${level} ${String(module)}: ${String(message)}${extra}`
  }),
)

const prodFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
)

/** Create a logger tagged with the module it belongs to. */
export function createLogger(module: string): winston.Logger {
  const isProduction =
    process.env.NODE_ENV === "production" || process.env.NODE_ENV === "test"

  return winston.createLogger({
    level: logLevel(),
    defaultMeta: { module },
    format: isProduction ? prodFormat : devFormat,
    transports: [new winston.transports.Console()],
  })
}

const loggers = new Map<string, winston.Logger>()

/** Get or create the logger for a module. */
export function getLogger(module: string): winston.Logger {
  let logger = loggers.get(module)
  if (!logger) {
    logger = createLogger(module)
    loggers.set(module, logger)
  }
  return logger
}
