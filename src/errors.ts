export interface RadioErrorOptions {
  code?: string
  details?: Record<string, unknown>
  cause?: unknown
}

export class RadioError extends Error {
  readonly code: string
  readonly details?: Record<string, unknown>

  constructor(name: string, message: string, options: RadioErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = name
    this.code = options.code ?? "RADIO_ERROR"
    this.details = options.details
  }
}

function createRadioError(name: string, code: string) {
  return class extends RadioError {
    constructor(message: string, details?: Record<string, unknown>) {
      super(name, message, { code, details })
    }
  }
}

/** Invalid flags or environment. */
export class ConfigError extends createRadioError("ConfigError", "CONFIG_INVALID") {}

/** Library root missing or unreadable. */
export class LibraryError extends createRadioError("LibraryError", "LIBRARY_UNAVAILABLE") {}

/** No playable tracks at start. */
export class EmptyLibraryError extends createRadioError("EmptyLibraryError", "LIBRARY_EMPTY") {}

/** Operation not allowed in the radio's current state. */
export class RadioStateError extends createRadioError("RadioStateError", "INVALID_STATE") {}

/** The media player process failed or went away. */
export class PlayerError extends createRadioError("PlayerError", "PLAYER_FAILED") {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
