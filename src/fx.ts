import { existsSync, statSync } from "node:fs"
import { join } from "node:path"
import { playClip } from "./clip.ts"
import type { ClipPlayer } from "./config.ts"
import { getLogger } from "./logger.ts"
import { SUPPORTED_EXTENSIONS } from "./library.ts"

const logger = getLogger("fx")

/** Fires short one-shot sound effects by name. */
export interface FxPlayer {
  /** Best effort and non-blocking; a missing effect is not an error. */
  play(name: string): void
}

export class ClipFxPlayer implements FxPlayer {
  private readonly dir: string | null

  constructor(
    dir: string | undefined,
    private readonly player: ClipPlayer,
    private readonly launch: typeof playClip = playClip,
  ) {
    this.dir = dir && existsSync(dir) && statSync(dir).isDirectory() ? dir : null
    if (dir && !this.dir) {
      logger.warn("FX directory not found, effects disabled", { dir })
    }
  }

  /** First `<name><ext>` that exists in the FX directory. */
  resolve(name: string): string | null {
    if (!this.dir) return null
    for (const ext of SUPPORTED_EXTENSIONS) {
      const file = join(this.dir, `${name}${ext}`)
      if (existsSync(file)) return file
    }
    return null
  }

  play(name: string): void {
    const file = this.resolve(name)
    if (!file) {
      logger.debug("No FX file, skipping", { name })
      return
    }

    const clip = this.launch(this.player, file)
    clip.done
      .then((completed) => {
        if (!completed) logger.warn("FX playback failed", { file })
      })
      .catch((error: unknown) => logger.warn("FX playback failed", { file, error }))
  }
}
