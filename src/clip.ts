import { execa } from "execa"
import type { ClipPlayer } from "./config.ts"

/** Command line that plays `file` once at `volume` (0.0 to 1.0) and exits. */
export function clipCommand(
  player: ClipPlayer,
  file: string,
  volume = 1,
): [string, string[]] {
  switch (player) {
    case "afplay":
      return ["afplay", ["-v", String(volume), file]]
    case "ffplay":
      return [
        "ffplay",
        ["-nodisp", "-autoexit", "-loglevel", "quiet", "-volume", String(Math.round(volume * 100)), file],
      ]
    case "mpv":
      return ["mpv", ["--no-video", "--really-quiet", `--volume=${Math.round(volume * 100)}`, file]]
  }
}

export interface ClipHandle {
  /** Resolves when the clip finished; `false` if it failed or was killed. */
  done: Promise<boolean>
  kill(): void
}

/** Plays a short clip in its own process, independent of the music player. */
export function playClip(player: ClipPlayer, file: string, volume = 1): ClipHandle {
  const [command, args] = clipCommand(player, file, volume)
  const subprocess = execa(command, args, { stdio: "ignore", reject: false })

  return {
    done: subprocess.then((result) => !result.failed),
    kill: () => {
      subprocess.kill()
    },
  }
}
