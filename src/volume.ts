import { setTimeout as sleep } from "node:timers/promises"
import { FADE_DURATION_MS, FADE_STEPS } from "./config.ts"

export interface FadeOptions {
  durationMs?: number
  steps?: number
}

/**
 * Smoothly moves volume from `from` to `to` through `setVolume`. A zero
 * duration sets the target in a single call.
 */
export async function fadeVolume(
  setVolume: (volume: number) => Promise<void>,
  from: number,
  to: number,
  { durationMs = FADE_DURATION_MS, steps = FADE_STEPS }: FadeOptions = {},
): Promise<void> {
  if (durationMs <= 0 || steps <= 1 || from === to) {
    await setVolume(to)
    return
  }

  const stepInterval = durationMs / steps
  const startTime = performance.now()

  for (let step = 1; step < steps; step++) {
    const targetTime = startTime + step * stepInterval
    const elapsed = performance.now() - startTime

    // Calculate volume based on actual elapsed time, not step count
    const progress = Math.min(elapsed / durationMs, 1)
    const volume = from + (to - from) * Math.max(progress, step / steps)

    await setVolume(Math.round(volume))

    // Only sleep if we're ahead of schedule
    const timeUntilNextStep = targetTime - performance.now()
    if (timeUntilNextStep > 5) {
      await sleep(timeUntilNextStep)
    }
  }

  // Ensure we hit the final target
  await setVolume(to)
}

export function clampVolume(volume: number): number {
  return Math.max(0, Math.min(100, Math.round(volume)))
}
