import type { Delay, DelayPolicy } from "../../ports/delay-policy"

export interface ExponentialOptions {
  base: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number

  /** Cap applied before any jitter. */
  max?: Delay
}

/** `base * factor^attempt`, attempt 0-indexed, optionally capped. */
export function exponential(opts: ExponentialOptions): DelayPolicy {
  const { base, factor = 2, max } = opts

  return {
    getDelay(attempt: number): Delay {
      const raw = base.milliseconds * factor ** attempt

      return { milliseconds: max ? Math.min(raw, max.milliseconds) : raw }
    },
  }
}
