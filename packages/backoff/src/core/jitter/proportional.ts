import { systemRandom } from "../../adapters/random"
import type { Delay } from "../../ports/delay-policy"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"

/**
 * Proportional jitter: spreads the delay uniformly over
 * `[delay * (1 - fraction), delay * (1 + fraction))`.
 *
 * A fraction of 0 disables jitter. Callers clamp the result.
 */
export function proportionalJitter(
  fraction: number,
  random: RandomSource = systemRandom,
): JitterStrategy {
  if (!Number.isFinite(fraction) || fraction < 0 || fraction > 1) {
    throw new RangeError(`jitter fraction must be within [0, 1] (got ${fraction})`)
  }

  return {
    apply(delay: Delay): Delay {
      if (fraction === 0) return delay

      const spread = fraction * (2 * random.next() - 1)

      return { milliseconds: delay.milliseconds * (1 + spread) }
    },
  }
}
