import type { Delay } from "./delay-policy"

/** Spreads a base delay so retrying callers do not wake in lockstep. */
export interface JitterStrategy {
  apply(delay: Delay): Delay
}
