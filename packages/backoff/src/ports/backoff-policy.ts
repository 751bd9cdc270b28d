import type { Delay, Milliseconds } from "./delay-policy"

export type BackoffConfig = {
  /** Delay after the first failed attempt. */
  initialDelay: Delay

  /** Ceiling for any delay, jitter included. */
  maxDelay: Delay

  /** Growth per failed attempt. Must be >= 1. */
  multiplier: number

  /** Total attempts, the first one included. Must be >= 1. */
  maxAttempts: number

  /** Proportion of the delay to randomise, in [0, 1]. Default: 0 */
  jitterFraction?: number

  /** Absolute epoch ms; no attempt is scheduled to start after it. */
  deadline?: number
}

export type ExhaustedReason = "max-attempts" | "deadline"

export type RetryDecision =
  | { kind: "retry"; delay: Delay }
  | { kind: "exhausted"; reason: ExhaustedReason }

/**
 * Decides whether, and after how long, to try again.
 *
 * @remarks
 * `attemptsMade` counts attempts already submitted, so it is >= 1 whenever
 * a decision is needed. Implementations must be free of shared mutable
 * state; one policy may serve many concurrent calls.
 */
export interface BackoffPolicy {
  nextDelay(attemptsMade: number, nowMs: Milliseconds): RetryDecision
}
