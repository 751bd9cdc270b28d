import type { Milliseconds } from "@tether/clock"
import { StatusCode } from "./status-code"
import type { Metadata } from "./transport"

/**
 * Immutable retry policy for one kind of call.
 *
 * @remarks
 * `maxAttempts` is total tries, not retries.
 * - maxAttempts=1 → try once, no retry
 * - maxAttempts=5 → try once + up to 4 retries
 */
export type RetryOptions = Readonly<{
  /** Delay after the first failed attempt */
  initialDelayMs: Milliseconds

  /** Ceiling for any delay, jitter included */
  maxDelayMs: Milliseconds

  /** Growth per failed attempt, >= 1 */
  multiplier: number

  /** Total attempts, >= 1 */
  maxAttempts: number

  /** Proportion of each delay to randomise, in [0, 1] */
  jitterFraction: number

  /** Budget for the whole call; no attempt is scheduled past it */
  totalTimeoutMs?: Milliseconds

  /** Per-attempt budget handed to the transport as a deadline */
  attemptTimeoutMs?: Milliseconds

  /** Statuses worth another attempt */
  retryableCodes: readonly StatusCode[]

  /** Sent with every attempt; per-call metadata wins on conflicts */
  metadata?: Metadata
}>

export const DEFAULT_RETRYABLE_CODES: readonly StatusCode[] = [
  StatusCode.UNAVAILABLE,
  StatusCode.DEADLINE_EXCEEDED,
  StatusCode.RESOURCE_EXHAUSTED,
  StatusCode.ABORTED,
]

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  initialDelayMs: 100,
  maxDelayMs: 60_000,
  multiplier: 2,
  maxAttempts: 5,
  jitterFraction: 0.2,
  retryableCodes: DEFAULT_RETRYABLE_CODES,
}
