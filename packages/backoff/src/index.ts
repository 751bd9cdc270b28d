export { sequenceRandom, systemRandom } from "./adapters/random"
export { proportionalJitter } from "./core/jitter/proportional"
export { createBackoffPolicy, nextDelay, validateBackoffConfig } from "./core/next-delay"
export { type ExponentialOptions, exponential } from "./core/strategies/exponential"
export type {
  BackoffConfig,
  BackoffPolicy,
  ExhaustedReason,
  RetryDecision,
} from "./ports/backoff-policy"
export type { Delay, DelayPolicy, Milliseconds } from "./ports/delay-policy"
export type { JitterStrategy } from "./ports/jitter-strategy"
export type { RandomSource } from "./ports/random-source"
