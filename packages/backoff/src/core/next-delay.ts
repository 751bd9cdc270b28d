import { systemRandom } from "../adapters/random"
import type { BackoffConfig, BackoffPolicy, RetryDecision } from "../ports/backoff-policy"
import type { Delay, DelayPolicy, Milliseconds } from "../ports/delay-policy"
import type { RandomSource } from "../ports/random-source"
import { proportionalJitter } from "./jitter/proportional"
import { exponential } from "./strategies/exponential"

export function validateBackoffConfig(config: BackoffConfig): void {
  const { initialDelay, maxDelay, multiplier, maxAttempts, deadline } = config

  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${maxAttempts})`)
  }

  if (!Number.isFinite(multiplier) || multiplier < 1) {
    throw new RangeError(`multiplier must be a finite number >= 1 (got ${multiplier})`)
  }

  if (!Number.isFinite(initialDelay.milliseconds) || initialDelay.milliseconds < 0) {
    throw new RangeError(
      `initialDelay must be finite and >= 0 (got ${initialDelay.milliseconds})`,
    )
  }

  if (!Number.isFinite(maxDelay.milliseconds)) {
    throw new RangeError(`maxDelay must be finite (got ${maxDelay.milliseconds})`)
  }

  if (maxDelay.milliseconds < initialDelay.milliseconds) {
    throw new RangeError(
      `maxDelay must be >= initialDelay (got ${maxDelay.milliseconds} < ${initialDelay.milliseconds})`,
    )
  }

  if (deadline !== undefined && !Number.isFinite(deadline)) {
    throw new RangeError(`deadline must be a finite epoch ms (got ${deadline})`)
  }
}

/**
 * Exponential growth, then jitter, then a whole number of ms in
 * `[0, maxDelay]`. A non-finite jittered value keeps the unjittered delay.
 */
function toDelayPolicy(config: BackoffConfig, random: RandomSource): DelayPolicy {
  const { initialDelay, maxDelay, multiplier, jitterFraction = 0 } = config
  const growth = exponential({ base: initialDelay, factor: multiplier, max: maxDelay })
  const jitter = proportionalJitter(jitterFraction, random)
  const ceiling = maxDelay.milliseconds

  return {
    getDelay(retry: number): Delay {
      const base = growth.getDelay(retry)
      const jittered = jitter.apply(base).milliseconds
      const ms = Number.isFinite(jittered) ? jittered : base.milliseconds

      return { milliseconds: Math.floor(Math.min(ceiling, Math.max(0, ms))) }
    },
  }
}

function decide(
  delays: DelayPolicy,
  config: BackoffConfig,
  attemptsMade: number,
  nowMs: Milliseconds,
): RetryDecision {
  if (attemptsMade >= config.maxAttempts) {
    return { kind: "exhausted", reason: "max-attempts" }
  }

  const delay = delays.getDelay(Math.max(0, attemptsMade - 1))

  if (config.deadline !== undefined && nowMs + delay.milliseconds > config.deadline) {
    return { kind: "exhausted", reason: "deadline" }
  }

  return { kind: "retry", delay }
}

/**
 * Delay before the next attempt, or why there is none.
 *
 * `initialDelay * multiplier^(attemptsMade - 1)`, capped at `maxDelay`,
 * jittered by `jitterFraction` and clamped to `[0, maxDelay]`.
 */
export function nextDelay(
  attemptsMade: number,
  config: BackoffConfig,
  nowMs: Milliseconds,
  random: RandomSource = systemRandom,
): RetryDecision {
  validateBackoffConfig(config)

  return decide(toDelayPolicy(config, random), config, attemptsMade, nowMs)
}

/** Validates `config` once and binds it. */
export function createBackoffPolicy(
  config: BackoffConfig,
  random: RandomSource = systemRandom,
): BackoffPolicy {
  validateBackoffConfig(config)
  const delays = toDelayPolicy(config, random)

  return {
    nextDelay(attemptsMade: number, nowMs: Milliseconds): RetryDecision {
      return decide(delays, config, attemptsMade, nowMs)
    },
  }
}
