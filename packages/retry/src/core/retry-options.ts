import { type BackoffConfig, validateBackoffConfig } from "@tether/backoff"
import type { UnixMs } from "@tether/clock"
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from "../ports/retry-options"
import { isStatusCode, StatusCode } from "../ports/status-code"

export function toBackoffConfig(options: RetryOptions, deadline?: UnixMs): BackoffConfig {
  return {
    initialDelay: { milliseconds: options.initialDelayMs },
    maxDelay: { milliseconds: options.maxDelayMs },
    multiplier: options.multiplier,
    maxAttempts: options.maxAttempts,
    jitterFraction: options.jitterFraction,
    ...(deadline !== undefined && { deadline }),
  }
}

/**
 * Throws `RangeError` on the first option that cannot drive a call.
 */
export function validateRetryOptions(options: RetryOptions): void {
  validateBackoffConfig(toBackoffConfig(options))

  const { jitterFraction, totalTimeoutMs, attemptTimeoutMs, retryableCodes } = options

  if (!(jitterFraction >= 0 && jitterFraction <= 1)) {
    throw new RangeError(`jitterFraction must be in [0, 1] (got ${jitterFraction})`)
  }

  for (const [name, value] of [
    ["totalTimeoutMs", totalTimeoutMs],
    ["attemptTimeoutMs", attemptTimeoutMs],
  ] as const) {
    if (value !== undefined && !(Number.isFinite(value) && value > 0)) {
      throw new RangeError(`${name} must be a finite number > 0 (got ${value})`)
    }
  }

  for (const code of retryableCodes) {
    if (!isStatusCode(code)) {
      throw new RangeError(`Unknown retryable status code ${code}`)
    }
    if (code === StatusCode.OK) {
      throw new RangeError("OK cannot be retryable")
    }
  }
}

/** Defaults overlaid with `overrides`; `undefined` leaves a default in place. */
export function resolveRetryOptions(overrides: Partial<RetryOptions> = {}): RetryOptions {
  const defaults = DEFAULT_RETRY_OPTIONS
  const { totalTimeoutMs, attemptTimeoutMs, metadata } = overrides

  const resolved: RetryOptions = {
    initialDelayMs: overrides.initialDelayMs ?? defaults.initialDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? defaults.maxDelayMs,
    multiplier: overrides.multiplier ?? defaults.multiplier,
    maxAttempts: overrides.maxAttempts ?? defaults.maxAttempts,
    jitterFraction: overrides.jitterFraction ?? defaults.jitterFraction,
    retryableCodes: overrides.retryableCodes ?? defaults.retryableCodes,
    ...(totalTimeoutMs !== undefined && { totalTimeoutMs }),
    ...(attemptTimeoutMs !== undefined && { attemptTimeoutMs }),
    ...(metadata !== undefined && { metadata }),
  }

  validateRetryOptions(resolved)

  return resolved
}
