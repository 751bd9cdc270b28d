import { type ConfigSource, EnvSource, loadConfig, ObjectSource } from "@tether/config"
import type { Logger } from "@tether/logger"
import { resolveRetryOptions } from "../core/retry-options"
import type { RetryOptions } from "../ports/retry-options"
import { statusName } from "../ports/status-code"
import { type RetryEnvConfig, retryEnvSchema } from "./schema"

export const RETRY_ENV_PREFIX = "RETRY_"

export type LoadRetryOptionsInput = {
  /** Default: `RETRY_*` environment variables */
  sources?: readonly ConfigSource[]
  /** Applied after every source */
  overrides?: Partial<RetryOptions>
  logger?: Logger
}

export function mapEnvToRetryOptions(env: RetryEnvConfig): Partial<RetryOptions> {
  return {
    initialDelayMs: env.INITIAL_DELAY_MS,
    maxDelayMs: env.MAX_DELAY_MS,
    multiplier: env.MULTIPLIER,
    maxAttempts: env.MAX_ATTEMPTS,
    jitterFraction: env.JITTER_FRACTION,
    retryableCodes: env.RETRYABLE_CODES,
    ...(env.TOTAL_TIMEOUT_MS !== undefined && { totalTimeoutMs: env.TOTAL_TIMEOUT_MS }),
    ...(env.ATTEMPT_TIMEOUT_MS !== undefined && { attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS }),
  }
}

function toRawOverrides(overrides: Partial<RetryOptions>): Record<string, unknown> {
  return {
    INITIAL_DELAY_MS: overrides.initialDelayMs,
    MAX_DELAY_MS: overrides.maxDelayMs,
    MULTIPLIER: overrides.multiplier,
    MAX_ATTEMPTS: overrides.maxAttempts,
    JITTER_FRACTION: overrides.jitterFraction,
    TOTAL_TIMEOUT_MS: overrides.totalTimeoutMs,
    ATTEMPT_TIMEOUT_MS: overrides.attemptTimeoutMs,
    RETRYABLE_CODES: overrides.retryableCodes?.map(statusName),
  }
}

/**
 * Loads {@link RetryOptions} from config sources, validated as one unit.
 *
 * @throws Error listing every invalid key when validation fails
 */
export async function loadRetryOptions(input: LoadRetryOptionsInput = {}): Promise<RetryOptions> {
  const { overrides, logger } = input
  const sources: ConfigSource[] = [
    ...(input.sources ?? [new EnvSource({ prefix: RETRY_ENV_PREFIX })]),
    ...(overrides ? [new ObjectSource(toRawOverrides(overrides))] : []),
  ]

  const config = await loadConfig({
    schema: retryEnvSchema,
    sources,
    label: "Retry configuration",
  })

  logger?.debug("Loaded retry configuration", { sources: config.sourcesUsed() })

  const unknown = config.unknownKeys()
  if (unknown.length > 0) {
    logger?.warn("Ignoring unknown retry configuration keys", { keys: unknown })
  }

  return resolveRetryOptions({
    ...mapEnvToRetryOptions(config.value),
    ...(overrides?.metadata && { metadata: overrides.metadata }),
  })
}
