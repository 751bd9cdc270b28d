import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance. Adapters must honor these options but are
 * free to choose how.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Human-readable output for local development. Leave off in production,
   * where JSON lines go to a log processor.
   */
  prettify?: boolean
}
