export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (ids, status codes, attempt counts).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if trying the same thing again might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (true) or programmer error / broken invariant (false).
   *
   * @remarks
   * - Operational: rejected request, remote unavailable, caller cancelled.
   * - Non-operational: a peer violating its protocol, corrupted state.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
