export type LogContext = {
  service: string
  module: string
  env: string

  /** Logical operation, e.g. "createTable" */
  operation: string
  /** One id per logical call, shared by all of its attempts */
  callId: string
  attempt: number

  status: string
  delayMs: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
