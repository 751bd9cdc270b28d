import type { Milliseconds, UnixMs } from "@tether/clock"
import type { StatusCode } from "./status-code"
import type { Metadata } from "./transport"

export interface AttemptContext {
  /** Shared by every attempt of one logical call */
  callId: string

  /** 1-indexed */
  attemptNumber: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  /** Epoch ms by which this attempt should finish, if bounded */
  deadline?: UnixMs

  /** Call-scoped metadata sent with every attempt */
  metadata: Metadata

  /** Aborted once this attempt is superseded or the call settles */
  signal: AbortSignal
}

export interface RetryScheduledInfo {
  callId: string

  /** The attempt that just failed */
  attemptNumber: number

  status: StatusCode

  delayMs: Milliseconds
}

export interface OperationInfo {
  callId: string

  /** Attempts submitted in total */
  attempts: number

  /** ms since the first attempt started */
  elapsedMs: Milliseconds
}
