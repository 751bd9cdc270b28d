import type { CallError } from "../core/call-errors"
import type { StatusCode } from "./status-code"

export type OperationSuccess<T> = {
  ok: true
  value: T
  attempts: number
}

export type OperationFailure = {
  ok: false
  error: CallError
  attempts: number
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure

export type OperationState =
  | "idle"
  | "attempt-in-flight"
  | "backoff-scheduled"
  | "succeeded"
  | "failed"
  | "cancelled"

export type RetryState = {
  /** Attempts submitted so far; never decreases */
  attemptsMade: number

  deadline?: number

  lastFailureStatus?: StatusCode
}
