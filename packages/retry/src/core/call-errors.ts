import type { ExhaustedReason } from "@tether/backoff"
import { BaseError } from "@tether/errors"
import { CancelledError } from "@tether/future"
import { type StatusCode, statusName } from "../ports/status-code"
import type { Metadata } from "../ports/transport"

type CallErrorInit = {
  callId: string
  attempts: number
  cause?: unknown
}

/** The remote rejected the call with a status that is not worth retrying. */
export class CallFailedError extends BaseError<"call_failed"> {
  readonly status: StatusCode
  readonly trailers: Metadata

  constructor(
    init: CallErrorInit & { status: StatusCode; trailers?: Metadata; details?: string },
  ) {
    const { status, trailers = {}, details, callId, attempts, cause } = init

    super(`Call failed with ${statusName(status)}${details ? `: ${details}` : ""}`, {
      code: "call_failed",
      context: { callId, attempts, status: statusName(status) },
      cause,
    })

    this.status = status
    this.trailers = trailers
  }
}

/** Every attempt failed with a retryable status and the policy gave up. */
export class RetriesExhaustedError extends BaseError<"retries_exhausted"> {
  readonly lastStatus: StatusCode
  readonly attempts: number
  readonly reason: ExhaustedReason

  constructor(
    init: CallErrorInit & { lastStatus: StatusCode; reason: ExhaustedReason; details?: string },
  ) {
    const { lastStatus, reason, details, callId, attempts, cause } = init
    const why = reason === "deadline" ? "deadline reached" : `${attempts} attempts`

    super(
      `Gave up after ${why}; last status ${statusName(lastStatus)}${details ? `: ${details}` : ""}`,
      {
        code: "retries_exhausted",
        context: { callId, attempts, reason, lastStatus: statusName(lastStatus) },
        cause,
        isRetryable: true,
      },
    )

    this.lastStatus = lastStatus
    this.attempts = attempts
    this.reason = reason
  }
}

/**
 * The transport broke the unary contract: OK without a value, or more than
 * one value. A bug in the peer or the transport, not in the request.
 */
export class InternalConsistencyError extends BaseError<"internal_consistency"> {
  constructor(message: string, init: CallErrorInit) {
    const { callId, attempts, cause } = init

    super(message, {
      code: "internal_consistency",
      context: { callId, attempts },
      cause,
      isOperational: false,
    })
  }
}

export type CallError =
  | CallFailedError
  | RetriesExhaustedError
  | InternalConsistencyError
  | CancelledError

export function isCallError(error: unknown): error is CallError {
  return (
    error instanceof CallFailedError ||
    error instanceof RetriesExhaustedError ||
    error instanceof InternalConsistencyError ||
    error instanceof CancelledError
  )
}
