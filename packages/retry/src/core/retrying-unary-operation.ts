import { type BackoffPolicy, createBackoffPolicy, type RandomSource } from "@tether/backoff"
import type { Clock, ScheduledTask, UnixMs } from "@tether/clock"
import { toAppError } from "@tether/errors"
import {
  type CallHandle,
  CancelledError,
  type FutureOutcome,
  SettableFuture,
  toCallHandle,
} from "@tether/future"
import { createNullLogger, type Logger } from "@tether/logger"
import { nanoid } from "nanoid"
import type { AttemptContext, OperationInfo } from "../ports/attempt-context"
import type { RetryObserver } from "../ports/observer"
import type { OperationResult, OperationState, RetryState } from "../ports/operation-result"
import type { RetryOptions } from "../ports/retry-options"
import { StatusCode, statusName } from "../ports/status-code"
import type { AttemptCall, Metadata, UnaryTransport } from "../ports/transport"
import {
  type CallError,
  CallFailedError,
  InternalConsistencyError,
  isCallError,
  RetriesExhaustedError,
} from "./call-errors"
import { createOutcomeClassifier, type OutcomeClassifier } from "./outcome-classifier"
import { toBackoffConfig, validateRetryOptions } from "./retry-options"

export type RetryingUnaryOperationDeps = {
  clock: Clock
  logger?: Logger
  random?: RandomSource
  generateCallId?: () => string
}

export type RetryingUnaryOperationInit<Req, Res> = {
  /** Logical operation name, for logs */
  name: string
  request: Req
  transport: UnaryTransport<Req, Res>
  options: RetryOptions
  metadata?: Metadata
  observer?: RetryObserver<Res>
}

type Attempt<Res> = {
  number: number
  submittedAt: UnixMs
  state: "pending" | "completed"
  controller: AbortController
  call?: AttemptCall
  /** Set once the attempt has been told to stop */
  stopReason?: Error
  /** Boxed so a legitimately undefined message still counts as received */
  received?: { message: Res }
}

/**
 * Drives one logical unary call through as many attempts as its
 * {@link RetryOptions} allow and settles exactly one {@link CallHandle}.
 *
 * @remarks
 * The internal {@link SettableFuture} is the only place a call settles. Success,
 * failure and cancellation all race to write it; the winner's outcome is
 * then applied to the operation by a single listener. Every transport event
 * is tagged with its attempt and dropped once that attempt is superseded or
 * the call has settled.
 */
export class RetryingUnaryOperation<Req, Res> {
  readonly callId: string

  private state: OperationState = "idle"
  private readonly retryState: RetryState = { attemptsMade: 0 }
  private readonly future = new SettableFuture<Res>()
  private readonly classifier: OutcomeClassifier
  private readonly logger: Logger
  private policy: BackoffPolicy | undefined
  private attempt: Attempt<Res> | undefined
  private timer: ScheduledTask | undefined
  private startedAt: UnixMs

  constructor(
    private readonly init: RetryingUnaryOperationInit<Req, Res>,
    private readonly deps: RetryingUnaryOperationDeps,
  ) {
    validateRetryOptions(init.options)

    this.startedAt = deps.clock.nowMs()
    this.callId = (deps.generateCallId ?? nanoid)()
    this.classifier = createOutcomeClassifier(init.options.retryableCodes)
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "retry",
      operation: init.name,
      callId: this.callId,
    })

    this.future.addListener((outcome) => this.onSettled(outcome))
  }

  /**
   * Submits the first attempt and returns the call's handle, unresolved
   * unless the transport answered synchronously.
   */
  start(): CallHandle<Res> {
    if (this.future.isCancelled() && this.retryState.attemptsMade === 0) {
      // Cancelled before starting: nothing is submitted.
      return toCallHandle(this.future)
    }

    if (this.state !== "idle") {
      throw new Error("Operation already started")
    }

    const { options } = this.init
    this.startedAt = this.deps.clock.nowMs()

    if (options.totalTimeoutMs !== undefined) {
      this.retryState.deadline = this.startedAt + options.totalTimeoutMs
    }

    this.policy = createBackoffPolicy(
      toBackoffConfig(options, this.retryState.deadline),
      this.deps.random,
    )

    const handle = toCallHandle(this.future)
    this.submitAttempt()

    return handle
  }

  /** Same as cancelling the handle. Returns false once the call has settled. */
  cancel(reason = "Call cancelled"): boolean {
    return this.future.cancel(reason)
  }

  getState(): OperationState {
    return this.state
  }

  getRetryState(): Readonly<RetryState> {
    return { ...this.retryState }
  }

  /** The settled result, or undefined while the call is in progress. */
  result(): OperationResult<Res> | undefined {
    const outcome = this.future.result()
    if (!outcome) return undefined

    const attempts = this.retryState.attemptsMade

    if (outcome.state === "fulfilled") {
      return { ok: true, value: outcome.value, attempts }
    }

    return { ok: false, error: this.asCallError(outcome.error), attempts }
  }

  private submitAttempt(): void {
    this.timer = undefined
    if (this.future.isDone()) return

    const now = this.deps.clock.nowMs()
    const attempt: Attempt<Res> = {
      number: this.retryState.attemptsMade + 1,
      submittedAt: now,
      state: "pending",
      controller: new AbortController(),
    }

    this.retryState.attemptsMade = attempt.number
    this.attempt = attempt
    this.state = "attempt-in-flight"

    const deadline = this.attemptDeadline(now)
    const context: AttemptContext = {
      callId: this.callId,
      attemptNumber: attempt.number,
      startedAt: this.startedAt,
      ...(deadline !== undefined && { deadline }),
      metadata: { ...this.init.options.metadata, ...this.init.metadata },
      signal: attempt.controller.signal,
    }

    this.notify("onAttempt", (o) => o.onAttempt?.(context))
    this.logger.debug("Submitting attempt", { attempt: attempt.number })

    try {
      attempt.call = this.init.transport.submit(this.init.request, context, {
        onMessage: (message) => this.onMessage(attempt, message),
        onTerminal: (status, trailers, details) =>
          this.onTerminal(attempt, status, trailers, details),
      })

      // The call may have settled from inside submit, before `call` existed.
      if (attempt.stopReason) this.cancelCall(attempt, attempt.stopReason)
    } catch (error) {
      this.future.setError(
        new CallFailedError({
          status: StatusCode.UNKNOWN,
          details: "Transport threw while submitting",
          callId: this.callId,
          attempts: attempt.number,
          cause: toAppError(error, "transport_threw", { attempt: attempt.number }),
        }),
      )
    }
  }

  private onMessage(attempt: Attempt<Res>, message: Res): void {
    if (this.isStale(attempt)) {
      this.logger.debug("Discarding message from a stale attempt", {
        attempt: attempt.number,
      })
      return
    }

    if (attempt.received) {
      // Settling below stops this attempt through onSettled.
      this.future.setError(
        new InternalConsistencyError("Received more than one value for unary call", {
          callId: this.callId,
          attempts: attempt.number,
        }),
      )
      return
    }

    attempt.received = { message }
  }

  private onTerminal(
    attempt: Attempt<Res>,
    status: StatusCode,
    trailers?: Metadata,
    details?: string,
  ): void {
    if (this.isStale(attempt)) {
      this.logger.debug("Discarding terminal status from a stale attempt", {
        attempt: attempt.number,
        status: statusName(status),
      })
      return
    }

    attempt.state = "completed"

    switch (this.classifier.classify(status)) {
      case "success":
        if (attempt.received) {
          this.future.set(attempt.received.message)
        } else {
          this.future.setError(
            new InternalConsistencyError("No value received for unary call", {
              callId: this.callId,
              attempts: attempt.number,
            }),
          )
        }
        return

      case "retryable":
        this.retryState.lastFailureStatus = status
        this.scheduleRetry(attempt, status, details)
        return

      case "permanent":
        this.retryState.lastFailureStatus = status
        this.future.setError(
          new CallFailedError({
            status,
            ...(trailers && { trailers }),
            ...(details !== undefined && { details }),
            callId: this.callId,
            attempts: attempt.number,
          }),
        )
        return
    }
  }

  private scheduleRetry(attempt: Attempt<Res>, status: StatusCode, details?: string): void {
    if (!this.policy) {
      throw new Error("Backoff policy missing; start() was not called")
    }

    const decision = this.policy.nextDelay(
      this.retryState.attemptsMade,
      this.deps.clock.nowMs(),
    )

    if (decision.kind === "exhausted") {
      this.future.setError(
        new RetriesExhaustedError({
          lastStatus: status,
          reason: decision.reason,
          ...(details !== undefined && { details }),
          callId: this.callId,
          attempts: this.retryState.attemptsMade,
        }),
      )
      return
    }

    const delayMs = decision.delay.milliseconds
    this.state = "backoff-scheduled"

    this.notify("onRetryScheduled", (o) =>
      o.onRetryScheduled?.({
        callId: this.callId,
        attemptNumber: attempt.number,
        status,
        delayMs,
      }),
    )
    this.logger.debug("Attempt failed; retrying after backoff", {
      attempt: attempt.number,
      status: statusName(status),
      delayMs,
    })

    this.timer = this.deps.clock.schedule(() => this.submitAttempt(), delayMs)
  }

  /** Applies whichever outcome won the race to settle the future. */
  private onSettled(outcome: FutureOutcome<Res>): void {
    this.timer?.cancel()
    this.timer = undefined

    const attempt = this.attempt
    if (attempt?.state === "pending") {
      attempt.state = "completed"
      this.stopAttempt(
        attempt,
        outcome.state === "cancelled" ? outcome.error : new Error("Call already settled"),
      )
    }

    const info = this.operationInfo()

    if (outcome.state === "fulfilled") {
      this.state = "succeeded"
      this.logger.debug("Call succeeded", {
        attempt: info.attempts,
        durationMs: info.elapsedMs,
      })
      this.notify("onSuccess", (o) => o.onSuccess?.(outcome.value, info))
      return
    }

    const error = this.asCallError(outcome.error)
    this.state = outcome.state === "cancelled" ? "cancelled" : "failed"
    this.logFailure(error, info)
    this.notify("onFailure", (o) => o.onFailure?.(error, info))
  }

  private logFailure(error: CallError, info: OperationInfo): void {
    const meta = { attempt: info.attempts, durationMs: info.elapsedMs, err: error }

    if (error instanceof CancelledError) {
      this.logger.debug("Call cancelled", meta)
    } else if (error instanceof RetriesExhaustedError) {
      this.logger.warn("Call failed; retries exhausted", {
        ...meta,
        status: statusName(error.lastStatus),
      })
    } else if (error instanceof InternalConsistencyError) {
      this.logger.error("Call failed; transport broke the unary contract", meta)
    } else {
      this.logger.info("Call failed", { ...meta, status: statusName(error.status) })
    }
  }

  private stopAttempt(attempt: Attempt<Res>, reason: Error): void {
    attempt.stopReason = reason
    attempt.controller.abort(reason)

    if (attempt.call) this.cancelCall(attempt, reason)
  }

  private cancelCall(attempt: Attempt<Res>, reason: Error): void {
    try {
      attempt.call?.cancel(reason.message)
    } catch (error) {
      this.logger.warn("Transport threw while cancelling an attempt", {
        attempt: attempt.number,
        err: error,
      })
    }
  }

  private isStale(attempt: Attempt<Res>): boolean {
    return attempt !== this.attempt || attempt.state === "completed" || this.future.isDone()
  }

  private attemptDeadline(now: UnixMs): UnixMs | undefined {
    const { attemptTimeoutMs } = this.init.options
    const callDeadline = this.retryState.deadline
    const attemptDeadline = attemptTimeoutMs === undefined ? undefined : now + attemptTimeoutMs

    if (attemptDeadline === undefined) return callDeadline
    if (callDeadline === undefined) return attemptDeadline

    return Math.min(attemptDeadline, callDeadline)
  }

  private operationInfo(): OperationInfo {
    return {
      callId: this.callId,
      attempts: this.retryState.attemptsMade,
      elapsedMs: this.deps.clock.nowMs() - this.startedAt,
    }
  }

  private asCallError(error: unknown): CallError {
    if (isCallError(error)) return error

    return new InternalConsistencyError("Call settled with an unexpected error", {
      callId: this.callId,
      attempts: this.retryState.attemptsMade,
      cause: error,
    })
  }

  private notify(hook: keyof RetryObserver<Res>, call: (o: RetryObserver<Res>) => void): void {
    const { observer } = this.init
    if (!observer) return

    try {
      call(observer)
    } catch (error) {
      this.logger.error("Retry observer threw", { hook, err: error })
    }
  }
}
