import type { CallError } from "../core/call-errors"
import type { AttemptContext, OperationInfo, RetryScheduledInfo } from "./attempt-context"

/**
 * Lifecycle hooks for observability (metrics, tracing).
 *
 * @remarks
 * Hooks run inline on the transport or timer callback that triggered them
 * and must not throw; a throw is logged and otherwise ignored so that the
 * call still settles.
 */
export interface RetryObserver<T> {
  onAttempt?(ctx: AttemptContext): void
  onRetryScheduled?(info: RetryScheduledInfo): void
  onSuccess?(value: T, info: OperationInfo): void
  onFailure?(error: CallError, info: OperationInfo): void
}
