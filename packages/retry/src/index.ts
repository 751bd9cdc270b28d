export {
  type LoadRetryOptionsInput,
  loadRetryOptions,
  mapEnvToRetryOptions,
  RETRY_ENV_PREFIX,
} from "./config/load-retry-options"
export { type RetryEnvConfig, retryEnvSchema } from "./config/schema"
export {
  type CallError,
  CallFailedError,
  InternalConsistencyError,
  isCallError,
  RetriesExhaustedError,
} from "./core/call-errors"
export {
  createOutcomeClassifier,
  type Outcome,
  type OutcomeClassifier,
} from "./core/outcome-classifier"
export {
  resolveRetryOptions,
  toBackoffConfig,
  validateRetryOptions,
} from "./core/retry-options"
export {
  createRetryingCaller,
  type RetryingCaller,
  type RetryingCallerDeps,
} from "./core/retrying-caller"
export {
  RetryingUnaryOperation,
  type RetryingUnaryOperationDeps,
  type RetryingUnaryOperationInit,
} from "./core/retrying-unary-operation"
export type { AttemptContext, OperationInfo, RetryScheduledInfo } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type {
  OperationFailure,
  OperationResult,
  OperationState,
  OperationSuccess,
  RetryState,
} from "./ports/operation-result"
export {
  DEFAULT_RETRY_OPTIONS,
  DEFAULT_RETRYABLE_CODES,
  type RetryOptions,
} from "./ports/retry-options"
export {
  isStatusCode,
  isStatusName,
  StatusCode,
  type StatusName,
  statusName,
} from "./ports/status-code"
export type { AttemptCall, AttemptListener, Metadata, UnaryTransport } from "./ports/transport"
