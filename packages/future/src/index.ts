export { toCallHandle, toListenableFuture, transform } from "./core/async-result-bridge"
export { CancelledError } from "./core/cancelled-error"
export { SettableFuture } from "./core/settable-future"
export type { CallHandle } from "./ports/call-handle"
export type {
  FutureListener,
  FutureOutcome,
  FutureState,
  ListenableFuture,
} from "./ports/listenable-future"
