import type { CancelledError } from "../core/cancelled-error"

export type FutureState = "pending" | "fulfilled" | "rejected" | "cancelled"

export type FutureOutcome<T> =
  | { state: "fulfilled"; value: T }
  | { state: "rejected"; error: unknown }
  | { state: "cancelled"; error: CancelledError }

export type FutureListener<T> = (outcome: FutureOutcome<T>) => void

/**
 * Callback-style asynchronous result, the shape transports speak.
 *
 * @remarks
 * - Settles at most once; the first of fulfil / reject / cancel wins.
 * - Every listener runs exactly once, inline on the stack that settles the
 *   future, or immediately when added after settlement. Listeners that need
 *   real work done should hop to their own task.
 */
export interface ListenableFuture<T> {
  readonly state: FutureState

  isDone(): boolean
  isCancelled(): boolean

  addListener(listener: FutureListener<T>): void

  /** Returns false when the future had already settled. */
  cancel(reason?: string): boolean
}
