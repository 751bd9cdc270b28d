import type {
  FutureListener,
  FutureOutcome,
  FutureState,
  ListenableFuture,
} from "../ports/listenable-future"
import { CancelledError } from "./cancelled-error"

/**
 * Write-once {@link ListenableFuture}.
 *
 * `set`, `setError` and `cancel` race freely; the first one settles the
 * future and every later call returns false without touching the outcome.
 */
export class SettableFuture<T> implements ListenableFuture<T> {
  private outcome: FutureOutcome<T> | undefined
  private listeners: FutureListener<T>[] = []

  get state(): FutureState {
    return this.outcome?.state ?? "pending"
  }

  isDone(): boolean {
    return this.outcome !== undefined
  }

  isCancelled(): boolean {
    return this.outcome?.state === "cancelled"
  }

  /** The settled outcome, or undefined while pending. */
  result(): FutureOutcome<T> | undefined {
    return this.outcome
  }

  set(value: T): boolean {
    return this.settle({ state: "fulfilled", value })
  }

  setError(error: unknown): boolean {
    return this.settle({ state: "rejected", error })
  }

  cancel(reason?: string): boolean {
    if (this.outcome) return false

    return this.settle({ state: "cancelled", error: new CancelledError(reason) })
  }

  /** Cancels with an existing error, so one cancellation keeps one identity across bridges. */
  setCancelled(error: CancelledError): boolean {
    return this.settle({ state: "cancelled", error })
  }

  addListener(listener: FutureListener<T>): void {
    if (this.outcome) {
      notify(listener, this.outcome)
      return
    }

    this.listeners.push(listener)
  }

  private settle(outcome: FutureOutcome<T>): boolean {
    if (this.outcome) return false

    this.outcome = outcome
    const listeners = this.listeners
    this.listeners = []

    for (const listener of listeners) {
      notify(listener, outcome)
    }

    return true
  }
}

/**
 * A throwing listener must neither stop the others nor unwind into whoever
 * settled the future; its error is rethrown on a fresh microtask instead.
 */
function notify<T>(listener: FutureListener<T>, outcome: FutureOutcome<T>): void {
  try {
    listener(outcome)
  } catch (error) {
    queueMicrotask(() => {
      throw error
    })
  }
}
