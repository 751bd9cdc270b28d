import type { CallHandle } from "../ports/call-handle"
import type { FutureOutcome, ListenableFuture } from "../ports/listenable-future"
import { CancelledError } from "./cancelled-error"
import { SettableFuture } from "./settable-future"

class BridgedCallHandle<T> implements CallHandle<T> {
  readonly signal: AbortSignal
  private promise: Promise<T> | undefined

  constructor(readonly source: ListenableFuture<T>) {
    const controller = new AbortController()
    this.signal = controller.signal

    source.addListener((outcome) => {
      if (outcome.state === "cancelled") controller.abort(outcome.error)
    })
  }

  cancel(reason?: string): boolean {
    return this.source.cancel(reason)
  }

  isDone(): boolean {
    return this.source.isDone()
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.toPromise().then(onfulfilled, onrejected)
  }

  catch<R = never>(
    onrejected?: ((reason: unknown) => R | PromiseLike<R>) | null,
  ): Promise<T | R> {
    return this.toPromise().catch(onrejected)
  }

  finally(onfinally?: (() => void) | null): Promise<T> {
    return this.toPromise().finally(onfinally)
  }

  // Built on first use so a handle nobody awaits never becomes an
  // unhandled rejection.
  private toPromise(): Promise<T> {
    this.promise ??= new Promise<T>((resolve, reject) => {
      this.source.addListener((outcome) => {
        if (outcome.state === "fulfilled") {
          resolve(outcome.value)
        } else {
          reject(outcome.error)
        }
      })
    })

    return this.promise
  }
}

/**
 * Caller-facing view of a transport future.
 *
 * Value and error pass through untouched (same error instance). Cancelling
 * the handle cancels `source`; `source` being cancelled rejects the handle
 * with its `CancelledError` and aborts `handle.signal`.
 */
export function toCallHandle<T>(source: ListenableFuture<T>): CallHandle<T> {
  return new BridgedCallHandle(source)
}

/**
 * Transport view of a caller handle; the inverse of {@link toCallHandle}.
 *
 * A handle made by {@link toCallHandle} gives back its source, so listeners
 * still run inline on the settling stack. Any other handle is observed
 * through `then`, one microtask late. There a rejection counts as
 * cancellation only when `handle.signal` is aborted.
 */
export function toListenableFuture<T>(handle: CallHandle<T>): ListenableFuture<T> {
  if (isBridged(handle)) return handle.source

  const future = new SettableFuture<T>()

  void handle.then(
    (value) => future.set(value),
    (error: unknown) => {
      if (!handle.signal.aborted) {
        future.setError(error)
      } else if (error instanceof CancelledError) {
        future.setCancelled(error)
      } else {
        future.cancel(error instanceof Error ? error.message : undefined)
      }
    },
  )

  future.addListener((outcome) => {
    if (outcome.state === "cancelled") handle.cancel(outcome.error.message)
  })

  return future
}

/**
 * Maps the value of `source` inline. A throw from `fn` rejects the derived
 * handle with that error; cancellation travels in both directions.
 */
export function transform<A, B>(
  source: CallHandle<A> | ListenableFuture<A>,
  fn: (value: A) => B,
): CallHandle<B> {
  const upstream = isCallHandle(source) ? toListenableFuture(source) : source
  const derived = new SettableFuture<B>()

  upstream.addListener((outcome: FutureOutcome<A>) => {
    switch (outcome.state) {
      case "fulfilled":
        try {
          derived.set(fn(outcome.value))
        } catch (error) {
          derived.setError(error)
        }
        break
      case "rejected":
        derived.setError(outcome.error)
        break
      case "cancelled":
        derived.setCancelled(outcome.error)
        break
    }
  })

  derived.addListener((outcome) => {
    if (outcome.state === "cancelled") upstream.cancel(outcome.error.message)
  })

  return toCallHandle(derived)
}

function isBridged<T>(handle: CallHandle<T>): handle is BridgedCallHandle<T> {
  return handle instanceof BridgedCallHandle
}

function isCallHandle<T>(
  value: CallHandle<T> | ListenableFuture<T>,
): value is CallHandle<T> {
  return "then" in value && "signal" in value
}
