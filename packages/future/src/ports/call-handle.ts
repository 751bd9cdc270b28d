/**
 * Caller-facing result of a remote call: awaitable like a promise, and
 * cancellable.
 *
 * @remarks
 * Cancelling rejects the handle with `CancelledError` and aborts `signal`,
 * so code downstream can forward cancellation the way `fetch` and friends
 * expect it.
 */
export interface CallHandle<T> extends PromiseLike<T> {
  /** Aborted when, and only when, the call is cancelled. */
  readonly signal: AbortSignal

  /** Returns false when the call had already settled. */
  cancel(reason?: string): boolean

  isDone(): boolean

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2>

  catch<R = never>(
    onrejected?: ((reason: unknown) => R | PromiseLike<R>) | null,
  ): Promise<T | R>

  finally(onfinally?: (() => void) | null): Promise<T>
}
