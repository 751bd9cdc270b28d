import type { AttemptContext } from "./attempt-context"
import type { StatusCode } from "./status-code"

/** Call-scoped headers and trailers. */
export type Metadata = Readonly<Record<string, string>>

/**
 * Receives one attempt's events. Bound to that attempt: events from an
 * attempt that has been superseded or whose call already settled are
 * dropped by the receiver.
 */
export interface AttemptListener<Res> {
  /** A response message. A unary call delivers exactly one before an OK terminal. */
  onMessage(message: Res): void

  /** The attempt has ended; authoritative. */
  onTerminal(status: StatusCode, trailers?: Metadata, details?: string): void
}

/** Handle on one in-flight attempt. */
export interface AttemptCall {
  /** Stops the attempt; no further listener events are expected. Idempotent. */
  cancel(reason?: string): void
}

/**
 * Performs one network attempt of a unary call.
 *
 * @remarks
 * Implementations report every outcome through `listener`, never by
 * throwing; a synchronous throw is treated as a permanent UNKNOWN failure.
 * When the attempt is no longer wanted the returned call is cancelled and
 * `context.signal` aborts; either is enough to stop the underlying call.
 */
export interface UnaryTransport<Req, Res> {
  submit(request: Req, context: AttemptContext, listener: AttemptListener<Res>): AttemptCall
}
