import type { RandomSource } from "@tether/backoff"
import type { Clock } from "@tether/clock"
import type { CallHandle } from "@tether/future"
import type { Logger } from "@tether/logger"
import type { RetryObserver } from "../ports/observer"
import type { RetryOptions } from "../ports/retry-options"
import type { Metadata, UnaryTransport } from "../ports/transport"
import { resolveRetryOptions } from "./retry-options"
import { RetryingUnaryOperation } from "./retrying-unary-operation"

export type RetryingCallerDeps<Req, Res> = {
  transport: UnaryTransport<Req, Res>
  clock: Clock
  /** Merged over the defaults */
  options?: Partial<RetryOptions>
  /** Operation name for logs. Default: "call" */
  name?: string
  logger?: Logger
  random?: RandomSource
  observer?: RetryObserver<Res>
  generateCallId?: () => string
}

export interface RetryingCaller<Req, Res> {
  readonly options: RetryOptions
  call(request: Req, metadata?: Metadata): CallHandle<Res>
}

/**
 * Binds a transport and a retry policy once; every `call` runs its own
 * {@link RetryingUnaryOperation}.
 */
export function createRetryingCaller<Req, Res>(
  deps: RetryingCallerDeps<Req, Res>,
): RetryingCaller<Req, Res> {
  const options = resolveRetryOptions(deps.options)
  const { transport, clock, logger, random, observer, generateCallId } = deps
  const name = deps.name ?? "call"

  return {
    options,

    call(request: Req, metadata?: Metadata): CallHandle<Res> {
      const operation = new RetryingUnaryOperation(
        {
          name,
          request,
          transport,
          options,
          ...(metadata && { metadata }),
          ...(observer && { observer }),
        },
        {
          clock,
          ...(logger && { logger }),
          ...(random && { random }),
          ...(generateCallId && { generateCallId }),
        },
      )

      return operation.start()
    },
  }
}
