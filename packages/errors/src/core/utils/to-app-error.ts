import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

/**
 * Convert any caught value to an AppError.
 *
 * BaseError passes through unchanged. Anything else is wrapped with
 * isOperational false: an unexpected throw is treated as a bug until proven
 * otherwise.
 *
 * @param fallbackCode - Code for values that are not already a BaseError. Default: "unknown"
 */
export function toAppError(
  err: unknown,
  fallbackCode: ErrorCode = "unknown",
  context?: ErrorContext,
): AppError {
  if (err instanceof BaseError) {
    return err
  }

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
      ...(context && { context }),
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? { ...context } : { ...context, value: err },
    isOperational: false,
  })
}
