import { BaseError, type ErrorContext } from "@tether/errors"

/** The one error a cancelled future or handle settles with. */
export class CancelledError extends BaseError<"cancelled"> {
  constructor(reason = "Cancelled", context?: ErrorContext) {
    super(reason, { code: "cancelled", ...(context && { context }) })
  }
}
