import { DEFAULT_RETRYABLE_CODES } from "../ports/retry-options"
import { StatusCode } from "../ports/status-code"

export type Outcome = "success" | "retryable" | "permanent"

export interface OutcomeClassifier {
  classify(status: StatusCode): Outcome
}

/**
 * OK is always success; `retryableCodes` are retryable; everything else,
 * including codes outside the known set, is permanent.
 */
export function createOutcomeClassifier(
  retryableCodes: Iterable<StatusCode> = DEFAULT_RETRYABLE_CODES,
): OutcomeClassifier {
  const retryable = new Set<number>(retryableCodes)

  return {
    classify(status: StatusCode): Outcome {
      if (status === StatusCode.OK) return "success"

      return retryable.has(status) ? "retryable" : "permanent"
    },
  }
}
