import { z } from "zod"
import { DEFAULT_RETRYABLE_CODES } from "../ports/retry-options"
import { isStatusName, StatusCode } from "../ports/status-code"

const statusList = z
  .union([z.string(), z.array(z.string())])
  .transform((raw, ctx) => {
    const names = typeof raw === "string" ? raw.split(",") : raw
    const codes: StatusCode[] = []

    for (const name of names.map((n) => n.trim().toUpperCase()).filter(Boolean)) {
      if (!isStatusName(name)) {
        ctx.issues.push({ code: "custom", message: `Unknown status code "${name}"`, input: raw })
        return z.NEVER
      }
      if (name === "OK") {
        ctx.issues.push({ code: "custom", message: "OK cannot be retryable", input: raw })
        return z.NEVER
      }
      codes.push(StatusCode[name])
    }

    return codes
  })

/** Raw keys as they appear in the environment, minus the `RETRY_` prefix. */
export const retryEnvSchema = z
  .object({
    INITIAL_DELAY_MS: z.coerce.number().min(0).default(100),
    MAX_DELAY_MS: z.coerce.number().min(0).default(60_000),
    MULTIPLIER: z.coerce.number().min(1).default(2),
    MAX_ATTEMPTS: z.coerce.number().int().min(1).default(5),
    JITTER_FRACTION: z.coerce.number().min(0).max(1).default(0.2),
    TOTAL_TIMEOUT_MS: z.coerce.number().positive().optional(),
    ATTEMPT_TIMEOUT_MS: z.coerce.number().positive().optional(),
    RETRYABLE_CODES: statusList.default([...DEFAULT_RETRYABLE_CODES]),
  })
  .refine((env) => env.MAX_DELAY_MS >= env.INITIAL_DELAY_MS, {
    message: "MAX_DELAY_MS must be >= INITIAL_DELAY_MS",
    path: ["MAX_DELAY_MS"],
  })

export type RetryEnvConfig = z.infer<typeof retryEnvSchema>
