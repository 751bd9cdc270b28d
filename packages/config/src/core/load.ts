import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Default: every environment variable */
  sources?: readonly ConfigSource[]
  /** Prefixes the validation error, e.g. "Retry configuration" */
  label?: string
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  label = "Configuration",
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance[key] = source.name
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new Error(`${label} validation failed:\n${z.prettifyError(result.error)}`)
  }

  const supplied = new Set(Object.keys(merged))

  for (const key of Object.keys(result.data)) {
    if (!supplied.has(key)) provenance[key] = "default"
  }
  for (const key of supplied) {
    if (!Object.hasOwn(result.data, key)) delete provenance[key]
  }

  return new Config<T>(result.data, provenance, supplied)
}
