import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with this are loaded, with the prefix stripped */
  prefix?: string
  /** Defaults to `process.env` */
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as raw strings. A blank variable counts as unset,
 * so `RETRY_MAX_ATTEMPTS=` leaves the schema default in place.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || value.trim() === "") continue
      if (!key.startsWith(this.prefix)) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
