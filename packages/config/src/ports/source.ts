/**
 * A source of raw configuration values.
 *
 * Sources only load: no validation, coercion or merging. They are applied
 * in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env:RETRY_" or "object:overrides" */
  readonly name: string

  /**
   * Fresh copy on every call. A key mapped to undefined counts as not
   * provided; zod coerces and validates downstream.
   */
  load(): Promise<Record<string, unknown>>
}
