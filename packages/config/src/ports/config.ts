/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ maxAttempts: z.coerce.number().int().default(5) }),
 *   sources: [new EnvSource({ prefix: "RETRY_" })],
 * })
 *
 * config.value.maxAttempts    // 7
 * config.explain("maxAttempts") // "env:RETRY_"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or "default" for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed a value, "default" included. */
  sourcesUsed(): string[]

  /** Keys some source supplied that the schema does not define. Usually typos. */
  unknownKeys(): string[]
}
