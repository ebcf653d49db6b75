/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_CAPACITY: z.coerce.number().int().positive() }),
 *   sources: [new EnvSource({ prefix: "APP_" })],
 * })
 *
 * config.value.CACHE_CAPACITY  // 512
 * config.explain("CACHE_CAPACITY") // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of every source that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema. Useful for
   * spotting typos such as `CACHE_CAPACTY`.
   */
  unknownKeys(): string[]
}
