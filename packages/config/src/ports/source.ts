/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "object:overrides". */
  readonly name: string

  /**
   * An `undefined` value means "not provided" and never overrides an
   * earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
