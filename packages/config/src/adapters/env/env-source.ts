import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with `prefix` are read, with the prefix
   * stripped: `APP_CACHE_POLICY` becomes `CACHE_POLICY`.
   */
  prefix?: string

  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Reads settings from environment variables. Named `env`, or `env:<prefix>`
 * when a prefix is set, so `explain()` tells the two apart.
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
      if (value === undefined || !key.startsWith(this.prefix)) continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
