export type LogContext = {
  service: string
  module: string
  env: string

  /** Store class emitting the record, e.g. "LruCache". */
  store: string
  /** Eviction policy name, e.g. "timed-lru". */
  policy: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
