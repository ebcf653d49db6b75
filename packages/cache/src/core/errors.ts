import { BaseError, type ErrorContext } from "@cachet/errors"

/**
 * Misuse of a store: a capacity, size limit or lifespan that cannot be
 * honoured, or an arena index that does not name a live cell.
 */
export class CacheUsageError extends BaseError<"cache_usage"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "cache_usage", context, isOperational: false })
  }
}

/**
 * `now + ttl` cannot be represented as an instant. Raised before the store
 * is touched.
 */
export class TimeBoundsError extends BaseError<"cache_time_bounds"> {
  constructor(nowMs: number, ttlMs: number) {
    super(`Expiry overflows the clock range (now=${nowMs}ms, ttl=${ttlMs}ms)`, {
      code: "cache_time_bounds",
      context: { nowMs, ttlMs },
    })
  }
}
