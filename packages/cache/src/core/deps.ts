import { type Clock, SystemClock } from "@cachet/clock"
import { createNullLogger, type Logger } from "@cachet/logger"
import type { CacheDeps } from "../ports/cache-deps"

/**
 * Deps whose logger is already scoped to a store. A store composed inside
 * another is handed these and logs under the outer store's bindings.
 */
export class ScopedDeps implements CacheDeps {
  constructor(
    readonly clock: Clock,
    readonly logger: Logger,
  ) {}
}

/**
 * Fills in the system clock and a silent logger, and scopes the logger to
 * `store`. Already scoped deps pass through unchanged.
 */
export function resolveDeps(deps: Partial<CacheDeps>, store: string): ScopedDeps {
  if (deps instanceof ScopedDeps) return deps

  return new ScopedDeps(
    deps.clock ?? new SystemClock(),
    (deps.logger ?? createNullLogger()).child({ module: "cache", store }),
  )
}
