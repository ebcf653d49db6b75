import { performance } from "node:perf_hooks"
import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Process-wide monotonic clock backed by `performance.now()`.
 *
 * Readings start near zero when the process starts.
 */
export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return performance.now()
  }
}
