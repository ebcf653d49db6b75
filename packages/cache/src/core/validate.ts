import type { Milliseconds } from "@cachet/clock"
import { CacheUsageError } from "./errors"

export function assertPositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new CacheUsageError(`${name} must be a positive integer, got ${value}`, {
      [name]: value,
    })
  }

  return value
}

export function assertLifespan(lifespanMs: Milliseconds): Milliseconds {
  if (!Number.isFinite(lifespanMs) || lifespanMs < 0) {
    throw new CacheUsageError(
      `lifespan must be a finite, non-negative number of ms, got ${lifespanMs}`,
      { lifespanMs },
    )
  }

  return lifespanMs
}
