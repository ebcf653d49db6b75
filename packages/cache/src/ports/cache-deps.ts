import type { Clock } from "@cachet/clock"
import type { Logger } from "@cachet/logger"

export type CacheDeps = {
  clock: Clock
  logger: Logger
}
