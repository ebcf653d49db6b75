export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { checkedAddMs, MAX_INSTANT_MS } from "./core/checked-add"
export type { Clock } from "./ports/clock"
export type * from "./ports/time"
