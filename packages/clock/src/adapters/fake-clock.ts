import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    if (ms < 0) {
      throw new RangeError(`FakeClock cannot move backwards (advance(${ms}))`)
    }

    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    if (ms < this.time) {
      throw new RangeError(`FakeClock cannot move backwards (set(${ms}) < ${this.time})`)
    }

    this.time = ms
  }
}
