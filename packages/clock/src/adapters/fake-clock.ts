import { setImmediate as nextTurn } from "node:timers/promises"
import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/**
 * Deterministic clock for tests.
 *
 * Time only moves through `advance()`, `set()` or `sleep()`. Sleeping advances
 * virtual time by the requested amount and yields one turn of the event loop,
 * so concurrent work can interleave without real delays.
 */
export class FakeClock implements Clock {
  private time: Milliseconds

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds): Promise<void> {
    if (ms > 0) this.advance(ms)
    await nextTurn()
  }
}
