import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Reads the process's monotonic high-resolution timer. */
export class SystemClock implements Clock {
  nowMs(): Milliseconds {
    return performance.now()
  }
}
