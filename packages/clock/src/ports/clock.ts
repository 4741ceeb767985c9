import type { Milliseconds } from "./time"

/**
 * Time source for measuring how long work takes. Only the difference between
 * two readings is meaningful; the origin is up to the implementation.
 */
export interface Clock {
  nowMs(): Milliseconds
}
