import type { LogLevelName } from "./log-level"

/**
 * Policy for a Logger instance. Adapters decide how to honor it.
 */
export type LoggerOptions = {
  /** Minimum level to emit; "info" suppresses "trace" and "debug". */
  level: LogLevelName

  /**
   * Pretty-print for humans. Intended for local development; leave off where
   * structured JSON is ingested.
   */
  prettify?: boolean
}
