export type LogContext = {
  service: string
  env: string
  module: string

  backend: string
  location: string

  operation: string
  sequence: number
  queueDepth: number
  outcome: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
