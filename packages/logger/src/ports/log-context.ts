/**
 * Well-known fields bound to log entries emitted while resolving configuration.
 */
export type LogContext = {
  component: string
  directory: string
  algorithm: string
  identity: readonly string[]

  stem: string
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
