export type LogContext = {
  service: string
  module: string
  env: string

  /** clouds.yaml path being read. */
  file: string
}

export type LogEvent = {
  err: unknown
  /** Error code of a handled failure. */
  code: string
  count: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
