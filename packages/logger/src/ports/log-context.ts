export type LogContext = {
  requestId: string

  method: string
  path: string

  /** Codec operation being logged, e.g. "decode" or "encode". */
  op: string
  /** FlatText key the entry is about, when there is one. */
  key: string

  status: number

  service: string
  module: string
  env: string
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
