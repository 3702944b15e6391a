export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the single-flight lock emitting the entry. */
  lock: string
  /** Name of the state machine (query or mutation) emitting the entry. */
  machine: string

  /** Per-lock submission sequence number. */
  taskId: number
  /** Per-machine run sequence number. */
  runId: number
  status: string
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
