/**
 * Well-known fields a client call may bind to its logger.
 */
export type LogContext = {
  requestId: string

  /** Remote service the client talks to, e.g. "queue" */
  service: string
  /** Operation name on that service, e.g. "SendMessage" */
  operation: string
  attempt: number

  method: string
  url: string
  status: number
  durationMs: number

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
 * Fields added to (or overriding) an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
