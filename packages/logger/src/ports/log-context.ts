/** Well-known fields bound to a logger through `child()`. */
export type LogContext = {
  service: string
  env: string
  module: string
  command: string

  jobId: string
  submissionKey: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
