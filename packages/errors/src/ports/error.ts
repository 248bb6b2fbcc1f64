export type ErrorCode = Lowercase<string>

/** Structured data attached to an error (ids, inputs, raw values). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when trying the same operation again may succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (timeouts, unknown ids, bad input);
   * `false` for invariant violations and corrupted state, after which the
   * process should not carry on.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape used in logs, persisted records and CLI output. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  isRetryable: boolean
  cause?: SerializedError
  stack?: string
}>
