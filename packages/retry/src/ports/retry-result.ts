import type { Milliseconds } from "@batchkit/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult = {
  success: false

  /** The last error thrown, or an AbortError / timeout error when none was. */
  error: unknown
  attempts: number
  elapsedMs: Milliseconds
  aborted: boolean
  timedOut: boolean
}

export type RetryResult<T> = SuccessfulRetryResult<T> | FailedRetryResult
