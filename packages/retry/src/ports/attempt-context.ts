import type { Milliseconds, UnixMs } from "@batchkit/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** attempt + 1 */
  attemptsSoFar: number

  startedAt: UnixMs

  /** Time since the first attempt started */
  elapsedMs: Milliseconds

  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** Wait before the next attempt, null when there is none */
  nextDelayMs: Milliseconds | null

  isLastAttempt: boolean
}
