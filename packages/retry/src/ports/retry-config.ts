import type { DelayPolicy } from "@batchkit/backoff"
import type { Milliseconds } from "@batchkit/clock"
import type { RetryObserver } from "./observer"
import type { RetryPredicate } from "./predicates"

/**
 * `maxAttempts` counts tries, not retries: 1 means no retry at all.
 *
 * Without `shouldRetry`, every error is retried until attempts run out.
 */
export interface RetryConfig {
  maxAttempts: number
  delay: DelayPolicy
  shouldRetry?: RetryPredicate
  observer?: RetryObserver
  signal?: AbortSignal

  /**
   * Budget for all attempts and waits together. Once spent, no new attempt
   * starts, and a wait that would overrun it is shortened.
   */
  maxElapsedMs?: Milliseconds
}
