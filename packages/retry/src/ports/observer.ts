import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks, typically used for logging.
 *
 * Hooks run inline; one that throws propagates out of the executor, even from
 * `tryExecute`.
 */
export interface RetryObserver {
  onAttempt?(ctx: AttemptContext): void
  onRetry?(error: unknown, info: RetryAttemptInfo): void
  onSuccess?(ctx: AttemptContext): void
  onExhausted?(error: unknown, info: RetryAttemptInfo): void
  onAborted?(ctx: AttemptContext): void
}
