import type { AttemptContext } from "./attempt-context"
import type { RetryConfig } from "./retry-config"
import type { RetryResult } from "./retry-result"

export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>

/**
 * Runs a function until it succeeds, the predicate gives up, attempts or the
 * elapsed budget run out, or the signal aborts.
 *
 * `execute()` throws the failure's error; `tryExecute()` returns it. Both
 * throw `RangeError` for an invalid config.
 */
export interface IRetryExecutor {
  execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T>
  tryExecute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<RetryResult<T>>
}
