export type { DelayPolicy } from "@batchkit/backoff"
export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type { RetryPredicate } from "./ports/predicates"
export type { RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor, RetryFn } from "./ports/retry-executor"
export type {
  FailedRetryResult,
  RetryResult,
  SuccessfulRetryResult,
} from "./ports/retry-result"
