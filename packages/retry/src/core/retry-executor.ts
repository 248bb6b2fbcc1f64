import type { Clock, Milliseconds, UnixMs } from "@batchkit/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor, RetryFn } from "../ports/retry-executor"
import type { FailedRetryResult, RetryResult } from "../ports/retry-result"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<T> {
    const result = await this.run(fn, config)

    if (result.success) return result.value

    throw result.error
  }

  async tryExecute<T>(fn: RetryFn<T>, config: RetryConfig): Promise<RetryResult<T>> {
    return this.run(fn, config)
  }

  private async run<T>(fn: RetryFn<T>, config: RetryConfig): Promise<RetryResult<T>> {
    validateConfig(config)

    const { maxAttempts, delay, shouldRetry, observer, signal, maxElapsedMs } = config
    const startedAt = this.deps.clock.nowMs()
    let lastError: { value: unknown } | undefined

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)

      if (maxElapsedMs !== undefined && ctx.elapsedMs >= maxElapsedMs) {
        const error = lastError
          ? lastError.value
          : new Error(`Retry budget of ${maxElapsedMs}ms spent before the first attempt`)

        observer?.onExhausted?.(error, { ...ctx, nextDelayMs: null, isLastAttempt: true })
        return failed(error, attempt, ctx.elapsedMs, { timedOut: true })
      }

      if (signal?.aborted) {
        observer?.onAborted?.(ctx)
        return failed(abortError(), attempt, ctx.elapsedMs, { aborted: true })
      }

      observer?.onAttempt?.(ctx)

      try {
        const value = await fn(ctx)

        observer?.onSuccess?.(ctx)
        return { success: true, value, attempts: attempt + 1, elapsedMs: this.elapsedSince(startedAt) }
      } catch (error) {
        lastError = { value: error }

        const isLastAttempt = attempt === maxAttempts - 1
        const retry = !isLastAttempt && (shouldRetry?.(error, ctx) ?? true)

        if (!retry) {
          const info: RetryAttemptInfo = { ...ctx, nextDelayMs: null, isLastAttempt: true }

          observer?.onExhausted?.(error, info)
          return failed(error, attempt + 1, this.elapsedSince(startedAt), {})
        }

        const nextDelayMs = this.clampDelay(
          delay.getDelay(attempt).milliseconds,
          maxElapsedMs,
          startedAt,
        )

        observer?.onRetry?.(error, { ...ctx, nextDelayMs, isLastAttempt })

        if (nextDelayMs > 0) await this.deps.clock.sleep(nextDelayMs, signal)
      }
    }

    throw new Error("Retry loop ended without a result")
  }

  private buildContext(attempt: number, startedAt: UnixMs, signal?: AbortSignal): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.elapsedSince(startedAt),
      ...(signal && { signal }),
    }
  }

  private elapsedSince(startedAt: UnixMs): Milliseconds {
    return this.deps.clock.nowMs() - startedAt
  }

  private clampDelay(
    delayMs: Milliseconds,
    maxElapsedMs: Milliseconds | undefined,
    startedAt: UnixMs,
  ): Milliseconds {
    if (maxElapsedMs === undefined) return delayMs

    const remaining = maxElapsedMs - this.elapsedSince(startedAt)
    return Math.min(delayMs, Math.max(0, remaining))
  }
}

function validateConfig(config: RetryConfig): void {
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`)
  }

  const { maxElapsedMs } = config
  if (maxElapsedMs !== undefined && (!Number.isFinite(maxElapsedMs) || maxElapsedMs < 0)) {
    throw new RangeError(`maxElapsedMs must be a finite number >= 0 (got ${maxElapsedMs})`)
  }
}

function abortError(): DOMException {
  return new DOMException("Aborted", "AbortError")
}

function failed(
  error: unknown,
  attempts: number,
  elapsedMs: Milliseconds,
  flags: { aborted?: boolean; timedOut?: boolean },
): FailedRetryResult {
  return {
    success: false,
    error,
    attempts,
    elapsedMs,
    aborted: flags.aborted ?? false,
    timedOut: flags.timedOut ?? false,
  }
}
