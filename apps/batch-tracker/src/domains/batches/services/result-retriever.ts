import type { Clock } from "@batchkit/clock"
import { isAppError } from "@batchkit/errors"
import type { Logger } from "@batchkit/logger"
import type { IRetryExecutor, RetryConfig } from "@batchkit/retry"
import type { ResultStore, StoredResult } from "../infra/result-store"
import { RetrievalError } from "../model/batch.errors"
import type { BatchServiceClient } from "../model/batch-service-client.model"
import { type JobId, ResultRef } from "../model/job.model"
import { isRetrievable, type RetrievableState } from "../model/lifecycle.model"
import type { RetrievalOutcome } from "../model/outcome.model"

export type ResultRetrieverDeps = {
  clock: Clock
  logger: Logger
  client: BatchServiceClient
  resultStore: ResultStore
  retryExecutor: IRetryExecutor
}

export type ResultRetrieverOptions = {
  /** Backoff for re-fetching after transient download errors */
  retry: Pick<RetryConfig, "maxAttempts" | "delay" | "maxElapsedMs">
}

export class ResultRetriever {
  private readonly logger: Logger

  public constructor(
    private readonly deps: ResultRetrieverDeps,
    private readonly opts: ResultRetrieverOptions,
  ) {
    this.logger = deps.logger.child({ module: "result-retriever" })
  }

  /**
   * Fetches what a terminal job left behind: the result payload of a
   * succeeded job, which is also stored under its `ResultRef`, or the failure
   * detail of a failed one.
   *
   * Throws `RetrievalError` when the fetch keeps failing, and for any state
   * other than `succeeded` or `failed`.
   */
  async retrieve(jobId: JobId, state: RetrievableState): Promise<RetrievalOutcome> {
    if (!isRetrievable(state)) throw RetrievalError.notRetrievable(jobId, state)

    switch (state) {
      case "succeeded": {
        const payload = await this.fetch(jobId, state, () => this.deps.client.getResult(jobId))
        const resultRef = ResultRef.forJob(jobId)

        await this.store(jobId, resultRef, payload)
        this.logger.info("Result stored", { jobId, resultRef, bytes: payload.length })

        return { kind: "succeeded", resultRef, payload }
      }
      case "failed": {
        const detail = await this.fetch(jobId, state, () => this.deps.client.getFailure(jobId))
        this.logger.info("Failure detail fetched", { jobId, reason: detail.reason })

        return { kind: "failed", detail }
      }
    }
  }

  async load(resultRef: ResultRef): Promise<StoredResult | null> {
    return this.deps.resultStore.load(resultRef)
  }

  async forget(resultRef: ResultRef): Promise<void> {
    await this.deps.resultStore.delete(resultRef)
  }

  private async fetch<T>(
    jobId: JobId,
    state: RetrievableState,
    fn: () => Promise<T>,
  ): Promise<T> {
    const result = await this.deps.retryExecutor.tryExecute(fn, {
      ...this.opts.retry,
      shouldRetry: (err) => !isAppError(err) || err.isRetryable,
      observer: {
        onRetry: (err, info) => {
          this.logger.warn("Retrying retrieval after transient error", {
            jobId,
            state,
            attempt: info.attemptsSoFar,
            nextDelayMs: info.nextDelayMs,
            err,
          })
        },
      },
    })

    if (result.success) return result.value

    throw RetrievalError.fetchFailed(jobId, state, result.error)
  }

  private async store(jobId: JobId, resultRef: ResultRef, body: string): Promise<void> {
    try {
      await this.deps.resultStore.save(resultRef, {
        jobId,
        body,
        fetchedAt: this.deps.clock.now(),
      })
    } catch (err) {
      throw new RetrievalError(`Could not store the result of job ${jobId}`, {
        context: { jobId, resultRef },
        cause: err,
      })
    }
  }
}
