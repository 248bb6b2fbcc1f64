import type { Logger } from "@batchkit/logger"
import type { ProgressStore } from "../infra/progress-store"
import type { BatchServiceClient } from "../model/batch-service-client.model"
import type { JobId, JobRecord } from "../model/job.model"
import type { SubmitResult, TrackOutcome } from "../model/outcome.model"
import type { BatchSubmitter, ChunkedSubmitInput, SubmitInput } from "./batch-submitter"
import type { ProgressTracker, TrackOptions } from "./progress-tracker"

export type BatchServiceDeps = {
  logger: Logger
  client: BatchServiceClient
  submitter: BatchSubmitter
  tracker: ProgressTracker
  progressStore: ProgressStore
}

/** Entry point for callers: submit, follow and manage batch jobs. */
export class BatchService {
  private readonly logger: Logger

  public constructor(private readonly deps: BatchServiceDeps) {
    this.logger = deps.logger.child({ module: "batch-service" })
  }

  submit(input: SubmitInput): Promise<SubmitResult> {
    return this.deps.submitter.submit(input)
  }

  /** One job per `chunkSize` items; see {@link BatchSubmitter.submitChunked}. */
  submitChunked(input: ChunkedSubmitInput): Promise<SubmitResult[]> {
    return this.deps.submitter.submitChunked(input)
  }

  track(jobId: JobId, options?: TrackOptions): Promise<TrackOutcome> {
    return this.deps.tracker.track(jobId, options)
  }

  /**
   * Tracks every job concurrently; outcomes come back in input order.
   *
   * @remarks
   * If tracking one job rejects, the others are cancelled locally and the
   * first rejection is rethrown once they have all stopped.
   */
  async trackMany(jobIds: readonly JobId[], options: TrackOptions = {}): Promise<TrackOutcome[]> {
    const controller = new AbortController()
    const forward = () => controller.abort(options.signal?.reason)

    if (options.signal?.aborted) forward()
    else options.signal?.addEventListener("abort", forward, { once: true })

    try {
      const settled = await Promise.allSettled(
        jobIds.map((jobId) =>
          this.deps.tracker.track(jobId, { signal: controller.signal }).catch((err: unknown) => {
            controller.abort(err)
            throw err
          }),
        ),
      )

      const outcomes: TrackOutcome[] = []

      for (const result of settled) {
        if (result.status === "rejected") {
          this.logger.error("Tracking failed, siblings cancelled", { err: result.reason })
          throw result.reason
        }

        outcomes.push(result.value)
      }

      return outcomes
    } finally {
      options.signal?.removeEventListener("abort", forward)
    }
  }

  /**
   * Asks the service to cancel the job. The local record follows once
   * tracking observes the remote `cancelled` status.
   */
  async cancel(jobId: JobId): Promise<void> {
    await this.deps.client.cancel(jobId)
    this.logger.info("Cancellation requested", { jobId })
  }

  listInFlight(): Promise<JobRecord[]> {
    return this.deps.progressStore.listInFlight()
  }

  /** Picks tracking back up for every job left in flight, e.g. after a restart. */
  async resumeInFlight(options?: TrackOptions): Promise<TrackOutcome[]> {
    const records = await this.deps.progressStore.listInFlight()
    this.logger.info("Resuming in-flight jobs", { count: records.length })

    return this.trackMany(
      records.map((record) => record.jobId),
      options,
    )
  }

  /** The stored record, without contacting the service. */
  status(jobId: JobId): Promise<JobRecord | null> {
    return this.deps.progressStore.get(jobId)
  }

  forget(jobId: JobId): Promise<boolean> {
    return this.deps.tracker.forget(jobId)
  }
}
