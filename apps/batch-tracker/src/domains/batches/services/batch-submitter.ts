import type { Clock } from "@batchkit/clock"
import type { Logger } from "@batchkit/logger"
import type { ProgressStore } from "../infra/progress-store"
import { PermanentError } from "../model/batch.errors"
import type { BatchServiceClient, WorkItem } from "../model/batch-service-client.model"
import { type JobId, type JobRecord, SubmissionKey } from "../model/job.model"
import type { SubmitResult } from "../model/outcome.model"

export type BatchSubmitterDeps = {
  clock: Clock
  logger: Logger
  client: BatchServiceClient
  progressStore: ProgressStore
}

export type SubmitInput = {
  items: readonly WorkItem[]

  /** Reusing a key returns the job it was first bound to. Generated when absent. */
  submissionKey?: SubmissionKey
}

export type ChunkedSubmitInput = SubmitInput & {
  /** Work items per batch job */
  chunkSize: number
}

/**
 * Uploads work items as a new batch job and records it for tracking.
 *
 * @remarks
 * Never retries: a repeated upload would start a second remote job. Callers
 * that may run twice pass a stable `submissionKey` instead.
 */
export class BatchSubmitter {
  private readonly logger: Logger

  public constructor(private readonly deps: BatchSubmitterDeps) {
    this.logger = deps.logger.child({ module: "batch-submitter" })
  }

  async submit(input: SubmitInput): Promise<SubmitResult> {
    if (input.items.length === 0) throw PermanentError.emptySubmission()

    const submissionKey = input.submissionKey ?? SubmissionKey.generate()
    const logger = this.logger.child({ submissionKey })

    const known = await this.deps.progressStore.findBySubmissionKey(submissionKey)
    if (known !== null) return this.alreadySubmitted(known, submissionKey, logger)

    const jobId = await this.deps.client.submit(input.items)
    const now = this.deps.clock.now()

    const bind = await this.deps.progressStore.bindSubmission(submissionKey, jobId, now)

    if (bind.kind === "taken") {
      // another process submitted under the same key while we were uploading
      logger.warn("Submission key was bound concurrently; keeping the first job", {
        jobId,
        boundJobId: bind.jobId,
      })

      return this.alreadySubmitted(bind.jobId, submissionKey, logger)
    }

    const record: JobRecord = {
      jobId,
      state: "submitted",
      createdAt: now,
      updatedAt: now,
      attempts: 0,
      submissionKey,
      history: [],
    }

    await this.deps.progressStore.save(record)
    logger.info("Batch submitted", { jobId, items: input.items.length })

    return { kind: "submitted", jobId, submissionKey }
  }

  /**
   * Splits the items into consecutive chunks and submits one job per chunk,
   * in order. Chunk `n` (from 1) is keyed `<submissionKey>-<n>`, so a rerun
   * with the same key and chunk size skips the chunks already submitted.
   */
  async submitChunked(input: ChunkedSubmitInput): Promise<SubmitResult[]> {
    const { items, chunkSize } = input

    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`chunkSize must be an integer >= 1 (got ${chunkSize})`)
    }
    if (items.length === 0) throw PermanentError.emptySubmission()

    const baseKey = input.submissionKey ?? SubmissionKey.generate()
    const results: SubmitResult[] = []

    for (let start = 0; start < items.length; start += chunkSize) {
      const n = start / chunkSize + 1

      results.push(
        await this.submit({
          items: items.slice(start, start + chunkSize),
          submissionKey: SubmissionKey.parse(`${baseKey}-${n}`),
        }),
      )
    }

    this.logger.info("Chunked submission done", {
      submissionKey: baseKey,
      chunks: results.length,
      items: items.length,
    })

    return results
  }

  private async alreadySubmitted(
    jobId: JobId,
    submissionKey: SubmissionKey,
    logger: Logger,
  ): Promise<SubmitResult> {
    const record = await this.deps.progressStore.get(jobId)
    const state = record?.state ?? "submitted"

    logger.info("Submission key already used", { jobId, state })

    return { kind: "already_submitted", jobId, submissionKey, state }
  }
}
