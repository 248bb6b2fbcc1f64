import type { FailureDetail, JobId, RequestCounts } from "./job.model"

/** One unit of work. Opaque: it is only ever serialized, one per JSONL line. */
export type WorkItem = Record<string, unknown>

export type RawStatus = {
  status: string
  requestCounts?: RequestCounts
  outputAvailable: boolean
  errorAvailable: boolean
}

/**
 * The remote batch-processing service.
 *
 * Implementations report transport problems as `TransientError` and unknown
 * or rejected requests as `PermanentError`.
 */
export interface BatchServiceClient {
  submit(items: readonly WorkItem[]): Promise<JobId>
  getStatus(jobId: JobId): Promise<RawStatus>

  /** JSONL payload; empty when the job produced no output. */
  getResult(jobId: JobId): Promise<string>

  getFailure(jobId: JobId): Promise<FailureDetail>
  cancel(jobId: JobId): Promise<void>
}
