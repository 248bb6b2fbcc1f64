import {
  type Brand,
  nanoid,
  prefixed,
  prefixedIdType,
  stringIdType,
  withGenerator,
} from "@batchkit/id"
import type { SerializedError } from "@batchkit/errors"
import type { LifecycleState } from "./lifecycle.model"

/** Assigned by the remote service; opaque to us. */
export type JobId = Brand<string, "JobId">
export const JobId = stringIdType<JobId>("JobId")

/** Local idempotency key for a submission. */
export type SubmissionKey = Brand<string, "SubmissionKey">
export const SubmissionKey = withGenerator(
  prefixedIdType<SubmissionKey>("SubmissionKey", "sub"),
  prefixed<SubmissionKey>("sub", nanoid()),
)

/** Key of a materialized result in the result store. */
export type ResultRef = Brand<string, "ResultRef">
const ResultRefType = prefixedIdType<ResultRef>("ResultRef", "res")
export const ResultRef = {
  ...ResultRefType,

  /** One ref per job, so re-fetching a result overwrites rather than duplicates. */
  forJob: (jobId: JobId): ResultRef => ResultRefType.parse(`res_${jobId}`),
}

export type RequestCounts = {
  total: number
  completed: number
  failed: number
}

export type FailureEntry = {
  message: string
  code?: string
  line?: number
}

export type FailureDetail = {
  /** Short machine-readable cause, e.g. "failed", "expired", "validation_failed". */
  reason: string
  message: string
  errors: FailureEntry[]
}

export type StatusObservation = {
  at: Date
  rawStatus: string
  state: LifecycleState
  progress?: RequestCounts
}

export interface JobRecord {
  jobId: JobId
  state: LifecycleState

  /** Last raw status string observed */
  rawStatus?: string

  createdAt: Date
  updatedAt: Date

  /** Last successful status observation */
  lastPolledAt?: Date

  /** Poll attempts made, transient failures included */
  attempts: number

  progress?: RequestCounts
  submissionKey?: SubmissionKey

  /** Only once the job succeeded and its payload was stored */
  resultRef?: ResultRef

  /** Only once the job failed and its detail was fetched */
  errorDetail?: FailureDetail

  /** Bounded, newest last */
  history: StatusObservation[]

  /** Most recent tracking problem, for operators */
  lastError?: SerializedError

  /**
   * Set when tracking stopped on an error the service will not get over.
   * Abandoned jobs are left out of the in-flight index until tracked again.
   */
  abandonedAt?: Date
}
