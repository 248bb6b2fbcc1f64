import type { SerializedError } from "@batchkit/errors"
import type { FailureDetail, JobId, ResultRef, SubmissionKey } from "./job.model"
import type { LifecycleState } from "./lifecycle.model"

export type RetrievalOutcome =
  | { kind: "succeeded"; resultRef: ResultRef; payload: string }
  | { kind: "failed"; detail: FailureDetail }

export type TrackingErrorReason = "permanent" | "protocol" | "retrieval"

export type TrackOutcome =
  | { kind: "succeeded"; jobId: JobId; resultRef: ResultRef; payload: string }
  | { kind: "failed"; jobId: JobId; detail: FailureDetail }
  | { kind: "cancelled"; jobId: JobId; origin: "remote" | "local" }
  | {
      kind: "timed_out"
      jobId: JobId
      lastState: LifecycleState
      attempts: number
      elapsedMs: number
    }
  | {
      kind: "tracking_error"
      jobId: JobId
      reason: TrackingErrorReason
      error: SerializedError
    }

export type TrackOutcomeKind = TrackOutcome["kind"]

export type SubmitResult =
  | { kind: "submitted"; jobId: JobId; submissionKey: SubmissionKey }
  | {
      kind: "already_submitted"
      jobId: JobId
      submissionKey: SubmissionKey
      state: LifecycleState
    }
