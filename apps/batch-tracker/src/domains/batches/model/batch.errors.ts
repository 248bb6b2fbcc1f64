import { BaseError, type ErrorContext } from "@batchkit/errors"
import type { LifecycleState, RetrievableState } from "./lifecycle.model"

type ErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/** The service could not be reached or asked us to slow down; worth another try. */
export class TransientError extends BaseError<"transient"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "transient", isRetryable: true, ...options })
  }
}

/** Unknown job id or a request the service will never accept. */
export class PermanentError extends BaseError<"permanent"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "permanent", isRetryable: false, ...options })
  }

  static unknownJob(jobId: string, cause?: unknown): PermanentError {
    return new PermanentError(`Job ${jobId} is unknown to the batch service`, {
      context: { jobId },
      ...(cause !== undefined && { cause }),
    })
  }

  static emptySubmission(): PermanentError {
    return new PermanentError("Cannot submit a batch without work items")
  }
}

/** The service reported something outside the lifecycle vocabulary or order. */
export class ProtocolError extends BaseError<"protocol"> {
  constructor(message: string, context: ErrorContext) {
    super(message, { code: "protocol", isRetryable: false, context })
  }

  static unknownStatus(rawStatus: string, previous: LifecycleState): ProtocolError {
    return new ProtocolError(`Unrecognized batch status "${rawStatus}"`, {
      rawStatus,
      previous,
    })
  }

  static illegalTransition(
    previous: LifecycleState,
    next: LifecycleState,
    rawStatus: string,
  ): ProtocolError {
    return new ProtocolError(`Illegal transition from ${previous} to ${next}`, {
      previous,
      next,
      rawStatus,
    })
  }
}

/** The job reached a terminal state but its result or failure detail could not be fetched. */
export class RetrievalError extends BaseError<"retrieval"> {
  constructor(message: string, options: ErrorOptions = {}) {
    super(message, { code: "retrieval", isRetryable: false, ...options })
  }

  static fetchFailed(jobId: string, state: RetrievableState, cause: unknown): RetrievalError {
    const what = state === "succeeded" ? "result" : "failure detail"

    return new RetrievalError(`Could not fetch the ${what} of job ${jobId}`, {
      context: { jobId, state },
      cause,
    })
  }

  static notRetrievable(jobId: string, state: LifecycleState): RetrievalError {
    return new RetrievalError(`Job ${jobId} is ${state}; nothing to retrieve`, {
      context: { jobId, state },
    })
  }
}

/** A persisted record could not be decoded. Tracking cannot continue safely. */
export class ProgressStoreCorruptedError extends BaseError<"progress_store_corrupted"> {
  constructor(key: string, cause: unknown) {
    super(`Progress record "${key}" could not be decoded`, {
      code: "progress_store_corrupted",
      isRetryable: false,
      isOperational: false,
      context: { key },
      cause,
    })
  }
}

export type TrackingError = PermanentError | ProtocolError | RetrievalError
