import { isAppError } from "@batchkit/errors"
import {
  PermanentError,
  ProtocolError,
  TransientError,
} from "../model/batch.errors"
import type { BatchServiceClient, RawStatus } from "../model/batch-service-client.model"
import type { JobId } from "../model/job.model"

export type PollError = TransientError | PermanentError | ProtocolError

export type StatusPollerDeps = {
  client: BatchServiceClient
}

/** One status query per call; every failure comes out classified. */
export class StatusPoller {
  public constructor(private readonly deps: StatusPollerDeps) {}

  async poll(jobId: JobId): Promise<RawStatus> {
    try {
      return await this.deps.client.getStatus(jobId)
    } catch (err) {
      throw classifyPollError(jobId, err)
    }
  }
}

/**
 * Keeps errors that already carry a tracking classification. Other app
 * errors are classified by `isRetryable`; anything else is assumed to be a
 * transport failure.
 */
export function classifyPollError(jobId: JobId, err: unknown): PollError {
  if (
    err instanceof TransientError ||
    err instanceof PermanentError ||
    err instanceof ProtocolError
  ) {
    return err
  }

  const message = err instanceof Error ? err.message : String(err)

  if (isAppError(err) && !err.isRetryable) {
    return new PermanentError(`Status query for job ${jobId} failed: ${message}`, {
      context: { jobId },
      cause: err,
    })
  }

  return new TransientError(`Status query for job ${jobId} failed: ${message}`, {
    context: { jobId },
    cause: err,
  })
}
