import { ConfigValidationError } from "@batchkit/config"
import { describe, expect, it } from "vitest"
import {
  PermanentError,
  ProgressStoreCorruptedError,
  TransientError,
} from "../../domains/batches/model/batch.errors"
import { JobId, ResultRef } from "../../domains/batches/model/job.model"
import type { TrackOutcome } from "../../domains/batches/model/outcome.model"
import { ExitCode, exitCodeForError, exitCodeForOutcome, exitCodeForOutcomes } from "../exit-codes"
import { UsageError } from "../usage-error"

const jobId = JobId.parse("batch_1")

const succeeded: TrackOutcome = {
  kind: "succeeded",
  jobId,
  resultRef: ResultRef.forJob(jobId),
  payload: "",
}
const failed: TrackOutcome = {
  kind: "failed",
  jobId,
  detail: { reason: "failed", message: "no", errors: [] },
}
const cancelled: TrackOutcome = { kind: "cancelled", jobId, origin: "remote" }
const trackingError: TrackOutcome = {
  kind: "tracking_error",
  jobId,
  reason: "permanent",
  error: new PermanentError("gone").toJSON(),
}

describe("exit codes", () => {
  it("maps each outcome kind", () => {
    expect(exitCodeForOutcome(succeeded)).toBe(ExitCode.Ok)
    expect(exitCodeForOutcome(failed)).toBe(ExitCode.JobDidNotSucceed)
    expect(exitCodeForOutcome(cancelled)).toBe(ExitCode.JobDidNotSucceed)
    expect(
      exitCodeForOutcome({
        kind: "timed_out",
        jobId,
        lastState: "running",
        attempts: 3,
        elapsedMs: 9,
      }),
    ).toBe(ExitCode.JobDidNotSucceed)
    expect(exitCodeForOutcome(trackingError)).toBe(ExitCode.TrackingError)
  })

  it("picks the most severe code across outcomes", () => {
    expect(exitCodeForOutcomes([])).toBe(ExitCode.Ok)
    expect(exitCodeForOutcomes([succeeded, succeeded])).toBe(ExitCode.Ok)
    expect(exitCodeForOutcomes([succeeded, cancelled])).toBe(ExitCode.JobDidNotSucceed)
    expect(exitCodeForOutcomes([trackingError, failed, succeeded])).toBe(ExitCode.TrackingError)
  })

  it("treats bad input and configuration as fatal", () => {
    expect(exitCodeForError(new UsageError("bad"))).toBe(ExitCode.Fatal)
    expect(exitCodeForError(new ConfigValidationError("report", ["env"]))).toBe(ExitCode.Fatal)
  })

  it("treats operational app errors as tracking errors", () => {
    expect(exitCodeForError(new TransientError("later"))).toBe(ExitCode.TrackingError)
    expect(exitCodeForError(new PermanentError("gone"))).toBe(ExitCode.TrackingError)
  })

  it("treats bugs and corrupted state as fatal", () => {
    expect(exitCodeForError(new TypeError("undefined is not a function"))).toBe(ExitCode.Fatal)
    expect(exitCodeForError(new ProgressStoreCorruptedError("batch_1", null))).toBe(ExitCode.Fatal)
  })
})
