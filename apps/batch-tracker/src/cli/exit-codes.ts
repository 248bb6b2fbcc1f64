import { ConfigValidationError } from "@batchkit/config"
import { isAppError } from "@batchkit/errors"
import type { TrackOutcome } from "../domains/batches/model/outcome.model"
import { UsageError } from "./usage-error"

export const ExitCode = {
  Ok: 0,
  Fatal: 1,
  JobDidNotSucceed: 2,
  TrackingError: 3,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export function exitCodeForOutcome(outcome: TrackOutcome): ExitCode {
  switch (outcome.kind) {
    case "succeeded":
      return ExitCode.Ok
    case "failed":
    case "cancelled":
    case "timed_out":
      return ExitCode.JobDidNotSucceed
    case "tracking_error":
      return ExitCode.TrackingError
  }
}

/** The most severe code among several outcomes; `Ok` when there are none. */
export function exitCodeForOutcomes(outcomes: readonly TrackOutcome[]): ExitCode {
  return outcomes.map(exitCodeForOutcome).reduce<ExitCode>(moreSevere, ExitCode.Ok)
}

/**
 * Operational failures of the service or the store are tracking errors.
 * Bad input, bad configuration and anything unexpected are fatal.
 */
export function exitCodeForError(err: unknown): ExitCode {
  if (err instanceof UsageError || err instanceof ConfigValidationError) return ExitCode.Fatal
  if (isAppError(err) && err.isOperational) return ExitCode.TrackingError

  return ExitCode.Fatal
}

const severity: Record<ExitCode, number> = {
  [ExitCode.Ok]: 0,
  [ExitCode.JobDidNotSucceed]: 1,
  [ExitCode.TrackingError]: 2,
  [ExitCode.Fatal]: 3,
}

function moreSevere(a: ExitCode, b: ExitCode): ExitCode {
  return severity[b] > severity[a] ? b : a
}
