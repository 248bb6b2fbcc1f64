import type { SerializedError } from "@batchkit/errors"
import { z } from "zod/mini"
import { JobId, ResultRef, SubmissionKey } from "../model/job.model"
import { lifecycleStates } from "../model/lifecycle.model"

const count = z.int().check(z.nonnegative())

const requestCountsSchema = z.object({
  total: count,
  completed: count,
  failed: count,
})

const failureDetailSchema = z.object({
  reason: z.string(),
  message: z.string(),
  errors: z.array(
    z.object({
      message: z.string(),
      code: z.optional(z.string()),
      line: z.optional(z.int()),
    }),
  ),
})

const serializedErrorSchema = z.custom<SerializedError>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string" &&
    "message" in value &&
    typeof value.message === "string",
)

export const jobRecordSchema = z.object({
  jobId: z.custom<JobId>(JobId.is),
  state: z.enum(lifecycleStates),
  rawStatus: z.optional(z.string()),
  createdAt: z.date(),
  updatedAt: z.date(),
  lastPolledAt: z.optional(z.date()),
  attempts: count,
  progress: z.optional(requestCountsSchema),
  submissionKey: z.optional(z.custom<SubmissionKey>(SubmissionKey.is)),
  resultRef: z.optional(z.custom<ResultRef>(ResultRef.is)),
  errorDetail: z.optional(failureDetailSchema),
  history: z.array(
    z.object({
      at: z.date(),
      rawStatus: z.string(),
      state: z.enum(lifecycleStates),
      progress: z.optional(requestCountsSchema),
    }),
  ),
  lastError: z.optional(serializedErrorSchema),
  abandonedAt: z.optional(z.date()),
})

export const jobIndexSchema = z.object({
  jobIds: z.array(z.custom<JobId>(JobId.is)),
})

export const submissionBindingSchema = z.object({
  jobId: z.custom<JobId>(JobId.is),
  boundAt: z.date(),
})

export const storedResultSchema = z.object({
  jobId: z.custom<JobId>(JobId.is),
  body: z.string(),
  fetchedAt: z.date(),
})
