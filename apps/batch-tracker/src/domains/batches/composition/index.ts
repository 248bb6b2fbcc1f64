import type { Clock } from "@batchkit/clock"
import { createBackoff, exponential } from "@batchkit/backoff"
import { MemorySingleflight } from "@batchkit/singleflight"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createSchemaCodec } from "../../../lib/codec"
import {
  jobIndexSchema,
  jobRecordSchema,
  storedResultSchema,
  submissionBindingSchema,
} from "../infra/job-record.schema"
import { OpenAiBatchClient } from "../infra/openai-batch-client"
import { type JobIndex, ProgressStore, type SubmissionBinding } from "../infra/progress-store"
import { ResultStore, type StoredResult } from "../infra/result-store"
import type { BatchServiceClient } from "../model/batch-service-client.model"
import type { JobRecord } from "../model/job.model"
import type { TrackOutcome } from "../model/outcome.model"
import { BatchService } from "../services/batch-service"
import { BatchSubmitter } from "../services/batch-submitter"
import { PollSchedule } from "../services/poll-schedule"
import { ProgressTracker } from "../services/progress-tracker"
import { ResultRetriever } from "../services/result-retriever"
import { StatusPoller } from "../services/status-poller"
import { createStore } from "./stores"

export type BatchServices = {
  clock: Clock
  client: BatchServiceClient
  progressStore: ProgressStore
  tracker: ProgressTracker
  batchService: BatchService
}

export type BatchServiceOverrides = {
  client?: BatchServiceClient
}

export function createBatchServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  overrides: BatchServiceOverrides = {},
): BatchServices {
  const client =
    overrides.client ??
    new OpenAiBatchClient(infra.openai, {
      endpoint: config.openai.endpoint,
      completionWindow: config.openai.completionWindow,
      maxErrorLines: config.openai.maxErrorLines,
    })

  const progressStore = new ProgressStore({
    jobKv: createStore(config, infra, "jobs", createSchemaCodec<JobRecord>(jobRecordSchema)),
    indexKv: createStore(config, infra, "index", createSchemaCodec<JobIndex>(jobIndexSchema)),
    submissionKv: createStore(
      config,
      infra,
      "submissions",
      createSchemaCodec<SubmissionBinding>(submissionBindingSchema),
    ),
  })

  const resultStore = new ResultStore({
    resultKv: createStore(
      config,
      infra,
      "results",
      createSchemaCodec<StoredResult>(storedResultSchema),
    ),
  })

  const { poll, retrieve } = config.batches

  const retriever = new ResultRetriever(
    { ...core, client, resultStore },
    {
      retry: {
        maxAttempts: retrieve.maxAttempts,
        delay: createBackoff({
          delay: exponential({ base: { milliseconds: retrieve.baseMs }, factor: 2 }),
          min: { milliseconds: retrieve.baseMs },
          max: { milliseconds: retrieve.maxMs },
        }),
      },
    },
  )

  const tracker = new ProgressTracker(
    {
      clock: core.clock,
      logger: core.logger,
      poller: new StatusPoller({ client }),
      retriever,
      progressStore,
      schedule: new PollSchedule({
        baseMs: poll.baseMs,
        factor: poll.factor,
        maxMs: poll.maxMs,
        jitter: poll.jitter,
        maxAttempts: poll.maxAttempts,
        maxWaitMs: poll.maxWaitMs,
      }),
      singleflight: new MemorySingleflight<TrackOutcome>(),
    },
    { historyLimit: config.batches.historyLimit },
  )

  const submitter = new BatchSubmitter({
    clock: core.clock,
    logger: core.logger,
    client,
    progressStore,
  })

  const batchService = new BatchService({
    logger: core.logger,
    client,
    submitter,
    tracker,
    progressStore,
  })

  return { clock: core.clock, client, progressStore, tracker, batchService }
}
