import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "@batchkit/clock"
import { NullLogger } from "@batchkit/logger"
import { createRetryExecutor } from "@batchkit/retry"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock } from "vitest-mock-extended"
import { PermanentError, TransientError } from "../../domains/batches/model/batch.errors"
import type { BatchServiceClient } from "../../domains/batches/model/batch-service-client.model"
import { JobId } from "../../domains/batches/model/job.model"
import type { Mock } from "../../tests/mock"
import { rawStatus } from "../../tests/batch-harness"
import { ExitCode } from "../exit-codes"
import { main } from "../main"
import { usage } from "../usage-error"

describe("main", () => {
  const jobId = JobId.parse("batch_1")

  let dir: string
  let client: Mock<BatchServiceClient>
  let stdout: string[]
  let stderr: string[]

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "batch-tracker-cli-"))
    client = mock<BatchServiceClient>()
    stdout = []
    stderr = []
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  function run(argv: string[], env: NodeJS.ProcessEnv = {}): Promise<ExitCode> {
    const clock = new FakeClock()

    return main({
      argv,
      env: { OPENAI_API_KEY: "test-key", STORE_DRIVER: "memory", ...env },
      signal: new AbortController().signal,
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line),
      cwd: dir,
      services: {
        core: { logger: new NullLogger(), clock, retryExecutor: createRetryExecutor({ clock }) },
        batches: { client },
      },
    })
  }

  const output = (): unknown[] => stdout.map((line) => JSON.parse(line))

  it("prints usage for help", async () => {
    expect(await run(["--help"])).toBe(ExitCode.Ok)
    expect(stdout).toEqual([usage])
  })

  it("prints the problem and usage for a bad command line", async () => {
    expect(await run(["launch"])).toBe(ExitCode.Fatal)
    expect(stderr).toEqual([`Unknown command "launch"\n\n${usage}`])
    expect(client.submit).not.toHaveBeenCalled()
  })

  it("fails on invalid configuration", async () => {
    expect(await run(["resume"], { OPENAI_API_KEY: "" })).toBe(ExitCode.Fatal)
    expect(stderr[0]?.startsWith("Configuration validation failed:\n")).toBe(true)
  })

  it("submits, tracks and prints both results", async () => {
    const input = path.join(dir, "work.jsonl")
    await fs.writeFile(input, '{"custom_id":"a"}\n{"custom_id":"b"}\n')

    client.submit.mockResolvedValue(jobId)
    client.getStatus.mockResolvedValue(rawStatus("completed", { outputAvailable: true }))
    client.getResult.mockResolvedValue('{"custom_id":"a"}\n')

    const code = await run(["submit", "-i", input, "-k", "sub_t1", "--track"])

    expect(code).toBe(ExitCode.Ok)
    expect(client.submit).toHaveBeenCalledWith([{ custom_id: "a" }, { custom_id: "b" }])
    expect(output()).toEqual([
      { kind: "submitted", jobId: "batch_1", submissionKey: "sub_t1" },
      {
        kind: "succeeded",
        jobId: "batch_1",
        resultRef: "res_batch_1",
        payload: '{"custom_id":"a"}\n',
      },
    ])
  })

  it("submits one job per chunk and tracks them all", async () => {
    const input = path.join(dir, "work.jsonl")
    await fs.writeFile(input, '{"custom_id":"a"}\n{"custom_id":"b"}\n{"custom_id":"c"}\n')

    client.submit
      .mockResolvedValueOnce(JobId.parse("batch_c1"))
      .mockResolvedValueOnce(JobId.parse("batch_c2"))
    client.getStatus.mockResolvedValue(rawStatus("cancelled"))

    const code = await run(["submit", "-i", input, "-k", "sub_t2", "--chunk-size", "2", "--track"])

    expect(code).toBe(ExitCode.JobDidNotSucceed)
    expect(client.submit.mock.calls).toEqual([
      [[{ custom_id: "a" }, { custom_id: "b" }]],
      [[{ custom_id: "c" }]],
    ])
    expect(output()).toEqual([
      { kind: "submitted", jobId: "batch_c1", submissionKey: "sub_t2-1" },
      { kind: "submitted", jobId: "batch_c2", submissionKey: "sub_t2-2" },
      { kind: "cancelled", jobId: "batch_c1", origin: "remote" },
      { kind: "cancelled", jobId: "batch_c2", origin: "remote" },
    ])
  })

  it("refuses an input file without work items", async () => {
    const input = path.join(dir, "empty.jsonl")
    await fs.writeFile(input, "\n\n")

    expect(await run(["submit", "-i", input])).toBe(ExitCode.Fatal)
    expect(stderr).toEqual([`${input} has no work items`])
    expect(client.submit).not.toHaveBeenCalled()
  })

  it("reports an unreadable input file as a usage problem", async () => {
    const code = await run(["submit", "-i", path.join(dir, "missing.jsonl")])

    expect(code).toBe(ExitCode.Fatal)
    expect(stderr[0]?.startsWith(`Cannot read ${path.join(dir, "missing.jsonl")}: `)).toBe(true)
  })

  it("exits with the tracking error code when a job is unknown", async () => {
    client.getStatus.mockRejectedValue(PermanentError.unknownJob(jobId))

    expect(await run(["track", "batch_1"])).toBe(ExitCode.TrackingError)
    expect(output()).toMatchObject([
      {
        kind: "tracking_error",
        jobId: "batch_1",
        reason: "permanent",
        error: { message: "Job batch_1 is unknown to the batch service" },
      },
    ])
  })

  it("exits with the job code when a job failed", async () => {
    client.getStatus.mockResolvedValue(rawStatus("expired"))
    client.getFailure.mockResolvedValue({
      reason: "expired",
      message: "Batch expired before it completed",
      errors: [],
    })

    expect(await run(["track", "batch_1"])).toBe(ExitCode.JobDidNotSucceed)
    expect(output()).toEqual([
      {
        kind: "failed",
        jobId: "batch_1",
        detail: { reason: "expired", message: "Batch expired before it completed", errors: [] },
      },
    ])
  })

  it("reports jobs it has no record of", async () => {
    expect(await run(["status", "batch_9"])).toBe(ExitCode.Fatal)
    expect(output()).toEqual([{ kind: "not_found", jobId: "batch_9" }])
  })

  it("confirms a cancellation request", async () => {
    client.cancel.mockResolvedValue(undefined)

    expect(await run(["cancel", "batch_1"])).toBe(ExitCode.Ok)
    expect(output()).toEqual([{ kind: "cancel_requested", jobId: "batch_1" }])
  })

  it("maps service failures to the tracking error code", async () => {
    client.cancel.mockRejectedValue(new TransientError("Service unavailable"))

    expect(await run(["cancel", "batch_1"])).toBe(ExitCode.TrackingError)
    expect(stderr).toEqual(["Service unavailable"])
  })

  it("reports nothing to forget for an unknown job", async () => {
    expect(await run(["forget", "batch_1"])).toBe(ExitCode.Ok)
    expect(output()).toEqual([{ kind: "not_found", jobId: "batch_1" }])
  })
})
