import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FakeClock } from "@batchkit/clock"
import { NullLogger } from "@batchkit/logger"
import { createRetryExecutor } from "@batchkit/retry"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock, mockDeep } from "vitest-mock-extended"
import { type AppConfig, loadAppConfig } from "../../../../app/config"
import type { CoreServices } from "../../../../app/services/core"
import { createJsonCodec } from "../../../../lib/codec"
import { rawStatus } from "../../../../tests/batch-harness"
import type { Mock } from "../../../../tests/mock"
import type { OpenAiBatchApi } from "../../infra/openai-batch-client"
import type { BatchServiceClient } from "../../model/batch-service-client.model"
import { JobId } from "../../model/job.model"
import { createBatchServices } from ".."
import { createStore } from "../stores"

describe("createBatchServices", () => {
  const jobId = JobId.parse("batch_1")

  let dir: string
  let config: AppConfig
  let core: CoreServices
  let client: Mock<BatchServiceClient>

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "batch-tracker-store-"))
    config = await loadAppConfig(
      { OPENAI_API_KEY: "test-key", STORE_DRIVER: "file", STORE_DIR: dir },
      undefined,
      dir,
    )

    const clock = new FakeClock()
    core = { clock, logger: new NullLogger(), retryExecutor: createRetryExecutor({ clock }) }
    client = mock<BatchServiceClient>()
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  const open = () =>
    createBatchServices(config, core, { openai: mockDeep<OpenAiBatchApi>() }, { client })

  it("resumes jobs submitted by an earlier process from the file store", async () => {
    client.submit.mockResolvedValue(jobId)
    await open().batchService.submit({ items: [{ custom_id: "a" }] })

    const restarted = open()
    expect((await restarted.batchService.listInFlight()).map((r) => r.jobId)).toEqual([jobId])

    client.getStatus.mockResolvedValue(rawStatus("completed", { outputAvailable: true }))
    client.getResult.mockResolvedValue("result\n")

    await expect(restarted.batchService.resumeInFlight()).resolves.toMatchObject([
      { kind: "succeeded", jobId, payload: "result\n" },
    ])

    const later = open()
    expect(await later.batchService.listInFlight()).toEqual([])
    await expect(later.batchService.track(jobId)).resolves.toMatchObject({
      kind: "succeeded",
      payload: "result\n",
    })
    expect(client.getStatus).toHaveBeenCalledTimes(1)
    expect(client.getResult).toHaveBeenCalledTimes(1)
  })

  it("keeps each keyspace in its own directory", async () => {
    client.submit.mockResolvedValue(jobId)
    await open().batchService.submit({ items: [{ custom_id: "a" }] })

    expect((await fs.readdir(dir)).sort()).toEqual(["index", "jobs", "submissions"])
  })

  it("needs a Redis client for the redis driver", () => {
    const redisConfig: AppConfig = { ...config, store: { ...config.store, driver: "redis" } }

    expect(() =>
      createStore(redisConfig, { openai: mockDeep<OpenAiBatchApi>() }, "jobs", createJsonCodec()),
    ).toThrow("STORE_DRIVER=redis needs a Redis client")
  })
})
