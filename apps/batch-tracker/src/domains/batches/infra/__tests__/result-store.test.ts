import { createMemoryKeyValueStore } from "@batchkit/kv"
import { beforeEach, describe, expect, it } from "vitest"
import { createSchemaCodec } from "../../../../lib/codec"
import { JobId, ResultRef } from "../../model/job.model"
import { storedResultSchema } from "../job-record.schema"
import { ResultStore, type StoredResult } from "../result-store"

describe("ResultStore", () => {
  const jobId = JobId.parse("batch_9")
  const ref = ResultRef.forJob(jobId)

  let store: ResultStore

  beforeEach(() => {
    store = new ResultStore({
      resultKv: createMemoryKeyValueStore({
        codec: createSchemaCodec<StoredResult>(storedResultSchema),
      }),
    })
  })

  it("saves, loads and deletes a result", async () => {
    const result: StoredResult = { jobId, body: '{"a":1}\n', fetchedAt: new Date(1_234) }

    await store.save(ref, result)
    expect(await store.load(ref)).toEqual(result)

    await store.delete(ref)
    expect(await store.load(ref)).toBeNull()
  })

  it("keys results by ref", () => {
    expect(ref).toBe("res_batch_9")
  })
})
