import { CodecKeyValueStore, createMemoryKeyValueStore, MemoryBytesKeyValueStore } from "@batchkit/kv"
import { beforeEach, describe, expect, it } from "vitest"
import { createSchemaCodec } from "../../../../lib/codec"
import { ProgressStoreCorruptedError } from "../../model/batch.errors"
import { JobId, type JobRecord, SubmissionKey } from "../../model/job.model"
import { jobIndexSchema, jobRecordSchema, submissionBindingSchema } from "../job-record.schema"
import { type JobIndex, ProgressStore, type SubmissionBinding } from "../progress-store"

function record(id: string, overrides: Partial<JobRecord> = {}): JobRecord {
  return {
    jobId: JobId.parse(id),
    state: "submitted",
    createdAt: new Date(0),
    updatedAt: new Date(0),
    attempts: 0,
    history: [],
    ...overrides,
  }
}

describe("ProgressStore", () => {
  let jobBytes: MemoryBytesKeyValueStore
  let store: ProgressStore

  beforeEach(() => {
    jobBytes = new MemoryBytesKeyValueStore()

    store = new ProgressStore({
      jobKv: new CodecKeyValueStore({
        bytesStore: jobBytes,
        codec: createSchemaCodec<JobRecord>(jobRecordSchema),
      }),
      indexKv: createMemoryKeyValueStore({ codec: createSchemaCodec<JobIndex>(jobIndexSchema) }),
      submissionKv: createMemoryKeyValueStore({
        codec: createSchemaCodec<SubmissionBinding>(submissionBindingSchema),
      }),
    })
  })

  it("round-trips a record with its dates and history", async () => {
    const saved = record("batch_1", {
      state: "running",
      rawStatus: "in_progress",
      lastPolledAt: new Date(2_000),
      attempts: 2,
      progress: { total: 10, completed: 4, failed: 0 },
      history: [{ at: new Date(2_000), rawStatus: "in_progress", state: "running" }],
    })

    await store.save(saved)

    expect(await store.get(saved.jobId)).toEqual(saved)
  })

  it("returns null for unknown jobs", async () => {
    expect(await store.get(JobId.parse("batch_missing"))).toBeNull()
  })

  it("lists in-flight jobs in the order they were first saved", async () => {
    await store.save(record("batch_1"))
    await store.save(record("batch_2"))
    await store.save(record("batch_1", { state: "running" }))

    const ids = (await store.listInFlight()).map((r) => r.jobId)

    expect(ids).toEqual(["batch_1", "batch_2"])
  })

  it("drops jobs from the in-flight list once they are terminal", async () => {
    await store.save(record("batch_1"))
    await store.save(record("batch_2"))
    await store.save(record("batch_1", { state: "succeeded" }))

    expect((await store.listInFlight()).map((r) => r.jobId)).toEqual(["batch_2"])
    expect((await store.get(JobId.parse("batch_1")))?.state).toBe("succeeded")
  })

  it("keeps the index consistent under concurrent saves", async () => {
    await Promise.all(["batch_1", "batch_2", "batch_3"].map((id) => store.save(record(id))))

    expect((await store.listInFlight()).map((r) => r.jobId)).toEqual([
      "batch_1",
      "batch_2",
      "batch_3",
    ])
  })

  it("removes the record, its index entry and its submission binding", async () => {
    const submissionKey = SubmissionKey.parse("sub_1")
    const saved = record("batch_1", { submissionKey })

    await store.bindSubmission(submissionKey, saved.jobId, new Date(0))
    await store.save(saved)

    expect(await store.remove(saved.jobId)).toEqual(saved)
    expect(await store.get(saved.jobId)).toBeNull()
    expect(await store.listInFlight()).toEqual([])
    expect(await store.findBySubmissionKey(submissionKey)).toBeNull()
    expect(await store.remove(saved.jobId)).toBeNull()
  })

  describe("submission bindings", () => {
    const key = SubmissionKey.parse("sub_abc")
    const first = JobId.parse("batch_first")
    const second = JobId.parse("batch_second")

    it("binds an unused key", async () => {
      expect(await store.bindSubmission(key, first, new Date(0))).toEqual({ kind: "bound" })
      expect(await store.findBySubmissionKey(key)).toBe(first)
    })

    it("treats rebinding to the same job as bound", async () => {
      await store.bindSubmission(key, first, new Date(0))

      expect(await store.bindSubmission(key, first, new Date(1))).toEqual({ kind: "bound" })
    })

    it("keeps the first job when another one claims the key", async () => {
      await store.bindSubmission(key, first, new Date(0))

      expect(await store.bindSubmission(key, second, new Date(1))).toEqual({
        kind: "taken",
        jobId: first,
      })
      expect(await store.findBySubmissionKey(key)).toBe(first)
    })
  })

  describe("corrupted records", () => {
    it("reports bytes that are not JSON", async () => {
      await jobBytes.set("batch_1", new TextEncoder().encode("{not json"))

      const err = await store.get(JobId.parse("batch_1")).catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ProgressStoreCorruptedError)
      expect(err).toMatchObject({
        message: 'Progress record "batch_1" could not be decoded',
        isOperational: false,
      })
    })

    it("reports records of the wrong shape", async () => {
      await jobBytes.set("batch_1", new TextEncoder().encode('{"json":{"jobId":"batch_1"}}'))

      await expect(store.get(JobId.parse("batch_1"))).rejects.toBeInstanceOf(
        ProgressStoreCorruptedError,
      )
    })
  })
})
