import { findInChain } from "@batchkit/errors"
import type { KeyValueStore, KeyValueStoreConditional } from "@batchkit/kv"
import { DecodeError } from "../../../lib/codec"
import { ProgressStoreCorruptedError } from "../model/batch.errors"
import type { JobId, JobRecord, SubmissionKey } from "../model/job.model"
import { isTerminal } from "../model/lifecycle.model"

export type JobIndex = {
  jobIds: JobId[]
}

export type SubmissionBinding = {
  jobId: JobId
  boundAt: Date
}

export type BindResult = { kind: "bound" } | { kind: "taken"; jobId: JobId }

export type ProgressStoreDeps = {
  jobKv: KeyValueStore<JobRecord>
  indexKv: KeyValueStore<JobIndex>
  submissionKv: KeyValueStoreConditional<SubmissionBinding>
}

const INDEX_KEY = "in-flight"

/**
 * Persisted tracking progress: one record per job, an index of the jobs that
 * are still in flight and the submission-key bindings.
 *
 * @remarks
 * Record writes and index updates are not atomic. Index updates are
 * serialized within this instance only; the index is rebuildable from the
 * records, which stay authoritative.
 */
export class ProgressStore {
  private indexQueue: Promise<unknown> = Promise.resolve()

  public constructor(private readonly deps: ProgressStoreDeps) {}

  async get(jobId: JobId): Promise<JobRecord | null> {
    const key = this.keyForJob(jobId)
    const res = await this.read(key, () => this.deps.jobKv.get(key))

    return res.kind === "found" ? res.value : null
  }

  /** Writes the record, then keeps the in-flight index in step with its state. */
  async save(record: JobRecord): Promise<void> {
    await this.deps.jobKv.set(this.keyForJob(record.jobId), record)

    if (!isResumable(record)) {
      await this.updateIndex((ids) => ids.filter((id) => id !== record.jobId))
    } else {
      await this.updateIndex((ids) => (ids.includes(record.jobId) ? ids : [...ids, record.jobId]))
    }
  }

  /** Drops the record, its index entry and its submission binding. */
  async remove(jobId: JobId): Promise<JobRecord | null> {
    const record = await this.get(jobId)

    await this.deps.jobKv.delete(this.keyForJob(jobId))
    await this.updateIndex((ids) => ids.filter((id) => id !== jobId))

    if (record?.submissionKey) {
      await this.deps.submissionKv.delete(this.keyForSubmission(record.submissionKey))
    }

    return record
  }

  /**
   * Records of jobs not yet terminal, in the order they were first saved.
   *
   * @remarks
   * Linear in the size of the index. Index entries whose record is gone or
   * was abandoned are skipped.
   */
  async listInFlight(): Promise<JobRecord[]> {
    const index = await this.loadIndex()
    if (index.jobIds.length === 0) return []

    const entries = await this.read(INDEX_KEY, () =>
      this.deps.jobKv.getMany(index.jobIds.map((id) => this.keyForJob(id))),
    )

    const records: JobRecord[] = []

    for (const res of entries.values()) {
      if (res.kind === "found" && isResumable(res.value)) records.push(res.value)
    }

    return records
  }

  async findBySubmissionKey(key: SubmissionKey): Promise<JobId | null> {
    const storeKey = this.keyForSubmission(key)
    const res = await this.read(storeKey, () => this.deps.submissionKv.get(storeKey))

    return res.kind === "found" ? res.value.jobId : null
  }

  /** Binds `key` to `jobId` unless it is already bound, in which case the existing job wins. */
  async bindSubmission(key: SubmissionKey, jobId: JobId, at: Date): Promise<BindResult> {
    const storeKey = this.keyForSubmission(key)
    const write = await this.deps.submissionKv.setIfNotExists(storeKey, { jobId, boundAt: at })

    if (write.kind === "written") return { kind: "bound" }

    const existing = await this.findBySubmissionKey(key)

    return existing === null || existing === jobId
      ? { kind: "bound" }
      : { kind: "taken", jobId: existing }
  }

  private async loadIndex(): Promise<JobIndex> {
    const res = await this.read(INDEX_KEY, () => this.deps.indexKv.get(INDEX_KEY))

    return res.kind === "found" ? res.value : { jobIds: [] }
  }

  private updateIndex(change: (ids: JobId[]) => JobId[]): Promise<void> {
    const run = this.indexQueue.then(async () => {
      const current = await this.loadIndex()
      const next = change(current.jobIds)

      if (next === current.jobIds || sameIds(next, current.jobIds)) return

      await this.deps.indexKv.set(INDEX_KEY, { jobIds: next })
    })

    // keep the queue alive after a failed update; the caller still sees the failure
    this.indexQueue = run.catch(() => undefined)

    return run
  }

  private async read<T>(key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (findInChain(err, DecodeError)) throw new ProgressStoreCorruptedError(key, err)
      throw err
    }
  }

  private keyForJob(jobId: JobId): string {
    return jobId
  }

  private keyForSubmission(key: SubmissionKey): string {
    return key
  }
}

function isResumable(record: JobRecord): boolean {
  return !isTerminal(record.state) && record.abandonedAt === undefined
}

function sameIds(a: readonly JobId[], b: readonly JobId[]): boolean {
  return a.length === b.length && a.every((id, i) => id === b[i])
}
