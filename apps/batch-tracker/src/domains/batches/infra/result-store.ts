import { findInChain } from "@batchkit/errors"
import type { KeyValueStore } from "@batchkit/kv"
import { DecodeError } from "../../../lib/codec"
import { ProgressStoreCorruptedError } from "../model/batch.errors"
import type { JobId, ResultRef } from "../model/job.model"

export type StoredResult = {
  jobId: JobId
  body: string
  fetchedAt: Date
}

export type ResultStoreDeps = {
  resultKv: KeyValueStore<StoredResult>
}

/** Materialized result payloads, keyed by `ResultRef`. */
export class ResultStore {
  public constructor(private readonly deps: ResultStoreDeps) {}

  async save(ref: ResultRef, result: StoredResult): Promise<void> {
    await this.deps.resultKv.set(ref, result)
  }

  async load(ref: ResultRef): Promise<StoredResult | null> {
    try {
      const res = await this.deps.resultKv.get(ref)

      return res.kind === "found" ? res.value : null
    } catch (err) {
      if (findInChain(err, DecodeError)) throw new ProgressStoreCorruptedError(ref, err)
      throw err
    }
  }

  async delete(ref: ResultRef): Promise<void> {
    await this.deps.resultKv.delete(ref)
  }
}
