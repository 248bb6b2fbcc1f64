import type { BytesKeyValueStoreConditional } from "../../ports/bytes-kv-store"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KeyspacePrefix, KvKey } from "../../ports/kv-key"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"
import type { RedisBytesClient } from "./redis-client"

export type RedisKvStoreOptions = {
  /**
   * Maximum number of keys sent in one command by the bulk methods. Larger
   * requests are split into batches of this size.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

export class RedisBytesKeyValueStore implements BytesKeyValueStoreConditional {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisKvStoreOptions,
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be an integer >= 1 (got ${opts.batchSize})`)
    }
  }

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    return this.createKvResult(await this.client.get(this.fullKey(key)))
  }

  async set(key: KvKey, value: Uint8Array): Promise<void> {
    await this.client.set(this.fullKey(key), this.toBuffer(value))
  }

  async setIfNotExists(key: KvKey, value: Uint8Array): Promise<KvWriteResult> {
    const reply = await this.client.set(this.fullKey(key), this.toBuffer(value), { NX: true })

    return reply === "OK" ? { kind: "written" } : { kind: "skipped" }
  }

  async delete(key: KvKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async has(key: KvKey): Promise<boolean> {
    return (await this.client.exists(this.fullKey(key))) === 1
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const batch of this.chunks(keys)) {
      const buffers = await this.client.mGet(batch.map((k) => this.fullKey(k)))

      for (const [i, key] of batch.entries()) {
        out.set(key, this.createKvResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(entries: readonly KvEntry<Uint8Array>[]): Promise<void> {
    for (const batch of this.chunks(entries)) {
      const tx = this.client.multi()

      for (const [key, value] of batch) {
        tx.set(this.fullKey(key), this.toBuffer(value))
      }

      await tx.exec()
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const batch of this.chunks(keys)) {
      await this.client.del(batch.map((k) => this.fullKey(k)))
    }
  }

  private *chunks<T>(items: readonly T[]): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += this.opts.batchSize) {
      yield items.slice(i, i + this.opts.batchSize)
    }
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private createKvResult(buffer: Buffer | null): KvResult<Uint8Array> {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private fullKey(k: KvKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
