import type { BytesKeyValueStoreConditional } from "../../ports/bytes-kv-store"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"

export type MemoryKvStoreOptions = {
  /**
   * Maximum number of entries retained in the store.
   *
   * Writing a new key past the limit throws; overwrites are always allowed.
   */
  maxEntries?: number
}

export class MemoryBytesKeyValueStore implements BytesKeyValueStoreConditional {
  private readonly store = new Map<KvKey, Uint8Array>()

  public constructor(private readonly opts: MemoryKvStoreOptions = {}) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const value = this.store.get(key)

    if (value === undefined) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(value) }
  }

  async set(key: KvKey, value: Uint8Array): Promise<void> {
    this.enforceMaxEntries(key)

    this.store.set(key, new Uint8Array(value))
  }

  async setIfNotExists(key: KvKey, value: Uint8Array): Promise<KvWriteResult> {
    if (this.store.has(key)) return { kind: "skipped" }

    await this.set(key, value)
    return { kind: "written" }
  }

  async delete(key: KvKey): Promise<void> {
    this.store.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.store.has(key)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of keys) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(entries: readonly KvEntry<Uint8Array>[]): Promise<void> {
    for (const [key, value] of entries) {
      await this.set(key, value)
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const key of keys) {
      this.store.delete(key)
    }
  }

  private enforceMaxEntries(key: KvKey): void {
    if (this.opts.maxEntries === undefined) return
    if (this.store.has(key)) return

    if (this.store.size >= this.opts.maxEntries) {
      throw new Error(
        `MemoryBytesKeyValueStore: max entries (${this.opts.maxEntries}) exceeded`,
      )
    }
  }
}
