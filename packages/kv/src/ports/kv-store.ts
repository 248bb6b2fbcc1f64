import type { KvKey } from "./kv-key"
import type { KvResult } from "./kv-result"
import type { KvEntry } from "./kv-value"

/**
 * Persistent, authoritative key-value storage. A successful write is durable
 * for the lifetime of the backend.
 */
export interface KeyValueStore<T> {
  get(key: KvKey): Promise<KvResult<T>>

  /** Overwrites any existing value. */
  set(key: KvKey, value: T): Promise<void>

  /** Deleting a missing key is a no-op. */
  delete(key: KvKey): Promise<void>

  has(key: KvKey): Promise<boolean>

  /** The returned map has an entry for every requested key. */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  /** Atomicity is adapter-dependent. */
  setMany(entries: readonly KvEntry<T>[]): Promise<void>

  deleteMany(keys: readonly KvKey[]): Promise<void>
}
