import type { KvKey } from "./kv-key"
import type { KeyValueStore } from "./kv-store"

export type KvWriteResult = { readonly kind: "written" } | { readonly kind: "skipped" }

/**
 * Adds create-only writes, used to claim a key exactly once (idempotency
 * keys, unique bindings).
 *
 * Adapters implement this atomically in the backend, never as get-then-set.
 */
export interface KeyValueStoreConditional<T> extends KeyValueStore<T> {
  setIfNotExists(key: KvKey, value: T): Promise<KvWriteResult>
}
