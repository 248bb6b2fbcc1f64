/**
 * Represents a key in the KV store.
 *
 * @remarks
 * Keys are typically namespaced strings (e.g., "jobs:batch_123", "results:abc").
 */
export type KvKey = string

/** Prepended to every key by adapters that share a keyspace, e.g. "batchkit:". */
export type KeyspacePrefix = string
