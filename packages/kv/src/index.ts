export { createFileKeyValueStore } from "./adapters/file/create"
export { FileBytesKeyValueStore, type FileKvStoreOptions } from "./adapters/file/file-bytes-kv-store"
export { createMemoryKeyValueStore, type MemoryKvOptions } from "./adapters/memory/create"
export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export {
  createRedisClient,
  createRedisKeyValueStore,
  type RedisBytesClientOptions,
  type RedisKvOptions,
} from "./adapters/redis/create"
export { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./adapters/redis/redis-bytes-kv-store"
export type { RedisBytesClient } from "./adapters/redis/redis-client"
export { CodecKeyValueStore } from "./core/codec/codec-kv-store"
export type { BytesKeyValueStore, BytesKeyValueStoreConditional } from "./ports/bytes-kv-store"
export type { Codec } from "./ports/codec"
export type { KeyValueStoreConditional, KvWriteResult } from "./ports/kv-conditional"
export type { KeyspacePrefix, KvKey } from "./ports/kv-key"
export type { KvFound, KvNotFound, KvResult } from "./ports/kv-result"
export type { KeyValueStore } from "./ports/kv-store"
export type { KvEntry } from "./ports/kv-value"
