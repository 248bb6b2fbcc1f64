import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"
import { CodecKeyValueStore } from "../../core/codec/codec-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStoreConditional } from "../../ports/kv-conditional"
import { RedisBytesKeyValueStore, type RedisKvStoreOptions } from "./redis-bytes-kv-store"
import type { RedisBytesClient } from "./redis-client"

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/** Caller owns `connect()` and `quit()`. */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient({ ...options, url: options.url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

export type RedisKvOptions<T> = {
  client: RedisBytesClient
  opts: RedisKvStoreOptions
  codec: Codec<T>
}

export function createRedisKeyValueStore<T>(
  options: RedisKvOptions<T>,
): KeyValueStoreConditional<T> {
  return new CodecKeyValueStore<T>({
    bytesStore: new RedisBytesKeyValueStore(options.client, options.opts),
    codec: options.codec,
  })
}
