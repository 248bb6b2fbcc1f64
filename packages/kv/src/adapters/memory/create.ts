import { CodecKeyValueStore } from "../../core/codec/codec-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStoreConditional } from "../../ports/kv-conditional"
import { MemoryBytesKeyValueStore, type MemoryKvStoreOptions } from "./memory-bytes-kv-store"

export type MemoryKvOptions<T> = {
  opts?: MemoryKvStoreOptions
  codec: Codec<T>
}

export function createMemoryKeyValueStore<T>(
  options: MemoryKvOptions<T>,
): KeyValueStoreConditional<T> {
  return new CodecKeyValueStore<T>({
    bytesStore: new MemoryBytesKeyValueStore(options.opts),
    codec: options.codec,
  })
}
