import { CodecKeyValueStore } from "../../core/codec/codec-kv-store"
import type { Codec } from "../../ports/codec"
import type { KeyValueStoreConditional } from "../../ports/kv-conditional"
import { FileBytesKeyValueStore, type FileKvStoreOptions } from "./file-bytes-kv-store"

export function createFileKeyValueStore<T>(
  options: FileKvStoreOptions & { codec: Codec<T> },
): KeyValueStoreConditional<T> {
  return new CodecKeyValueStore<T>({
    bytesStore: new FileBytesKeyValueStore({ rootDir: options.rootDir }),
    codec: options.codec,
  })
}
