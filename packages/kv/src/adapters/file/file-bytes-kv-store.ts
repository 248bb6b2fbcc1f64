import { randomUUID } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { BytesKeyValueStoreConditional } from "../../ports/bytes-kv-store"
import type { KvWriteResult } from "../../ports/kv-conditional"
import type { KvKey } from "../../ports/kv-key"
import type { KvResult } from "../../ports/kv-result"
import type { KvEntry } from "../../ports/kv-value"

export interface FileKvStoreOptions {
  /** Created on first write. */
  rootDir: string
}

/**
 * One file per key under `rootDir`, named by the URI-encoded key.
 *
 * Writes go to a temporary file first and are renamed into place, so a reader
 * never sees a partial value. `setIfNotExists` hard-links the temporary file,
 * which fails atomically when the key already exists.
 */
export class FileBytesKeyValueStore implements BytesKeyValueStoreConditional {
  private readonly rootDir: string
  private ready: Promise<unknown> | undefined

  constructor(options: FileKvStoreOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    try {
      const buffer = await fs.readFile(this.resolveFilePath(key))
      return { kind: "found", value: new Uint8Array(buffer) }
    } catch (err) {
      if (isNotFoundError(err)) return { kind: "not_found" }
      throw err
    }
  }

  async set(key: KvKey, value: Uint8Array): Promise<void> {
    const filePath = this.resolveFilePath(key)
    const tmpPath = await this.writeTemp(filePath, value)

    await fs.rename(tmpPath, filePath)
  }

  async setIfNotExists(key: KvKey, value: Uint8Array): Promise<KvWriteResult> {
    const filePath = this.resolveFilePath(key)
    const tmpPath = await this.writeTemp(filePath, value)

    try {
      await fs.link(tmpPath, filePath)
      return { kind: "written" }
    } catch (err) {
      if (isAlreadyExistsError(err)) return { kind: "skipped" }
      throw err
    } finally {
      await unlinkSafe(tmpPath)
    }
  }

  async delete(key: KvKey): Promise<void> {
    await unlinkSafe(this.resolveFilePath(key))
  }

  async has(key: KvKey): Promise<boolean> {
    try {
      await fs.access(this.resolveFilePath(key))
      return true
    } catch (err) {
      if (isNotFoundError(err)) return false
      throw err
    }
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const results = await Promise.all(keys.map((key) => this.get(key)))

    return new Map(keys.map((key, i) => [key, results[i] ?? { kind: "not_found" }]))
  }

  async setMany(entries: readonly KvEntry<Uint8Array>[]): Promise<void> {
    for (const [key, value] of entries) {
      await this.set(key, value)
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    await Promise.all(keys.map((key) => this.delete(key)))
  }

  private async writeTemp(filePath: string, value: Uint8Array): Promise<string> {
    this.ready ??= fs.mkdir(this.rootDir, { recursive: true })
    await this.ready

    const tmpPath = `${filePath}.${randomUUID()}.tmp`
    await fs.writeFile(tmpPath, value)

    return tmpPath
  }

  private resolveFilePath(key: KvKey): string {
    if (key === "" || key === "." || key === "..") {
      throw new Error(`Invalid key: "${key}"`)
    }

    return path.join(this.rootDir, encodeURIComponent(key))
  }
}

async function unlinkSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath)
  } catch (err) {
    if (!isNotFoundError(err)) throw err
  }
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined
}

function isNotFoundError(err: unknown): boolean {
  return errorCode(err) === "ENOENT"
}

function isAlreadyExistsError(err: unknown): boolean {
  return errorCode(err) === "EEXIST"
}
