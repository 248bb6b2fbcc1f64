import * as fs from "node:fs/promises"
import * as os from "node:os"
import * as path from "node:path"
import { describeKvStoreContract } from "../../../ports/__tests__/kv-store.contract"
import { FileBytesKeyValueStore } from "../file-bytes-kv-store"

const dirs: string[] = []

afterAll(async () => {
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })))
})

describeKvStoreContract("FileBytesKeyValueStore", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "batchkit-kv-"))
  dirs.push(dir)

  return new FileBytesKeyValueStore({ rootDir: path.join(dir, "store") })
})
