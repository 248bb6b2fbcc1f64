import { mock } from "vitest-mock-extended"
import type { Mock } from "../../../tests/mock"
import { RedisBytesKeyValueStore } from "../redis-bytes-kv-store"
import type { RedisBytesClient } from "../redis-client"

type Multi = ReturnType<RedisBytesClient["multi"]>

describe("RedisBytesKeyValueStore (behavior)", () => {
  let client: Mock<RedisBytesClient>
  let store: RedisBytesKeyValueStore

  beforeEach(() => {
    client = mock<RedisBytesClient>()
    store = new RedisBytesKeyValueStore(client, { keyspacePrefix: "test:", batchSize: 2 })
  })

  it("prefixes keys and converts buffers to bytes", async () => {
    client.get.mockResolvedValue(Buffer.from([1, 2]))

    const res = await store.get("jobs:1")

    expect(client.get).toHaveBeenCalledWith("test:jobs:1")
    expect(res).toStrictEqual({ kind: "found", value: new Uint8Array([1, 2]) })
  })

  it("maps a nil reply to not_found", async () => {
    client.get.mockResolvedValue(null)

    expect(await store.get("jobs:1")).toStrictEqual({ kind: "not_found" })
  })

  it("uses SET NX for setIfNotExists", async () => {
    client.set.mockResolvedValueOnce("OK").mockResolvedValueOnce(null)

    expect(await store.setIfNotExists("claim", new Uint8Array([1]))).toStrictEqual({
      kind: "written",
    })
    expect(await store.setIfNotExists("claim", new Uint8Array([2]))).toStrictEqual({
      kind: "skipped",
    })
    expect(client.set).toHaveBeenNthCalledWith(1, "test:claim", Buffer.from([1]), { NX: true })
  })

  it("splits getMany into batches of batchSize", async () => {
    client.mGet.mockImplementation(async (keys) => keys.map(() => null))

    const res = await store.getMany(["a", "b", "c"])

    expect(client.mGet.mock.calls.map(([keys]) => keys)).toStrictEqual([
      ["test:a", "test:b"],
      ["test:c"],
    ])
    expect(res.size).toBe(3)
  })

  it("writes each setMany batch in one transaction", async () => {
    const tx = mock<Multi>()
    tx.exec.mockResolvedValue([])
    client.multi.mockReturnValue(tx)

    await store.setMany([
      ["a", new Uint8Array([1])],
      ["b", new Uint8Array([2])],
      ["c", new Uint8Array([3])],
    ])

    expect(client.multi).toHaveBeenCalledTimes(2)
    expect(tx.set).toHaveBeenCalledTimes(3)
    expect(tx.exec).toHaveBeenCalledTimes(2)
  })

  it("reports existence from EXISTS", async () => {
    client.exists.mockResolvedValue(1)

    expect(await store.has("a")).toBe(true)
    expect(client.exists).toHaveBeenCalledWith("test:a")
  })

  it("rejects a batchSize below 1", () => {
    expect(
      () => new RedisBytesKeyValueStore(client, { keyspacePrefix: "test:", batchSize: 0 }),
    ).toThrow(RangeError)
  })
})
