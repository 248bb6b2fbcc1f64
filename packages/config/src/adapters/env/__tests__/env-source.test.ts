import { EnvSource } from "../env-source"

describe("EnvSource", () => {
  it("returns a copy of the whole environment without a prefix", async () => {
    const env = { OPENAI_API_KEY: "test-secret", LOG_LEVEL: "debug" }
    const loaded = await new EnvSource({ env }).load()

    expect(loaded).toEqual(env)
    expect(loaded).not.toBe(env)
  })

  it("keeps only prefixed keys and strips the prefix", async () => {
    const source = new EnvSource({
      prefix: "BATCH_",
      env: { BATCH_POLL_MAX_ATTEMPTS: "5", BATCH_STORE_DRIVER: "memory", HOME: "/root" },
    })

    expect(await source.load()).toEqual({ POLL_MAX_ATTEMPTS: "5", STORE_DRIVER: "memory" })
  })

  it("is named env", () => {
    expect(new EnvSource({ env: {} }).name).toBe("env")
  })
})
