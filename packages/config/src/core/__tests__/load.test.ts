import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigValidationError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(60),
  STORE_DRIVER: z.enum(["memory", "file", "redis"]).default("file"),
  OPENAI_API_KEY: z.string().min(1),
})

describe("loadConfig", () => {
  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { OPENAI_API_KEY: "test-secret", STORE_DRIVER: "redis" } }),
        new ObjectSource({ STORE_DRIVER: "memory" }),
      ],
    })

    expect(config.value).toEqual({
      POLL_MAX_ATTEMPTS: 60,
      STORE_DRIVER: "memory",
      OPENAI_API_KEY: "test-secret",
    })
    expect(config.explain("STORE_DRIVER")).toBe("object:overrides")
    expect(config.explain("OPENAI_API_KEY")).toBe("env")
    expect(config.explain("POLL_MAX_ATTEMPTS")).toBe("default")
  })

  it("treats undefined values as absent", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ OPENAI_API_KEY: "test-secret", STORE_DRIVER: "redis" }, "first"),
        new ObjectSource({ STORE_DRIVER: undefined }, "second"),
      ],
    })

    expect(config.value.STORE_DRIVER).toBe("redis")
    expect(config.sourcesUsed()).toEqual(["first"])
  })

  it("does not track provenance for keys outside the schema", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ OPENAI_API_KEY: "test-secret" }, "a"),
        new ObjectSource({ PATH: "/usr/bin" }, "b"),
      ],
    })

    expect(config.sourcesUsed()).toEqual(["a"])
  })

  it("freezes the loaded value", async () => {
    const config = await loadConfig({
      schema,
      sources: [new ObjectSource({ OPENAI_API_KEY: "test-secret" })],
    })

    expect(Object.isFrozen(config.value)).toBe(true)
  })

  it("throws a ConfigValidationError describing every issue", async () => {
    const load = loadConfig({
      schema,
      sources: [new ObjectSource({ POLL_MAX_ATTEMPTS: "-1" }, "cli")],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toMatchObject({
      code: "config_invalid",
      context: { sources: ["cli"] },
      message: expect.stringMatching(/^Configuration validation failed:\n/),
    })
    await expect(load).rejects.toThrow(/POLL_MAX_ATTEMPTS/)
    await expect(load).rejects.toThrow(/OPENAI_API_KEY/)
  })
})
