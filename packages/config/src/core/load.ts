import { type core, prettifyError, safeParse } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigValidationError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** Classic zod and zod/mini schemas are both accepted. */
  schema: core.$ZodType<T>

  /** Default: a single `EnvSource` over process.env. */
  sources?: ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      provenance[key] = source.name
    }
  }

  const result = safeParse(schema, merged)

  if (!result.success) {
    throw new ConfigValidationError(
      prettifyError(result.error),
      sources.map((s) => s.name),
    )
  }

  const known = new Set(Object.keys(result.data))
  const relevant = Object.fromEntries(
    Object.entries(provenance).filter(([key]) => known.has(key)),
  )

  return new Config<T>(result.data, relevant)
}
