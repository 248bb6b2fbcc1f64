import type { ConfigSource } from "../../ports/source"

/** Fixed values, typically overrides supplied by tests or CLI flags. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
