/**
 * Loads raw configuration values. Sources do not validate or coerce; that is
 * the schema's job. Later sources override earlier ones, and a key whose
 * value is `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Used in provenance reports, e.g. "env" or "dotenv:.env.production". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
