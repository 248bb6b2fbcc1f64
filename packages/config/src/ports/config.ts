export interface IConfig<T extends Record<string, unknown>> {
  /** The validated configuration. */
  readonly value: T

  /** Name of the source that supplied `key`, or "default" when the schema did. */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]
}
