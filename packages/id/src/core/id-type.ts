/**
 * Recognises and parses a branded id where data crosses a boundary (stored
 * records, API payloads, CLI arguments).
 */
export interface IdType<T> {
  /** Used in error messages */
  readonly kind: string

  /** Throws `InvalidIdError` when `value` is not a valid id. */
  parse(value: unknown): T

  is(value: unknown): value is T
}
