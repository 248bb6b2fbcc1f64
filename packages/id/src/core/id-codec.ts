import type { IdGenerator } from "../ports/id-generator"
import type { IdType } from "./id-type"
import { InvalidIdError } from "./invalid-id-error"

export type IdCodec<T> = IdType<T> & IdGenerator<T>

export const withGenerator = <T>(t: IdType<T>, g: IdGenerator<T>): IdCodec<T> => ({
  ...t,
  ...g,
})

/** An `IdType` for non-empty strings accepted by `test`. */
export function stringIdType<T extends string>(
  kind: string,
  test: (value: string) => boolean = () => true,
): IdType<T> {
  const is = (value: unknown): value is T =>
    typeof value === "string" && value.length > 0 && test(value)

  return {
    kind,
    is,
    parse(value) {
      if (!is(value)) throw new InvalidIdError(kind, value)
      return value
    },
  }
}

/** An `IdType` for ids of the form `${prefix}_${rest}`, as produced by `prefixed()`. */
export function prefixedIdType<T extends string>(kind: string, prefix: string): IdType<T> {
  const head = `${prefix}_`

  return stringIdType<T>(kind, (value) => value.startsWith(head) && value.length > head.length)
}
