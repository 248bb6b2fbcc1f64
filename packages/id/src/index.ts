export { nanoid } from "./adapters/nanoid"
export { prefixed } from "./adapters/prefixed"
export type { Brand } from "./core/brand"
export { type IdCodec, prefixedIdType, stringIdType, withGenerator } from "./core/id-codec"
export type { IdType } from "./core/id-type"
export { InvalidIdError } from "./core/invalid-id-error"
export type { IdGenerator } from "./ports/id-generator"
