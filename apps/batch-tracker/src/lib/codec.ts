import { BaseError } from "@batchkit/errors"
import type { Codec } from "@batchkit/kv"
import superjson from "superjson"
import { type core, prettifyError, safeParse } from "zod/mini"

const decoder = new TextDecoder()

/** Stored bytes that do not parse, or parse to the wrong shape. */
export class DecodeError extends BaseError<"decode_failed"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "decode_failed", isOperational: false, cause })
  }
}

/** superjson keeps Dates, Maps and Sets intact across a round trip. */
export function createJsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => parseSuperjson<T>(data),
  }
}

/** Like `createJsonCodec`, but decoded values must satisfy `schema`. */
export function createSchemaCodec<T>(schema: core.$ZodType<T>): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => {
      const result = safeParse(schema, parseSuperjson<unknown>(data))

      if (!result.success) {
        throw new DecodeError(`Stored value failed validation:\n${prettifyError(result.error)}`)
      }

      return result.data
    },
  }
}

function parseSuperjson<T>(data: Uint8Array): T {
  try {
    return superjson.parse<T>(decoder.decode(data))
  } catch (err) {
    throw new DecodeError("Stored value is not valid JSON", err)
  }
}
