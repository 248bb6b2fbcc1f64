import { BaseError } from "@batchkit/errors"

export class InvalidIdError extends BaseError<"invalid_id"> {
  constructor(kind: string, value: unknown) {
    super(`Invalid ${kind}: ${JSON.stringify(value) ?? String(value)}`, {
      code: "invalid_id",
      context: { kind, value },
    })
  }
}
