import { BaseError } from "@batchkit/errors"

export class ConfigValidationError extends BaseError<"config_invalid"> {
  constructor(report: string, sources: readonly string[]) {
    super(`Configuration validation failed:\n${report}`, {
      code: "config_invalid",
      context: { sources },
    })
  }
}
