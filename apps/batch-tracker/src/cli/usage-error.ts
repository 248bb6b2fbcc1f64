import { BaseError } from "@batchkit/errors"

/** Bad command line: unknown command, missing argument, unreadable input. */
export class UsageError extends BaseError<"usage"> {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "usage", cause })
  }
}

export const usage = `Usage: batch-tracker <command> [options]

Commands:
  submit --input <file.jsonl> [--key <submissionKey>] [--chunk-size <n>] [--track]
  track <jobId...>
  status <jobId>
  cancel <jobId>
  resume
  forget <jobId>`
