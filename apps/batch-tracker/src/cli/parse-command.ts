import { parseArgs } from "node:util"
import { JobId, SubmissionKey } from "../domains/batches/model/job.model"
import { UsageError } from "./usage-error"

export type Command =
  | {
      name: "submit"
      input: string
      submissionKey?: SubmissionKey
      /** Submit one job per this many items */
      chunkSize?: number
      track: boolean
    }
  | { name: "track"; jobIds: JobId[] }
  | { name: "status"; jobId: JobId }
  | { name: "cancel"; jobId: JobId }
  | { name: "resume" }
  | { name: "forget"; jobId: JobId }
  | { name: "help" }

export function parseCommand(argv: readonly string[]): Command {
  let parsed: ReturnType<typeof parse>

  try {
    parsed = parse(argv)
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), err)
  }

  const { values, positionals } = parsed
  const [name, ...rest] = positionals

  if (values.help || name === undefined || name === "help") return { name: "help" }

  switch (name) {
    case "submit": {
      if (values.input === undefined) throw new UsageError("submit needs --input <file.jsonl>")
      noMoreArgs(name, rest)

      return {
        name,
        input: values.input,
        ...(values.key !== undefined && { submissionKey: parseId(SubmissionKey, values.key) }),
        ...(values["chunk-size"] !== undefined && {
          chunkSize: parseChunkSize(values["chunk-size"]),
        }),
        track: values.track ?? false,
      }
    }
    case "track":
      if (rest.length === 0) throw new UsageError("track needs at least one job id")
      return { name, jobIds: rest.map((id) => parseId(JobId, id)) }
    case "status":
    case "cancel":
    case "forget":
      return { name, jobId: singleJobId(name, rest) }
    case "resume":
      noMoreArgs(name, rest)
      return { name }
    default:
      throw new UsageError(`Unknown command "${name}"`)
  }
}

function parse(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      input: { type: "string", short: "i" },
      key: { type: "string", short: "k" },
      "chunk-size": { type: "string" },
      track: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  })
}

function parseChunkSize(value: string): number {
  const size = /^\d+$/.test(value) ? Number(value) : Number.NaN

  if (!Number.isSafeInteger(size) || size < 1) {
    throw new UsageError(`--chunk-size must be a positive integer (got "${value}")`)
  }

  return size
}

function singleJobId(command: string, args: string[]): JobId {
  const [id, ...extra] = args

  if (id === undefined) throw new UsageError(`${command} needs a job id`)
  noMoreArgs(command, extra)

  return parseId(JobId, id)
}

function noMoreArgs(command: string, args: string[]): void {
  if (args.length > 0) throw new UsageError(`Unexpected arguments for ${command}: ${args.join(" ")}`)
}

function parseId<T>(type: { parse(value: unknown): T }, value: string): T {
  try {
    return type.parse(value)
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err), err)
  }
}
