import { findInChain } from "@batchkit/errors"
import OpenAI, { APIConnectionError, APIError, toFile } from "openai"
import { PermanentError, TransientError } from "../model/batch.errors"
import type {
  BatchServiceClient,
  RawStatus,
  WorkItem,
} from "../model/batch-service-client.model"
import { type FailureDetail, type FailureEntry, JobId } from "../model/job.model"

export const batchEndpoints = [
  "/v1/chat/completions",
  "/v1/embeddings",
  "/v1/completions",
  "/v1/responses",
] as const
export type BatchEndpoint = (typeof batchEndpoints)[number]

type Upload = Awaited<ReturnType<typeof toFile>>

type OpenAiBatchError = {
  code?: string
  line?: number | null
  message?: string
}

export type OpenAiBatch = {
  id: string
  status: string
  request_counts?: { total: number; completed: number; failed: number }
  output_file_id?: string | null
  error_file_id?: string | null
  errors?: { data?: OpenAiBatchError[] }
}

/** The slice of the OpenAI SDK this adapter calls. */
export type OpenAiBatchApi = {
  files: {
    create(body: { file: Upload; purpose: "batch" }): PromiseLike<{ id: string }>
    content(fileId: string): PromiseLike<{ text(): Promise<string> }>
  }
  batches: {
    create(body: {
      input_file_id: string
      endpoint: BatchEndpoint
      completion_window: "24h"
    }): PromiseLike<{ id: string }>
    retrieve(batchId: string): PromiseLike<OpenAiBatch>
    cancel(batchId: string): PromiseLike<unknown>
  }
}

export type OpenAiClientOptions = {
  apiKey: string
  baseURL?: string
  timeoutMs: number
}

/** SDK retries are off: the poll schedule and the retriever own retrying. */
export function createOpenAiBatchApi(opts: OpenAiClientOptions): OpenAiBatchApi {
  return new OpenAI({
    apiKey: opts.apiKey,
    ...(opts.baseURL && { baseURL: opts.baseURL }),
    timeout: opts.timeoutMs,
    maxRetries: 0,
  })
}

export type OpenAiBatchClientOptions = {
  endpoint: BatchEndpoint
  completionWindow: "24h"

  /** Lines of the error file copied into a `FailureDetail` */
  maxErrorLines: number
}

const TRANSIENT_STATUSES = new Set([408, 409, 429])

export class OpenAiBatchClient implements BatchServiceClient {
  public constructor(
    private readonly api: OpenAiBatchApi,
    private readonly opts: OpenAiBatchClientOptions,
  ) {}

  async submit(items: readonly WorkItem[]): Promise<JobId> {
    const jsonl = items.map((item) => JSON.stringify(item)).join("\n")

    const batch = await this.call("submit", undefined, async () => {
      const file = await this.api.files.create({
        file: await toFile(Buffer.from(`${jsonl}\n`, "utf8"), "batch.jsonl"),
        purpose: "batch",
      })

      return this.api.batches.create({
        input_file_id: file.id,
        endpoint: this.opts.endpoint,
        completion_window: this.opts.completionWindow,
      })
    })

    return JobId.parse(batch.id)
  }

  async getStatus(jobId: JobId): Promise<RawStatus> {
    const batch = await this.retrieve(jobId)

    return {
      status: batch.status,
      ...(batch.request_counts && {
        requestCounts: {
          total: batch.request_counts.total,
          completed: batch.request_counts.completed,
          failed: batch.request_counts.failed,
        },
      }),
      outputAvailable: Boolean(batch.output_file_id),
      errorAvailable: Boolean(batch.error_file_id),
    }
  }

  async getResult(jobId: JobId): Promise<string> {
    const batch = await this.retrieve(jobId)
    if (!batch.output_file_id) return ""

    return this.download(jobId, batch.output_file_id)
  }

  async getFailure(jobId: JobId): Promise<FailureDetail> {
    const batch = await this.retrieve(jobId)

    const errors: FailureEntry[] = (batch.errors?.data ?? []).map(toFailureEntry)

    if (batch.error_file_id) {
      const body = await this.download(jobId, batch.error_file_id)
      errors.push(...parseErrorLines(body, this.opts.maxErrorLines))
    }

    const reason = batch.status === "expired" ? "expired" : (errors[0]?.code ?? batch.status)
    const message =
      batch.status === "expired"
        ? "Batch expired before it completed"
        : (errors[0]?.message ?? `Batch ended with status ${batch.status}`)

    return { reason, message, errors }
  }

  async cancel(jobId: JobId): Promise<void> {
    await this.call("cancel", jobId, () => this.api.batches.cancel(jobId))
  }

  private retrieve(jobId: JobId): Promise<OpenAiBatch> {
    return this.call("retrieve", jobId, () => this.api.batches.retrieve(jobId))
  }

  private async download(jobId: JobId, fileId: string): Promise<string> {
    return this.call("download", jobId, async () => {
      const response = await this.api.files.content(fileId)
      return response.text()
    })
  }

  private async call<T>(
    operation: string,
    jobId: JobId | undefined,
    fn: () => PromiseLike<T>,
  ): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw classifyOpenAiError(err, operation, jobId)
    }
  }
}

/**
 * Connection failures, timeouts, 408/409/429 and 5xx are transient; 404 means
 * the job is unknown; other 4xx are rejected for good. Errors that do not
 * come from the SDK are returned unchanged.
 */
export function classifyOpenAiError(err: unknown, operation: string, jobId?: JobId): unknown {
  const apiError = findInChain(err, APIError)
  if (!apiError) return err

  const context = { operation, ...(jobId !== undefined && { jobId }), status: apiError.status }

  if (apiError instanceof APIConnectionError) {
    return new TransientError(`OpenAI ${operation} could not connect: ${apiError.message}`, {
      context,
      cause: err,
    })
  }

  const status = apiError.status

  if (status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500) {
    return new TransientError(`OpenAI ${operation} failed: ${apiError.message}`, {
      context,
      cause: err,
    })
  }

  if (status === 404 && jobId !== undefined) return PermanentError.unknownJob(jobId, err)

  return new PermanentError(`OpenAI ${operation} was rejected: ${apiError.message}`, {
    context,
    cause: err,
  })
}

function toFailureEntry(error: OpenAiBatchError): FailureEntry {
  return {
    message: error.message ?? "Unknown error",
    ...(error.code && { code: error.code }),
    ...(typeof error.line === "number" && { line: error.line }),
  }
}

/** Error file lines look like `{ custom_id, response: { body: { error } }, error }`. */
function parseErrorLines(body: string, limit: number): FailureEntry[] {
  const entries: FailureEntry[] = []
  const lines = body.split("\n").filter((line) => line.trim() !== "")

  for (const [index, line] of lines.slice(0, limit).entries()) {
    entries.push(parseErrorLine(line, index + 1))
  }

  return entries
}

function parseErrorLine(line: string, lineNumber: number): FailureEntry {
  let parsed: unknown

  try {
    parsed = JSON.parse(line)
  } catch {
    return { message: line, line: lineNumber }
  }

  const error = pickError(parsed)

  return {
    message: error?.message ?? line,
    ...(error?.code && { code: error.code }),
    line: lineNumber,
  }
}

function pickError(value: unknown): { message?: string; code?: string } | undefined {
  if (!isRecord(value)) return undefined

  const direct = asErrorShape(value.error)
  if (direct) return direct

  const response = value.response
  if (!isRecord(response) || !isRecord(response.body)) return undefined

  return asErrorShape(response.body.error)
}

function asErrorShape(value: unknown): { message?: string; code?: string } | undefined {
  if (!isRecord(value)) return undefined

  return {
    ...(typeof value.message === "string" && { message: value.message }),
    ...(typeof value.code === "string" && { code: value.code }),
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
