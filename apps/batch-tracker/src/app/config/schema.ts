import type { Milliseconds } from "@batchkit/clock"
import { type LogLevelName, logLevelNames } from "@batchkit/logger"
import { z } from "zod/mini"
import { type BatchEndpoint, batchEndpoints } from "../../domains/batches/infra/openai-batch-client"
import { type JitterName, jitterNames } from "../../domains/batches/services/poll-schedule"

export const storeDrivers = ["memory", "file", "redis"] as const
export type StoreDriver = (typeof storeDrivers)[number]

const count = (fallback: number) =>
  z._default(z.pipe(z.coerce.number(), z.int().check(z.positive())), fallback)

const duration = (fallback: Milliseconds) =>
  z._default(z.coerce.number().check(z.nonnegative()), fallback)

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "batch-tracker"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  OPENAI_API_KEY: z.string().check(z.minLength(1)),
  OPENAI_BASE_URL: z.optional(z.url()),
  OPENAI_ENDPOINT: z._default(z.enum(batchEndpoints), "/v1/chat/completions"),
  OPENAI_COMPLETION_WINDOW: z._default(z.literal("24h"), "24h"),
  OPENAI_TIMEOUT_MS: duration(60_000),
  OPENAI_MAX_ERROR_LINES: count(20),

  POLL_BASE_MS: z._default(z.coerce.number().check(z.positive()), 60_000),
  POLL_FACTOR: z._default(z.coerce.number().check(z.gte(1)), 2),
  POLL_MAX_MS: duration(600_000),
  POLL_JITTER: z._default(z.enum(jitterNames), "equal"),
  POLL_MAX_ATTEMPTS: count(10_000),
  POLL_MAX_WAIT_MS: duration(86_400_000),

  RETRIEVE_MAX_ATTEMPTS: count(3),
  RETRIEVE_BASE_MS: duration(1_000),
  RETRIEVE_MAX_MS: duration(30_000),

  HISTORY_LIMIT: count(50),

  STORE_DRIVER: z._default(z.enum(storeDrivers), "file"),
  STORE_DIR: z._default(z.string(), ".batch-tracker"),
  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), "app:batch-tracker"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  openai: {
    apiKey: string
    baseURL?: string
    endpoint: BatchEndpoint
    completionWindow: "24h"
    timeoutMs: Milliseconds
    maxErrorLines: number
  }

  batches: {
    poll: {
      baseMs: Milliseconds
      factor: number
      maxMs: Milliseconds
      jitter: JitterName
      maxAttempts: number
      maxWaitMs: Milliseconds
    }
    retrieve: {
      maxAttempts: number
      baseMs: Milliseconds
      maxMs: Milliseconds
    }
    historyLimit: number
  }

  store: {
    driver: StoreDriver
    dir: string
  }

  redis: {
    url: string
    keyPrefix: string
  }
}
