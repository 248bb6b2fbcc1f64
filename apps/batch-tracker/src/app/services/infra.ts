import { createRedisClient, type RedisBytesClient } from "@batchkit/kv"
import {
  createOpenAiBatchApi,
  type OpenAiBatchApi,
} from "../../domains/batches/infra/openai-batch-client"
import type { AppConfig } from "../config"

export type InfraClients = {
  openai: OpenAiBatchApi

  /** Only with `STORE_DRIVER=redis` */
  redisClient?: RedisBytesClient
}

export function createInfraClients(config: AppConfig): InfraClients {
  const openai = createOpenAiBatchApi({
    apiKey: config.openai.apiKey,
    timeoutMs: config.openai.timeoutMs,
    ...(config.openai.baseURL !== undefined && { baseURL: config.openai.baseURL }),
  })

  if (config.store.driver !== "redis") return { openai }

  return { openai, redisClient: createRedisClient({ url: config.redis.url }) }
}
