import path from "node:path"
import {
  type Codec,
  createFileKeyValueStore,
  createMemoryKeyValueStore,
  createRedisKeyValueStore,
  type KeyValueStoreConditional,
} from "@batchkit/kv"
import type { AppConfig } from "../../../app/config"
import type { InfraClients } from "../../../app/services/infra"
import {
  batchJobsIndexKeyspace,
  batchJobsKeyspace,
  batchResultsKeyspace,
  batchSubmissionsKeyspace,
  fileStoreDirs,
} from "../keyspace"

export type Keyspace = keyof typeof fileStoreDirs

const redisKeyspaces: Record<Keyspace, (prefix: string) => string> = {
  jobs: batchJobsKeyspace,
  index: batchJobsIndexKeyspace,
  submissions: batchSubmissionsKeyspace,
  results: batchResultsKeyspace,
}

const REDIS_BATCH_SIZE = 100

/** Opens one keyspace on the configured backend. */
export function createStore<T>(
  config: AppConfig,
  infra: InfraClients,
  keyspace: Keyspace,
  codec: Codec<T>,
): KeyValueStoreConditional<T> {
  switch (config.store.driver) {
    case "memory":
      return createMemoryKeyValueStore<T>({ codec })
    case "file":
      return createFileKeyValueStore<T>({
        rootDir: path.resolve(config.store.dir, fileStoreDirs[keyspace]),
        codec,
      })
    case "redis": {
      if (!infra.redisClient) {
        throw new Error("STORE_DRIVER=redis needs a Redis client")
      }

      return createRedisKeyValueStore<T>({
        client: infra.redisClient,
        codec,
        opts: {
          batchSize: REDIS_BATCH_SIZE,
          keyspacePrefix: redisKeyspaces[keyspace](config.redis.keyPrefix),
        },
      })
    }
  }
}
