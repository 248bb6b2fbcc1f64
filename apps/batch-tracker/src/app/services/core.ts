import { type Clock, SystemClock } from "@batchkit/clock"
import { createPinoLogger, type Logger } from "@batchkit/logger"
import { createRetryExecutor, type IRetryExecutor } from "@batchkit/retry"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
  retryExecutor: IRetryExecutor
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  // stdout carries command output
  const logger = createPinoLogger(
    { service: config.logging.serviceName, env: config.app.env },
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
      stderr: true,
    },
  )

  const retryExecutor = createRetryExecutor({ clock })

  return { clock, logger, retryExecutor }
}
