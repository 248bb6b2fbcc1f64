import {
  type ConfigSource,
  ConfigValidationError,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@batchkit/config"
import type { AppConfig, EnvConfig } from "./schema"
import { envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      ...(env.OPENAI_BASE_URL !== undefined && { baseURL: env.OPENAI_BASE_URL }),
      endpoint: env.OPENAI_ENDPOINT,
      completionWindow: env.OPENAI_COMPLETION_WINDOW,
      timeoutMs: env.OPENAI_TIMEOUT_MS,
      maxErrorLines: env.OPENAI_MAX_ERROR_LINES,
    },
    batches: {
      poll: {
        baseMs: env.POLL_BASE_MS,
        factor: env.POLL_FACTOR,
        maxMs: env.POLL_MAX_MS,
        jitter: env.POLL_JITTER,
        maxAttempts: env.POLL_MAX_ATTEMPTS,
        maxWaitMs: env.POLL_MAX_WAIT_MS,
      },
      retrieve: {
        maxAttempts: env.RETRIEVE_MAX_ATTEMPTS,
        baseMs: env.RETRIEVE_BASE_MS,
        maxMs: env.RETRIEVE_MAX_MS,
      },
      historyLimit: env.HISTORY_LIMIT,
    },
    store: {
      driver: env.STORE_DRIVER,
      dir: env.STORE_DIR,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
  }
}

/** Rules that span several variables, checked once each one parsed. */
function checkCrossFieldRules(env: EnvConfig, sources: string[]): void {
  const problems: string[] = []

  if (env.POLL_MAX_MS < env.POLL_BASE_MS) {
    problems.push(
      `✖ POLL_MAX_MS (${env.POLL_MAX_MS}) must be >= POLL_BASE_MS (${env.POLL_BASE_MS})`,
    )
  }

  if (env.RETRIEVE_MAX_MS < env.RETRIEVE_BASE_MS) {
    problems.push(
      `✖ RETRIEVE_MAX_MS (${env.RETRIEVE_MAX_MS}) must be >= RETRIEVE_BASE_MS (${env.RETRIEVE_BASE_MS})`,
    )
  }

  if (problems.length > 0) throw new ConfigValidationError(problems.join("\n"), sources)
}

/**
 * Reads `.env.<NODE_ENV>` when present, then the environment. `overrides`
 * are raw variable values and win over both.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: Record<string, unknown>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
    ...(overrides ? [new ObjectSource(overrides)] : []),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  checkCrossFieldRules(
    result.value,
    sources.map((s) => s.name),
  )

  return mapEnvToConfig(result.value)
}
