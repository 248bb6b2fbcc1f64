export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { AppConfig, EnvConfig, StoreDriver } from "./schema"
export { envSchema, storeDrivers } from "./schema"
