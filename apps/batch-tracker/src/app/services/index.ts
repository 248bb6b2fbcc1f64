import {
  type BatchServiceOverrides,
  type BatchServices,
  createBatchServices,
} from "../../domains/batches/composition"
import type { AppConfig } from "../config"
import { type CoreServices, createCoreServices } from "./core"
import { createInfraClients, type InfraClients } from "./infra"

export type AppServices = CoreServices & {
  infra: InfraClients
  batches: BatchServices
}

export type ServiceOverrides = {
  core?: Partial<CoreServices>
  infra?: Partial<InfraClients>
  batches?: BatchServiceOverrides
}

export function createDefaultServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): AppServices {
  const core = { ...createCoreServices(config), ...overrides.core }
  const infra = { ...createInfraClients(config), ...overrides.infra }

  const batches = createBatchServices(config, core, infra, overrides.batches)

  return {
    ...core,
    infra,
    batches,
  }
}

/** Opens connections the configured store needs. */
export async function startServices(services: AppServices): Promise<void> {
  await services.infra.redisClient?.connect()
}

export async function stopServices(services: AppServices): Promise<void> {
  if (services.infra.redisClient?.isOpen) await services.infra.redisClient.quit()
}
