import path from "node:path";
import { AccessControl } from "./access";
import { AdmissionPipeline } from "./admission";
import { type LabCatalog, loadCatalog } from "./catalog";
import { dataDir, type LabkeeperConfig, loadConfig, logsDir } from "./config";
import { DockerDriver } from "./docker-driver";
import type { RuntimeDriver } from "./driver";
import { CliError } from "./errors";
import { LabController } from "./lifecycle";
import { KeyedMutex } from "./lock";
import { createFileLogger, type Logger } from "./logger";
import { RateLimiter } from "./rate-limiter";
import { Reconciler } from "./reconciler";
import { LabRegistry } from "./registry";
import { requireContainerBinary } from "./runtime";
import { JsonStore } from "./store";
import {
  type RateLimitData,
  type RegistryData,
  type VerifiedData,
  rateLimitStoreSchema,
  registrySchema,
  verifiedStoreSchema
} from "./types";
import type { Clock } from "./utils";

export interface Orchestrator {
  config: LabkeeperConfig;
  logger: Logger;
  catalog: LabCatalog;
  registry: LabRegistry;
  reconciler: Reconciler;
  controller: LabController;
  access: AccessControl;
  rateLimiter: RateLimiter;
  admission: AdmissionPipeline;
}

export interface OrchestratorDeps {
  config: LabkeeperConfig;
  driver: RuntimeDriver;
  catalog?: LabCatalog;
  logger?: Logger;
  now?: Clock;
  mutex?: KeyedMutex;
}

export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { config, driver } = deps;
  const now = deps.now ?? Date.now;
  const mutex = deps.mutex ?? new KeyedMutex();
  const logger = deps.logger ?? createFileLogger(logsDir(config), now);
  const catalog = deps.catalog ?? loadCatalog(config.catalogPath);
  const dir = dataDir(config);

  const registry = new LabRegistry(
    new JsonStore<RegistryData>({
      label: "lab registry",
      filePath: path.join(dir, "active-labs.json"),
      schema: registrySchema,
      empty: () => ({}),
      logger
    })
  );
  const reconciler = new Reconciler(driver, registry, logger);
  const controller = new LabController({
    catalog,
    registry,
    driver,
    reconciler,
    logger,
    quota: config.quota,
    network: { name: config.network, subnet: config.subnet, protectedRange: config.protectedRange },
    now,
    mutex
  });

  const access = new AccessControl({
    store: new JsonStore<VerifiedData>({
      label: "verified members",
      filePath: path.join(dir, "verified-members.json"),
      schema: verifiedStoreSchema,
      empty: () => ({}),
      logger
    }),
    superusers: config.access.superusers,
    allowedRoles: config.access.allowedRoles,
    logger,
    now
  });

  const rateLimiter = new RateLimiter({
    store: new JsonStore<RateLimitData>({
      label: "rate limits",
      filePath: path.join(dir, "rate-limits.json"),
      schema: rateLimitStoreSchema,
      empty: () => ({}),
      logger
    }),
    thresholds: config.rateLimit,
    logger,
    now,
    mutex
  });

  const admission = new AdmissionPipeline({ access, rateLimiter, logger });

  return { config, logger, catalog, registry, reconciler, controller, access, rateLimiter, admission };
}

export interface CommandContextOptions {
  /** Resolve the container engine up front. Commands that never touch it skip the lookup. */
  engine?: boolean;
}

export async function getCommandContext(options: CommandContextOptions = {}): Promise<Orchestrator> {
  const config = loadConfig();

  let containerBin = config.containerBin ?? "docker";
  if (options.engine) {
    try {
      containerBin = await requireContainerBinary(config.containerBin);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CliError({
        kind: "dependency",
        message,
        hint: "Install Docker Engine, or point LABKEEPER_CONTAINER_BIN at the docker CLI."
      });
    }
  }

  return createOrchestrator({
    config,
    driver: new DockerDriver(containerBin, { egressSudo: config.egressSudo })
  });
}
