import { dirname, resolve } from "node:path";
import {
  PromotionOrchestrator,
  SqliteRunStore,
  Validator,
  buildEnvironmentCatalog,
  createSimulatedPlatform,
  loadConfig,
  toOrchestratorSettings,
  type ReleaseGateConfig,
  type RunStore
} from "@releasegate/core";
import { ReleaseGateServer } from "./server.js";
import { WebhookDispatcher } from "./services/webhook-dispatcher.js";

export interface ServerOverrides {
  host?: string;
  port?: number;
  dbPath?: string;
  /** Replaces the SQLite store, e.g. with a MemoryRunStore. */
  store?: RunStore;
}

/** Wires config, platform, store and notifications into a ready-to-start server. */
export async function createServerFromConfig(
  config: ReleaseGateConfig,
  baseDir: string,
  overrides: ServerOverrides = {}
): Promise<ReleaseGateServer> {
  const environments = await buildEnvironmentCatalog(config, { baseDir });
  const platform = createSimulatedPlatform(config.platform);
  const dbPath = overrides.dbPath ? resolve(overrides.dbPath) : resolve(baseDir, config.orchestrator.db_path);
  const store = overrides.store ?? new SqliteRunStore(dbPath);

  const orchestrator = new PromotionOrchestrator({
    registry: platform.registry,
    resources: platform.resources,
    validator: new Validator(platform.invoker),
    environments,
    store,
    sinks: [new WebhookDispatcher(config.notifications.webhooks)],
    settings: toOrchestratorSettings(config.orchestrator)
  });

  return new ReleaseGateServer({
    orchestrator,
    store,
    host: overrides.host ?? config.server.host,
    port: overrides.port ?? config.server.port
  });
}

export async function createServerFromPath(
  configPath: string,
  overrides: ServerOverrides = {}
): Promise<ReleaseGateServer> {
  const absolute = resolve(configPath);
  return createServerFromConfig(await loadConfig(absolute), dirname(absolute), overrides);
}
