import type { PlatformConfig, SimulatedArtifactConfig } from "../config/schema.js";
import { TerminalResourceError } from "../errors.js";
import type {
  ApprovalStatus,
  ArtifactRegistry,
  ArtifactVersion,
  EndpointInvoker,
  EndpointStatus,
  EnvironmentDeployConfig,
  KnownGoodConfig,
  MonitoringProfile,
  ResourceProfile,
  ServingEndpointHandle,
  ServingResourceManager
} from "../platform/ports.js";
import { sleep } from "../utils/async.js";

export class InMemoryArtifactRegistry implements ArtifactRegistry {
  private readonly artifacts = new Map<string, ArtifactVersion>();
  readonly statusChanges: Array<{ id: string; status: ApprovalStatus; note?: string }> = [];

  constructor(artifacts: ArtifactVersion[] = []) {
    for (const artifact of artifacts) {
      this.add(artifact);
    }
  }

  add(artifact: ArtifactVersion): void {
    this.artifacts.set(artifact.id, { ...artifact, metrics: { ...artifact.metrics } });
  }

  async getArtifact(id: string): Promise<ArtifactVersion | null> {
    const artifact = this.artifacts.get(id);
    return artifact ? { ...artifact, metrics: { ...artifact.metrics } } : null;
  }

  async setApprovalStatus(id: string, status: ApprovalStatus, note?: string): Promise<void> {
    const artifact = this.artifacts.get(id);
    if (!artifact) {
      throw new TerminalResourceError(`Unknown artifact: ${id}`);
    }
    this.artifacts.set(id, { ...artifact, approvalStatus: status });
    this.statusChanges.push({ id, status, ...(note !== undefined ? { note } : {}) });
  }

  async findLatest(status: ApprovalStatus): Promise<ArtifactVersion | null> {
    let latest: ArtifactVersion | null = null;
    for (const artifact of this.artifacts.values()) {
      if (artifact.approvalStatus !== status) continue;
      if (!latest || artifact.createdAt >= latest.createdAt) {
        latest = artifact;
      }
    }
    return latest ? { ...latest, metrics: { ...latest.metrics } } : null;
  }

  statusOf(id: string): ApprovalStatus | null {
    return this.artifacts.get(id)?.approvalStatus ?? null;
  }
}

export type ServingOperation = "deploy" | "getStatus" | "restore" | "delete" | "configureMonitoring";

interface ServingSlot {
  handle: ServingEndpointHandle;
  resources: ResourceProfile;
  /** Data capture the endpoint was configured with; null for restored endpoints. */
  capture: MonitoringProfile | null;
  polls: number;
}

export interface MonitoringSchedule {
  endpointId: string;
  artifactId: string;
  profile: MonitoringProfile;
}

export interface SimulatedServingOptions {
  /** getStatus calls needed before a new deployment reports IN_SERVICE. */
  readyAfterPolls?: number;
}

/**
 * One endpoint per environment. Deploying replaces whatever the environment
 * served, restore puts a known-good artifact back, delete tears it down.
 */
export class SimulatedServingManager implements ServingResourceManager {
  private readonly slots = new Map<string, ServingSlot>();
  private readonly schedules = new Map<string, MonitoringSchedule>();
  private readonly failures = new Map<ServingOperation, unknown[]>();
  private readonly delays = new Map<ServingOperation, number>();
  private readonly neverReady = new Set<string>();
  private readonly failingReadiness = new Set<string>();
  private readonly readyAfterPolls: number;
  readonly calls: Array<{ operation: ServingOperation; environment: string; artifactId: string }> = [];

  constructor(options: SimulatedServingOptions = {}) {
    this.readyAfterPolls = options.readyAfterPolls ?? 2;
  }

  /** Queues errors thrown by the next calls of `operation`, one per call. */
  failNext(operation: ServingOperation, ...errors: unknown[]): void {
    this.failures.set(operation, [...(this.failures.get(operation) ?? []), ...errors]);
  }

  /** Adds a delay before every call of `operation` completes. */
  delay(operation: ServingOperation, ms: number): void {
    this.delays.set(operation, ms);
  }

  stayCreating(artifactId: string): void {
    this.neverReady.add(artifactId);
  }

  failReadiness(artifactId: string): void {
    this.failingReadiness.add(artifactId);
  }

  /** Places an artifact in service directly, as an earlier release would have. */
  install(environment: string, artifactId: string, resources: ResourceProfile): ServingEndpointHandle {
    const handle: ServingEndpointHandle = {
      id: `${environment}-endpoint`,
      environment,
      artifactId,
      status: "IN_SERVICE"
    };
    this.slots.set(environment, { handle, resources, capture: null, polls: this.readyAfterPolls });
    return { ...handle };
  }

  servingArtifact(environment: string): string | null {
    return this.slots.get(environment)?.handle.artifactId ?? null;
  }

  dataCapture(environment: string): MonitoringProfile | null {
    return this.slots.get(environment)?.capture ?? null;
  }

  monitoringSchedule(environment: string): MonitoringSchedule | null {
    return this.schedules.get(environment) ?? null;
  }

  async deploy(
    artifact: ArtifactVersion,
    config: EnvironmentDeployConfig
  ): Promise<ServingEndpointHandle> {
    await this.enter("deploy", config.environment, artifact.id);
    const handle: ServingEndpointHandle = {
      id: `${config.environment}-endpoint`,
      environment: config.environment,
      artifactId: artifact.id,
      status: "CREATING"
    };
    this.slots.set(config.environment, {
      handle,
      resources: config.resources,
      capture: config.monitoring.enabled ? config.monitoring : null,
      polls: 0
    });
    return { ...handle };
  }

  async getStatus(handle: ServingEndpointHandle): Promise<EndpointStatus> {
    await this.enter("getStatus", handle.environment, handle.artifactId);
    const slot = this.slots.get(handle.environment);
    if (!slot || slot.handle.artifactId !== handle.artifactId) {
      return "DELETED";
    }
    if (this.failingReadiness.has(handle.artifactId)) {
      slot.handle = { ...slot.handle, status: "FAILED" };
      return "FAILED";
    }
    if (this.neverReady.has(handle.artifactId)) {
      return "CREATING";
    }

    slot.polls += 1;
    if (slot.polls >= this.readyAfterPolls) {
      slot.handle = { ...slot.handle, status: "IN_SERVICE" };
    }
    return slot.handle.status;
  }

  async restore(environment: string, prior: KnownGoodConfig): Promise<ServingEndpointHandle> {
    await this.enter("restore", environment, prior.artifactId);
    return this.install(environment, prior.artifactId, prior.resources);
  }

  async delete(handle: ServingEndpointHandle): Promise<void> {
    await this.enter("delete", handle.environment, handle.artifactId);
    const slot = this.slots.get(handle.environment);
    if (slot && slot.handle.artifactId === handle.artifactId) {
      this.slots.delete(handle.environment);
    }
  }

  async configureMonitoring(handle: ServingEndpointHandle, profile: MonitoringProfile): Promise<void> {
    await this.enter("configureMonitoring", handle.environment, handle.artifactId);
    const slot = this.slots.get(handle.environment);
    if (!slot || slot.handle.artifactId !== handle.artifactId) {
      throw new TerminalResourceError(`No endpoint ${handle.id} serving ${handle.artifactId}`);
    }
    this.schedules.set(handle.environment, {
      endpointId: handle.id,
      artifactId: handle.artifactId,
      profile
    });
  }

  private async enter(operation: ServingOperation, environment: string, artifactId: string) {
    this.calls.push({ operation, environment, artifactId });
    const delayMs = this.delays.get(operation);
    if (delayMs !== undefined && delayMs > 0) {
      await sleep(delayMs);
    }
    const queued = this.failures.get(operation);
    if (queued && queued.length > 0) {
      throw queued.shift();
    }
  }
}

export interface SimulatedModel {
  latencyMs: number;
  predict(input: string): string;
}

export class SimulatedEndpointInvoker implements EndpointInvoker {
  private readonly models = new Map<string, SimulatedModel>();
  private readonly failing = new Map<string, string>();

  register(artifactId: string, model: SimulatedModel): void {
    this.models.set(artifactId, model);
  }

  registerFromConfig(artifact: SimulatedArtifactConfig): void {
    this.register(artifact.id, {
      latencyMs: artifact.latency_ms,
      predict: (input) => artifact.responses[input] ?? artifact.default_response
    });
  }

  /** Makes every invocation of `artifactId` fail with `message`. */
  failInvocations(artifactId: string, message: string): void {
    this.failing.set(artifactId, message);
  }

  async invoke(endpoint: ServingEndpointHandle, payload: string): Promise<string> {
    const failure = this.failing.get(endpoint.artifactId);
    if (failure !== undefined) {
      throw new Error(failure);
    }
    const model = this.models.get(endpoint.artifactId);
    if (!model) {
      throw new TerminalResourceError(`No model behind ${endpoint.id} for ${endpoint.artifactId}`);
    }
    if (model.latencyMs > 0) {
      await sleep(model.latencyMs);
    }
    return model.predict(payload);
  }
}

export interface SimulatedPlatform {
  registry: InMemoryArtifactRegistry;
  resources: SimulatedServingManager;
  invoker: SimulatedEndpointInvoker;
}

export function createSimulatedPlatform(
  config: PlatformConfig,
  now: () => Date = () => new Date()
): SimulatedPlatform {
  const registry = new InMemoryArtifactRegistry();
  const invoker = new SimulatedEndpointInvoker();

  for (const artifact of config.artifacts) {
    registry.add({
      id: artifact.id,
      metrics: artifact.metrics,
      createdAt: artifact.created_at ?? now().toISOString(),
      approvalStatus: artifact.approval_status,
      source: "simulated"
    });
    invoker.registerFromConfig(artifact);
  }

  return {
    registry,
    resources: new SimulatedServingManager({ readyAfterPolls: config.ready_after_polls }),
    invoker
  };
}
