/**
 * Contracts of the collaborators the orchestrator drives but does not own:
 * the artifact registry, the serving platform, the endpoint invocation path
 * and notification sinks. Adapters for a concrete platform implement these.
 */
import type { PromotionEventEnvelope } from "../contracts/events.js";

export type ApprovalStatus = "PENDING" | "APPROVED" | "REJECTED";

export interface ArtifactVersion {
  id: string;
  /** Offline metrics recorded at training time, e.g. `{ accuracy: 0.9 }`. */
  metrics: Record<string, number>;
  createdAt: string;
  approvalStatus: ApprovalStatus;
  source?: string;
}

export interface ArtifactRegistry {
  getArtifact(id: string): Promise<ArtifactVersion | null>;
  setApprovalStatus(id: string, status: ApprovalStatus, note?: string): Promise<void>;
  /** Newest artifact with the given status, if the registry can answer that. */
  findLatest?(status: ApprovalStatus): Promise<ArtifactVersion | null>;
}

export type EndpointStatus = "CREATING" | "IN_SERVICE" | "UPDATING" | "FAILED" | "DELETED";

export interface ServingEndpointHandle {
  id: string;
  environment: string;
  artifactId: string;
  status: EndpointStatus;
}

export interface AutoscalingPolicy {
  enabled: boolean;
  targetInvocationsPerInstance: number;
  scaleInCooldownMs: number;
  scaleOutCooldownMs: number;
}

export interface ResourceProfile {
  instanceClass: string;
  initialReplicas: number;
  minReplicas: number;
  maxReplicas: number;
  autoscaling: AutoscalingPolicy;
}

export type CaptureMode = "input" | "output";

/** Request/response capture on the endpoint and the schedule of drift analysis over it. */
export interface MonitoringProfile {
  enabled: boolean;
  captureSamplingPercentage: number;
  captureModes: CaptureMode[];
  schedule: "hourly" | "daily";
}

/** What a serving platform needs to stand up an artifact in an environment. */
export interface EnvironmentDeployConfig {
  environment: string;
  tier: "staging" | "production";
  resources: ResourceProfile;
  /** Data capture is part of the endpoint configuration, so it travels with the deploy. */
  monitoring: MonitoringProfile;
}

export interface KnownGoodConfig {
  environment: string;
  artifactId: string;
  handle: ServingEndpointHandle;
  resources: ResourceProfile;
  runId: string;
  promotedAt: string;
}

export interface ServingResourceManager {
  deploy(artifact: ArtifactVersion, config: EnvironmentDeployConfig): Promise<ServingEndpointHandle>;
  getStatus(handle: ServingEndpointHandle): Promise<EndpointStatus>;
  restore(environment: string, prior: KnownGoodConfig): Promise<ServingEndpointHandle>;
  delete(handle: ServingEndpointHandle): Promise<void>;
  /** Creates or replaces the monitoring schedule over a promoted endpoint. */
  configureMonitoring(handle: ServingEndpointHandle, profile: MonitoringProfile): Promise<void>;
}

export interface EndpointInvoker {
  /** Sends one payload to the live endpoint and returns the raw prediction. */
  invoke(endpoint: ServingEndpointHandle, payload: string): Promise<string>;
}

export interface NotificationSink {
  notify(event: PromotionEventEnvelope): void | Promise<void>;
}
