import { resolve } from "node:path";
import { ConfigError, UnknownEnvironmentError } from "../errors.js";
import type { MonitoringProfile, ResourceProfile } from "../platform/ports.js";
import { parseDuration } from "../utils/duration.js";
import { deepFreeze } from "../utils/freeze.js";
import type { CheckSpec, TestSuite, ValidationSample } from "../validation/types.js";
import { loadFixtureFile } from "./loader.js";
import type {
  CheckConfig,
  EnvironmentConfig,
  MonitoringConfig,
  ReleaseGateConfig,
  ResourceProfileConfig,
  SampleConfig
} from "./schema.js";

export type Tier = "staging" | "production";

/** Gate thresholds for one environment; frozen once loaded. */
export interface EnvironmentPolicy {
  readonly environment: string;
  readonly tier: Tier;
  readonly minAccuracy?: number;
  readonly maxLatencyP95Ms?: number;
  readonly maxErrorRate?: number;
  readonly requiresHumanApproval: boolean;
}

export interface EnvironmentTimeouts {
  readonly deployMs: number;
  readonly readyMs: number;
  readonly validateMs: number;
  readonly approvalMs: number;
  readonly restoreMs: number;
}

export interface Environment {
  readonly name: string;
  readonly tier: Tier;
  /** Environment whose leg must pass before this one is deployed. */
  readonly requires: string | null;
  readonly resources: ResourceProfile;
  readonly monitoring: MonitoringProfile;
  readonly policy: EnvironmentPolicy;
  readonly suite: TestSuite;
  readonly timeouts: EnvironmentTimeouts;
}

export const DEFAULT_DEPLOY_TIMEOUT_MS = 10 * 60_000;
export const DEFAULT_VALIDATE_TIMEOUT_MS = 15 * 60_000;
export const DEFAULT_APPROVAL_TIMEOUT_MS = 24 * 3_600_000;
export const DEFAULT_RESTORE_TIMEOUT_MS = 10 * 60_000;

const READY_BASE_MS = 15 * 60_000;
const READY_PER_REPLICA_MS = 60_000;

/** Larger pools take longer to come up: 15m plus 1m per replica beyond the first. */
export function defaultReadyTimeoutMs(resources: ResourceProfile): number {
  return READY_BASE_MS + READY_PER_REPLICA_MS * Math.max(0, resources.maxReplicas - 1);
}

export function toResourceProfile(config: ResourceProfileConfig): ResourceProfile {
  return {
    instanceClass: config.instance_class,
    initialReplicas: config.initial_replicas,
    minReplicas: config.min_replicas,
    maxReplicas: config.max_replicas,
    autoscaling: {
      enabled: config.autoscaling.enabled,
      targetInvocationsPerInstance: config.autoscaling.target_invocations_per_instance,
      scaleInCooldownMs: parseDuration(config.autoscaling.scale_in_cooldown),
      scaleOutCooldownMs: parseDuration(config.autoscaling.scale_out_cooldown)
    }
  };
}

export function toMonitoringProfile(config: MonitoringConfig): MonitoringProfile {
  return {
    enabled: config.enabled,
    captureSamplingPercentage: config.capture_sampling_percentage,
    captureModes: [...config.capture_modes],
    schedule: config.schedule
  };
}

export function toEnvironmentPolicy(env: EnvironmentConfig): EnvironmentPolicy {
  return {
    environment: env.name,
    tier: env.tier,
    ...(env.policy.min_accuracy !== undefined ? { minAccuracy: env.policy.min_accuracy } : {}),
    ...(env.policy.max_latency_p95_ms !== undefined
      ? { maxLatencyP95Ms: env.policy.max_latency_p95_ms }
      : {}),
    ...(env.policy.max_error_rate !== undefined ? { maxErrorRate: env.policy.max_error_rate } : {}),
    requiresHumanApproval: env.policy.requires_human_approval
  };
}

export class EnvironmentCatalog {
  private readonly byName: ReadonlyMap<string, Environment>;

  constructor(environments: readonly Environment[]) {
    this.byName = new Map(environments.map((env) => [env.name, deepFreeze(env)]));
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): Environment {
    const env = this.byName.get(name);
    if (!env) {
      throw new UnknownEnvironmentError(name);
    }
    return env;
  }

  list(): Environment[] {
    return [...this.byName.values()];
  }

  /** The `requires` chain ending at `target`, earliest leg first. */
  legsFor(target: string): string[] {
    const legs: string[] = [];
    let cursor: string | null = target;
    while (cursor !== null) {
      if (legs.includes(cursor)) {
        throw new ConfigError(`Cyclic requires chain at ${cursor}`);
      }
      legs.unshift(cursor);
      cursor = this.get(cursor).requires;
    }
    return legs;
  }
}

export async function buildEnvironmentCatalog(
  config: ReleaseGateConfig,
  options: { baseDir: string }
): Promise<EnvironmentCatalog> {
  const fixtureCache = new Map<string, Promise<SampleConfig[]>>();
  const readFixtures = (path: string) => {
    const absolute = resolve(options.baseDir, path);
    let pending = fixtureCache.get(absolute);
    if (!pending) {
      pending = loadFixtureFile(absolute);
      fixtureCache.set(absolute, pending);
    }
    return pending;
  };

  const environments = await Promise.all(
    config.environments.map(async (env): Promise<Environment> => {
      const suiteConfig = config.suites[env.validation_suite];
      if (!suiteConfig) {
        throw new ConfigError(`Unknown validation suite '${env.validation_suite}'`);
      }

      const checks = await Promise.all(
        suiteConfig.checks.map(async (check) => toCheckSpec(check, readFixtures))
      );
      const resources = toResourceProfile(env.resources);

      return {
        name: env.name,
        tier: env.tier,
        requires: env.requires ?? null,
        resources,
        monitoring: toMonitoringProfile(env.monitoring),
        policy: toEnvironmentPolicy(env),
        suite: { name: env.validation_suite, checks },
        timeouts: {
          deployMs: durationOr(env.timeouts.deploy, DEFAULT_DEPLOY_TIMEOUT_MS),
          readyMs: durationOr(env.timeouts.ready, defaultReadyTimeoutMs(resources)),
          validateMs: durationOr(env.timeouts.validate, DEFAULT_VALIDATE_TIMEOUT_MS),
          approvalMs: durationOr(env.timeouts.approval, DEFAULT_APPROVAL_TIMEOUT_MS),
          restoreMs: durationOr(env.timeouts.restore, DEFAULT_RESTORE_TIMEOUT_MS)
        }
      };
    })
  );

  return new EnvironmentCatalog(environments);
}

async function toCheckSpec(
  check: CheckConfig,
  readFixtures: (path: string) => Promise<SampleConfig[]>
): Promise<CheckSpec> {
  const samples: ValidationSample[] = [
    ...(check.samples ?? []),
    ...(check.fixtures ? await readFixtures(check.fixtures) : [])
  ].map((sample) => ({
    input: sample.input,
    ...(sample.expected !== undefined ? { expected: sample.expected } : {})
  }));

  switch (check.type) {
    case "functional":
      return { type: "functional", name: check.name, samples };
    case "latency":
      return {
        type: "latency",
        name: check.name,
        samples,
        requests: check.requests,
        maxP95Ms: check.max_p95_ms,
        ...(check.max_p99_ms !== undefined ? { maxP99Ms: check.max_p99_ms } : {})
      };
    case "accuracy":
      return { type: "accuracy", name: check.name, samples, minAccuracy: check.min_accuracy };
  }
}

function durationOr(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : parseDuration(value);
}
