import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../platform/retry.js";
import { parseDuration } from "../utils/duration.js";
import type { OrchestratorConfig } from "./schema.js";

export interface OrchestratorSettings {
  pollIntervalMs: number;
  callTimeoutMs: number;
  retry: RetryPolicy;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  pollIntervalMs: 30_000,
  callTimeoutMs: 120_000,
  retry: DEFAULT_RETRY_POLICY
};

export function toOrchestratorSettings(config: OrchestratorConfig): OrchestratorSettings {
  return {
    pollIntervalMs: parseDuration(config.poll_interval),
    callTimeoutMs: parseDuration(config.call_timeout),
    retry: {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: parseDuration(config.retry.base_delay),
      maxDelayMs: parseDuration(config.retry.max_delay),
      jitterMs: parseDuration(config.retry.jitter)
    }
  };
}
