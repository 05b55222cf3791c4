import { describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { parseConfig } from "./loader.js";
import { ReleaseGateConfigSchema } from "./schema.js";

const validConfig = {
  environments: [
    {
      name: "staging",
      tier: "staging",
      validation_suite: "smoke",
      policy: { min_accuracy: 0.8 }
    },
    {
      name: "production",
      tier: "production",
      requires: "staging",
      validation_suite: "smoke",
      resources: { max_replicas: 4 },
      policy: { min_accuracy: 0.85, requires_human_approval: true }
    }
  ],
  suites: {
    smoke: {
      checks: [{ type: "functional", name: "answers", samples: [{ input: "a", expected: 1 }] }]
    }
  }
};

describe("ReleaseGateConfigSchema", () => {
  it("applies defaults", () => {
    const parsed = ReleaseGateConfigSchema.parse(validConfig);
    expect(parsed.orchestrator.poll_interval).toBe("30s");
    expect(parsed.orchestrator.call_timeout).toBe("2m");
    expect(parsed.orchestrator.retry).toEqual({
      max_attempts: 3,
      base_delay: "1s",
      max_delay: "16s",
      jitter: "400ms"
    });
    expect(parsed.server).toEqual({ port: 4600, host: "127.0.0.1" });
    expect(parsed.environments[0]?.resources.instance_class).toBe("ml.m5.xlarge");
    expect(parsed.environments[0]?.policy.requires_human_approval).toBe(false);
    expect(parsed.environments[1]?.resources.autoscaling.scale_in_cooldown).toBe("300s");
  });

  it("validates monitoring settings", () => {
    const input = structuredClone(validConfig);
    Object.assign(input.environments[1]!, { monitoring: { enabled: true, capture_sampling_percentage: 0 } });

    const result = ReleaseGateConfigSchema.safeParse(input);
    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual([
      "environments",
      1,
      "monitoring",
      "capture_sampling_percentage"
    ]);
  });

  it("coerces expected values to strings", () => {
    const parsed = ReleaseGateConfigSchema.parse(validConfig);
    expect(parsed.suites.smoke?.checks[0]?.samples?.[0]?.expected).toBe("1");
  });

  it("rejects a suite reference that does not exist", () => {
    const input = structuredClone(validConfig);
    input.environments[0]!.validation_suite = "missing";
    const result = ReleaseGateConfigSchema.safeParse(input);
    expect(result.success).toBe(false);
  });

  it("rejects cyclic requires chains", () => {
    const input = structuredClone(validConfig);
    Object.assign(input.environments[0]!, { requires: "production" });
    expect(() => parseConfig(input)).toThrow(/cyclic 'requires' chain/);
  });

  it("rejects replica bounds that contradict each other", () => {
    const input = structuredClone(validConfig);
    Object.assign(input.environments[1]!, { resources: { min_replicas: 5, max_replicas: 4 } });
    const result = ReleaseGateConfigSchema.safeParse(input);
    expect(result.success).toBe(false);
  });

  it("formats issues as path lines", () => {
    const input = structuredClone(validConfig);
    input.environments[0]!.validation_suite = "missing";

    let caught: unknown;
    try {
      parseConfig(input);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof Error ? caught.message : "").toBe(
      "Invalid releasegate config:\n  environments.0.validation_suite: Unknown validation suite 'missing'"
    );
  });

  it("requires samples or fixtures on every check", () => {
    const result = ReleaseGateConfigSchema.safeParse({
      ...validConfig,
      suites: { smoke: { checks: [{ type: "accuracy", name: "acc", min_accuracy: 0.9 }] } }
    });
    expect(result.success).toBe(false);
  });
});
