import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UnknownEnvironmentError } from "../errors.js";
import { buildEnvironmentCatalog, defaultReadyTimeoutMs } from "./environments.js";
import { parseConfig } from "./loader.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "releasegate-env-"));
  writeFileSync(
    join(dir, "labels.json"),
    JSON.stringify({ samples: [{ input: "x", expected: "1" }, { input: "y", expected: 0 }] })
  );
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

const config = parseConfig({
  environments: [
    { name: "staging", tier: "staging", validation_suite: "labels" },
    {
      name: "production",
      tier: "production",
      requires: "staging",
      validation_suite: "labels",
      resources: { max_replicas: 5, initial_replicas: 2, min_replicas: 2 },
      policy: { min_accuracy: 0.9, max_error_rate: 0.01 },
      timeouts: { approval: "2h" }
    }
  ],
  suites: {
    labels: {
      checks: [
        {
          type: "accuracy",
          name: "accuracy",
          min_accuracy: 0.5,
          samples: [{ input: "z", expected: "1" }],
          fixtures: "labels.json"
        }
      ]
    }
  }
});

describe("buildEnvironmentCatalog", () => {
  it("merges inline samples with fixture files", async () => {
    const catalog = await buildEnvironmentCatalog(config, { baseDir: dir });
    const check = catalog.get("staging").suite.checks[0];

    expect(check?.samples).toEqual([
      { input: "z", expected: "1" },
      { input: "x", expected: "1" },
      { input: "y", expected: "0" }
    ]);
  });

  it("derives policies and timeouts", async () => {
    const production = (await buildEnvironmentCatalog(config, { baseDir: dir })).get("production");

    expect(production.policy).toEqual({
      environment: "production",
      tier: "production",
      minAccuracy: 0.9,
      maxErrorRate: 0.01,
      requiresHumanApproval: false
    });
    expect(production.timeouts.approvalMs).toBe(7_200_000);
    expect(production.timeouts.readyMs).toBe(19 * 60_000);
    expect(production.resources.autoscaling.scaleInCooldownMs).toBe(300_000);
    expect(production.monitoring).toEqual({
      enabled: false,
      captureSamplingPercentage: 100,
      captureModes: ["input", "output"],
      schedule: "hourly"
    });
  });

  it("freezes environments", async () => {
    const production = (await buildEnvironmentCatalog(config, { baseDir: dir })).get("production");
    expect(Object.isFrozen(production)).toBe(true);
    expect(Object.isFrozen(production.policy)).toBe(true);
  });

  it("orders legs along the requires chain", async () => {
    const catalog = await buildEnvironmentCatalog(config, { baseDir: dir });
    expect(catalog.legsFor("production")).toEqual(["staging", "production"]);
    expect(catalog.legsFor("staging")).toEqual(["staging"]);
    expect(() => catalog.get("qa")).toThrow(UnknownEnvironmentError);
  });
});

describe("defaultReadyTimeoutMs", () => {
  it("grows with the replica ceiling", () => {
    const base = {
      instanceClass: "ml.m5.xlarge",
      initialReplicas: 1,
      minReplicas: 1,
      autoscaling: {
        enabled: true,
        targetInvocationsPerInstance: 70,
        scaleInCooldownMs: 300_000,
        scaleOutCooldownMs: 60_000
      }
    };
    expect(defaultReadyTimeoutMs({ ...base, maxReplicas: 1 })).toBe(15 * 60_000);
    expect(defaultReadyTimeoutMs({ ...base, maxReplicas: 10 })).toBe(24 * 60_000);
  });
});
