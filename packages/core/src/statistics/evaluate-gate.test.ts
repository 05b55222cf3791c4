import { describe, expect, it } from "vitest";
import type { EnvironmentPolicy } from "../config/environments.js";
import type { ValidationReport } from "../validation/types.js";
import { evaluateGate } from "./evaluate-gate.js";

function report(overrides: {
  passed?: boolean;
  accuracy?: number | null;
  p95?: number | null;
  errorRate?: number;
}): ValidationReport {
  const p95 = overrides.p95 === undefined ? 120 : overrides.p95;
  return {
    suite: "smoke",
    endpointId: "production-endpoint",
    environment: "production",
    artifactId: "model-v2",
    passed: overrides.passed ?? true,
    metrics: {
      invocations: 10,
      errors: 0,
      errorRate: overrides.errorRate ?? 0,
      accuracy: overrides.accuracy === undefined ? 0.9 : overrides.accuracy,
      latency:
        p95 === null ? null : { count: 10, mean: 80, min: 50, max: 150, p50: 80, p95, p99: 140 }
    },
    checks: [
      { name: "smoke", type: "functional", passed: overrides.passed ?? true, detail: "", metrics: {} }
    ],
    startedAt: "2026-01-01T00:00:00.000Z",
    completedAt: "2026-01-01T00:00:01.000Z"
  };
}

const policy: EnvironmentPolicy = {
  environment: "production",
  tier: "production",
  minAccuracy: 0.85,
  maxLatencyP95Ms: 200,
  maxErrorRate: 0.01,
  requiresHumanApproval: false
};

const none = { approvedBy: null };

describe("evaluateGate", () => {
  it("blocks a failed report before looking at thresholds", () => {
    const result = evaluateGate(report({ passed: false, accuracy: 0.1 }), policy, none);
    expect(result.decision).toBe("BLOCK");
    expect(result.reason).toBe("validation suite 'smoke' failed: smoke");
    expect(result.violations).toEqual([]);
  });

  it("treats thresholds as inclusive", () => {
    const result = evaluateGate(report({ accuracy: 0.85, p95: 200, errorRate: 0.01 }), policy, none);
    expect(result.decision).toBe("ALLOW");
    expect(result.reason).toBe("checks passed for production");
  });

  it("blocks just below the accuracy bound", () => {
    const result = evaluateGate(report({ accuracy: 0.84 }), policy, none);
    expect(result.decision).toBe("BLOCK");
    expect(result.reason).toBe("threshold violated: accuracy 0.84 < 0.85");
  });

  it("blocks just above the latency bound", () => {
    const result = evaluateGate(report({ p95: 201 }), policy, none);
    expect(result.violations).toEqual([{ metric: "latency_p95_ms", threshold: 200, actual: 201 }]);
  });

  it("counts a missing metric as a violation", () => {
    const result = evaluateGate(report({ accuracy: null }), policy, none);
    expect(result.decision).toBe("BLOCK");
    expect(result.reason).toBe("threshold violated: accuracy unavailable (threshold 0.85)");
  });

  it("asks for approval when the policy requires it", () => {
    const strict = { ...policy, requiresHumanApproval: true };
    expect(evaluateGate(report({}), strict, none).decision).toBe("NEEDS_APPROVAL");

    const approved = evaluateGate(report({}), strict, { approvedBy: "carol" });
    expect(approved.decision).toBe("ALLOW");
    expect(approved.reason).toBe("checks passed for production; approved by carol");
  });

  it("is deterministic", () => {
    const input = report({ accuracy: 0.9 });
    expect(evaluateGate(input, policy, none)).toEqual(evaluateGate(input, policy, none));
  });
});
