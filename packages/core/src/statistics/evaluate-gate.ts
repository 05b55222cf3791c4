import type { EnvironmentPolicy } from "../config/environments.js";
import type { ValidationReport } from "../validation/types.js";

export type GateDecision = "ALLOW" | "BLOCK" | "NEEDS_APPROVAL";

export interface ApprovalState {
  /** Whoever approved this run for the policy's environment, if anyone has. */
  approvedBy: string | null;
}

export type GateMetric = "accuracy" | "latency_p95_ms" | "error_rate";

export interface ThresholdViolation {
  metric: GateMetric;
  threshold: number;
  actual: number | null;
}

export interface GateResult {
  decision: GateDecision;
  reason: string;
  violations: ThresholdViolation[];
}

/**
 * Decides whether a validated deployment may proceed. Rules apply in order:
 * a failed report blocks, then any violated threshold blocks, then a policy
 * that wants a human waits for one, otherwise the gate allows. Thresholds are
 * inclusive: a metric exactly at its bound passes.
 */
export function evaluateGate(
  report: ValidationReport,
  policy: EnvironmentPolicy,
  approval: ApprovalState
): GateResult {
  if (!report.passed) {
    const failed = report.checks.filter((check) => !check.passed).map((check) => check.name);
    return {
      decision: "BLOCK",
      reason: `validation suite '${report.suite}' failed: ${failed.join(", ") || "no checks passed"}`,
      violations: []
    };
  }

  const violations = findViolations(report, policy);
  if (violations.length > 0) {
    return {
      decision: "BLOCK",
      reason: `threshold violated: ${violations.map(describeViolation).join("; ")}`,
      violations
    };
  }

  if (policy.requiresHumanApproval && approval.approvedBy === null) {
    return {
      decision: "NEEDS_APPROVAL",
      reason: `human approval required for ${policy.environment}`,
      violations: []
    };
  }

  return {
    decision: "ALLOW",
    reason:
      approval.approvedBy !== null
        ? `checks passed for ${policy.environment}; approved by ${approval.approvedBy}`
        : `checks passed for ${policy.environment}`,
    violations: []
  };
}

function findViolations(report: ValidationReport, policy: EnvironmentPolicy): ThresholdViolation[] {
  const violations: ThresholdViolation[] = [];
  const { accuracy, latency, errorRate } = report.metrics;

  if (policy.minAccuracy !== undefined && (accuracy === null || accuracy < policy.minAccuracy)) {
    violations.push({ metric: "accuracy", threshold: policy.minAccuracy, actual: accuracy });
  }

  if (
    policy.maxLatencyP95Ms !== undefined &&
    (latency === null || latency.p95 > policy.maxLatencyP95Ms)
  ) {
    violations.push({
      metric: "latency_p95_ms",
      threshold: policy.maxLatencyP95Ms,
      actual: latency?.p95 ?? null
    });
  }

  if (policy.maxErrorRate !== undefined && errorRate > policy.maxErrorRate) {
    violations.push({ metric: "error_rate", threshold: policy.maxErrorRate, actual: errorRate });
  }

  return violations;
}

export function describeViolation(violation: ThresholdViolation): string {
  if (violation.actual === null) {
    return `${violation.metric} unavailable (threshold ${violation.threshold})`;
  }
  const op = violation.metric === "accuracy" ? "<" : ">";
  return `${violation.metric} ${violation.actual} ${op} ${violation.threshold}`;
}
