import type { LatencySummary } from "../statistics/percentiles.js";

export interface ValidationSample {
  input: string;
  expected?: string;
}

export type CheckType = "functional" | "latency" | "accuracy";

export type CheckSpec =
  | { type: "functional"; name: string; samples: ValidationSample[] }
  | {
      type: "latency";
      name: string;
      samples: ValidationSample[];
      requests: number;
      maxP95Ms: number;
      maxP99Ms?: number;
    }
  | { type: "accuracy"; name: string; samples: ValidationSample[]; minAccuracy: number };

export interface TestSuite {
  name: string;
  checks: CheckSpec[];
}

export interface CheckResult {
  name: string;
  type: CheckType;
  passed: boolean;
  detail: string;
  metrics: Record<string, number>;
  error?: string;
}

export interface ValidationMetrics {
  invocations: number;
  errors: number;
  errorRate: number;
  /** Correct / total over every accuracy check; null when the suite has none. */
  accuracy: number | null;
  latency: LatencySummary | null;
}

export interface ValidationReport {
  suite: string;
  endpointId: string;
  environment: string;
  artifactId: string;
  passed: boolean;
  metrics: ValidationMetrics;
  checks: CheckResult[];
  startedAt: string;
  completedAt: string;
}
