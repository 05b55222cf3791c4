import { CancelledError, errorMessage } from "../errors.js";
import type { EndpointInvoker, ServingEndpointHandle } from "../platform/ports.js";
import { percentile, summarizeLatencies } from "../statistics/percentiles.js";
import { throwIfCancelled } from "../utils/async.js";
import type {
  CheckResult,
  CheckSpec,
  TestSuite,
  ValidationReport,
  ValidationSample
} from "./types.js";

export interface ValidationRunner {
  run(endpoint: ServingEndpointHandle, suite: TestSuite, signal?: AbortSignal): Promise<ValidationReport>;
}

export interface ValidatorOptions {
  /** Millisecond clock used to time invocations. */
  now?: () => number;
}

interface Invocation {
  ok: boolean;
  latencyMs: number;
  prediction?: string;
  error?: string;
}

interface CheckOutcome {
  result: CheckResult;
  invocations: Invocation[];
  correct?: number;
  labeled?: number;
}

/**
 * Runs a test suite against a live endpoint. Every check runs even when an
 * earlier one fails; an exception inside a check is reported as that check's
 * failure.
 */
export class Validator implements ValidationRunner {
  private readonly now: () => number;

  constructor(
    private readonly invoker: EndpointInvoker,
    options: ValidatorOptions = {}
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  async run(
    endpoint: ServingEndpointHandle,
    suite: TestSuite,
    signal?: AbortSignal
  ): Promise<ValidationReport> {
    const startedAt = new Date().toISOString();
    const outcomes: CheckOutcome[] = [];

    for (const check of suite.checks) {
      throwIfCancelled(signal);
      outcomes.push(await this.runCheck(endpoint, check, signal));
    }

    const invocations = outcomes.flatMap((outcome) => outcome.invocations);
    const errors = invocations.filter((invocation) => !invocation.ok).length;
    const latencies = invocations
      .filter((invocation) => invocation.ok)
      .map((invocation) => invocation.latencyMs);

    const accuracyOutcomes = outcomes.filter((outcome) => outcome.labeled !== undefined);
    const labeled = accuracyOutcomes.reduce((sum, outcome) => sum + (outcome.labeled ?? 0), 0);
    const correct = accuracyOutcomes.reduce((sum, outcome) => sum + (outcome.correct ?? 0), 0);

    return {
      suite: suite.name,
      endpointId: endpoint.id,
      environment: endpoint.environment,
      artifactId: endpoint.artifactId,
      passed: outcomes.every((outcome) => outcome.result.passed),
      metrics: {
        invocations: invocations.length,
        errors,
        errorRate: invocations.length > 0 ? errors / invocations.length : 0,
        accuracy: accuracyOutcomes.length > 0 && labeled > 0 ? correct / labeled : null,
        latency: summarizeLatencies(latencies)
      },
      checks: outcomes.map((outcome) => outcome.result),
      startedAt,
      completedAt: new Date().toISOString()
    };
  }

  private async runCheck(
    endpoint: ServingEndpointHandle,
    check: CheckSpec,
    signal: AbortSignal | undefined
  ): Promise<CheckOutcome> {
    try {
      if (check.samples.length === 0) {
        throw new Error("check has no samples");
      }
      switch (check.type) {
        case "functional":
          return await this.functional(endpoint, check, signal);
        case "latency":
          return await this.latency(endpoint, check, signal);
        case "accuracy":
          return await this.accuracy(endpoint, check, signal);
      }
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = errorMessage(error);
      return {
        result: {
          name: check.name,
          type: check.type,
          passed: false,
          detail: `check raised: ${message}`,
          metrics: {},
          error: message
        },
        invocations: [],
        ...(check.type === "accuracy" ? { correct: 0, labeled: 0 } : {})
      };
    }
  }

  private async functional(
    endpoint: ServingEndpointHandle,
    check: Extract<CheckSpec, { type: "functional" }>,
    signal: AbortSignal | undefined
  ): Promise<CheckOutcome> {
    const invocations: Invocation[] = [];
    const problems: string[] = [];

    for (const [index, sample] of check.samples.entries()) {
      throwIfCancelled(signal);
      const invocation = await this.invoke(endpoint, sample);
      invocations.push(invocation);
      if (!invocation.ok) {
        problems.push(`sample ${index + 1}: ${invocation.error ?? "error"}`);
      } else if (sample.expected !== undefined && invocation.prediction !== sample.expected) {
        problems.push(`sample ${index + 1}: expected ${sample.expected}, got ${invocation.prediction ?? ""}`);
      }
    }

    const passedCount = check.samples.length - problems.length;
    const summary = `${passedCount}/${check.samples.length} samples passed`;
    return {
      result: {
        name: check.name,
        type: "functional",
        passed: problems.length === 0,
        detail: problems.length === 0 ? summary : `${summary}; ${problems[0]}`,
        metrics: { passed: passedCount, total: check.samples.length }
      },
      invocations
    };
  }

  private async latency(
    endpoint: ServingEndpointHandle,
    check: Extract<CheckSpec, { type: "latency" }>,
    signal: AbortSignal | undefined
  ): Promise<CheckOutcome> {
    const invocations: Invocation[] = [];
    for (let i = 0; i < check.requests; i++) {
      throwIfCancelled(signal);
      const sample = check.samples[i % check.samples.length];
      if (sample) {
        invocations.push(await this.invoke(endpoint, sample));
      }
    }

    const latencies = invocations.filter((item) => item.ok).map((item) => item.latencyMs);
    const errors = invocations.length - latencies.length;
    if (latencies.length === 0) {
      return {
        result: {
          name: check.name,
          type: "latency",
          passed: false,
          detail: `all ${invocations.length} requests failed`,
          metrics: { requests: invocations.length, errors }
        },
        invocations
      };
    }

    const p50 = percentile(latencies, 50);
    const p95 = percentile(latencies, 95);
    const p99 = percentile(latencies, 99);
    const problems: string[] = [];
    if (errors > 0) {
      problems.push(`${errors} of ${invocations.length} requests failed`);
    }
    if (p95 > check.maxP95Ms) {
      problems.push(`p95 ${round(p95)}ms > ${check.maxP95Ms}ms`);
    }
    if (check.maxP99Ms !== undefined && p99 > check.maxP99Ms) {
      problems.push(`p99 ${round(p99)}ms > ${check.maxP99Ms}ms`);
    }

    return {
      result: {
        name: check.name,
        type: "latency",
        passed: problems.length === 0,
        detail:
          problems.length === 0 ? `p95 ${round(p95)}ms <= ${check.maxP95Ms}ms` : problems.join("; "),
        metrics: { requests: invocations.length, errors, p50, p95, p99 }
      },
      invocations
    };
  }

  private async accuracy(
    endpoint: ServingEndpointHandle,
    check: Extract<CheckSpec, { type: "accuracy" }>,
    signal: AbortSignal | undefined
  ): Promise<CheckOutcome> {
    const labeledSamples = check.samples.filter((sample) => sample.expected !== undefined);
    if (labeledSamples.length === 0) {
      throw new Error("accuracy check has no labeled samples");
    }

    const invocations: Invocation[] = [];
    let correct = 0;
    for (const sample of labeledSamples) {
      throwIfCancelled(signal);
      const invocation = await this.invoke(endpoint, sample);
      invocations.push(invocation);
      if (invocation.ok && invocation.prediction === sample.expected) {
        correct += 1;
      }
    }

    const accuracy = correct / labeledSamples.length;
    const passed = accuracy >= check.minAccuracy;
    return {
      result: {
        name: check.name,
        type: "accuracy",
        passed,
        detail: `accuracy ${round(accuracy)} (${correct}/${labeledSamples.length}) ${
          passed ? ">=" : "<"
        } ${check.minAccuracy}`,
        metrics: { accuracy, correct, total: labeledSamples.length }
      },
      invocations,
      correct,
      labeled: labeledSamples.length
    };
  }

  private async invoke(endpoint: ServingEndpointHandle, sample: ValidationSample): Promise<Invocation> {
    const started = this.now();
    try {
      const prediction = await this.invoker.invoke(endpoint, sample.input);
      return { ok: true, latencyMs: this.now() - started, prediction: prediction.trim() };
    } catch (error) {
      return { ok: false, latencyMs: this.now() - started, error: errorMessage(error) };
    }
  }
}

function round(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}
