import { z } from "zod";
import type { EnvironmentStatus } from "../state/orchestrator.js";
import type { PromotionRun } from "../state/types.js";

export const PromotionStateSchema = z.enum([
  "REQUESTED",
  "DEPLOYING",
  "AWAITING_READY",
  "VALIDATING",
  "AWAITING_APPROVAL",
  "ROLLING_BACK",
  "PROMOTED",
  "FAILED",
  "ROLLED_BACK",
  "ROLLBACK_FAILED"
]);

export const SubmitRequestSchema = z.object({
  artifact_id: z.string().min(1),
  environment: z.string().min(1),
  requested_by: z.string().min(1).default("api"),
  trigger: z.enum(["build", "manual"]).default("manual")
});

export const SubmitLatestRequestSchema = z.object({
  environment: z.string().min(1),
  requested_by: z.string().min(1).default("build")
});

export const ApproveRequestSchema = z.object({
  approver: z.string().min(1),
  comment: z.string().optional()
});

export const RejectRequestSchema = z.object({
  approver: z.string().min(1),
  reason: z.string().optional()
});

export const CancelRequestSchema = z.object({
  reason: z.string().optional()
});

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20)
});

const TransitionViewSchema = z.object({
  from: PromotionStateSchema.nullable(),
  to: PromotionStateSchema,
  at: z.string(),
  detail: z.string()
});

const ReportViewSchema = z.object({
  suite: z.string(),
  environment: z.string(),
  passed: z.boolean(),
  error_rate: z.number(),
  accuracy: z.number().nullable(),
  latency_p95_ms: z.number().nullable(),
  checks: z.array(
    z.object({ name: z.string(), type: z.string(), passed: z.boolean(), detail: z.string() })
  ),
  completed_at: z.string()
});

export const RunViewSchema = z.object({
  id: z.string(),
  artifact_id: z.string(),
  environment: z.string(),
  requested_by: z.string(),
  trigger: z.enum(["build", "manual"]),
  state: PromotionStateSchema,
  legs: z.array(z.string()),
  current_environment: z.string(),
  endpoint_id: z.string().nullable(),
  history: z.array(TransitionViewSchema),
  reports: z.array(ReportViewSchema),
  approvals: z.array(
    z.object({
      environment: z.string(),
      decision: z.enum(["approved", "rejected"]),
      by: z.string(),
      at: z.string(),
      note: z.string().optional()
    })
  ),
  outstanding: z.array(
    z.object({
      operation: z.string(),
      environment: z.string(),
      started_at: z.string(),
      abandoned_at: z.string(),
      resolution: z.string().optional()
    })
  ),
  outcome: z.object({ state: PromotionStateSchema, detail: z.string() }).nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  completed_at: z.string().nullable()
});

export const RunListResponseSchema = z.object({ runs: z.array(RunViewSchema) });

export const EnvironmentViewSchema = z.object({
  name: z.string(),
  tier: z.enum(["staging", "production"]),
  requires: z.string().nullable(),
  suite: z.string(),
  policy: z.object({
    min_accuracy: z.number().optional(),
    max_latency_p95_ms: z.number().optional(),
    max_error_rate: z.number().optional(),
    requires_human_approval: z.boolean()
  }),
  known_good: z
    .object({ artifact_id: z.string(), run_id: z.string(), promoted_at: z.string() })
    .nullable()
});

export const EnvironmentListResponseSchema = z.object({
  environments: z.array(EnvironmentViewSchema)
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
  active_run_id: z.string().optional()
});

export type SubmitRequest = z.infer<typeof SubmitRequestSchema>;
export type SubmitLatestRequest = z.infer<typeof SubmitLatestRequestSchema>;
export type ApproveRequest = z.infer<typeof ApproveRequestSchema>;
export type RejectRequest = z.infer<typeof RejectRequestSchema>;
export type CancelRequest = z.infer<typeof CancelRequestSchema>;
export type RunView = z.infer<typeof RunViewSchema>;
export type EnvironmentView = z.infer<typeof EnvironmentViewSchema>;

export function toRunView(run: PromotionRun): RunView {
  return {
    id: run.id,
    artifact_id: run.request.artifactId,
    environment: run.request.environment,
    requested_by: run.request.requestedBy,
    trigger: run.request.trigger,
    state: run.state,
    legs: run.legs,
    current_environment: run.legs[run.legIndex] ?? run.request.environment,
    endpoint_id: run.handle?.id ?? null,
    history: run.history,
    reports: run.reports.map((report) => ({
      suite: report.suite,
      environment: report.environment,
      passed: report.passed,
      error_rate: report.metrics.errorRate,
      accuracy: report.metrics.accuracy,
      latency_p95_ms: report.metrics.latency?.p95 ?? null,
      checks: report.checks.map((check) => ({
        name: check.name,
        type: check.type,
        passed: check.passed,
        detail: check.detail
      })),
      completed_at: report.completedAt
    })),
    approvals: run.approvals,
    outstanding: run.outstanding.map((entry) => ({
      operation: entry.operation,
      environment: entry.environment,
      started_at: entry.startedAt,
      abandoned_at: entry.abandonedAt,
      ...(entry.resolution !== undefined ? { resolution: entry.resolution } : {})
    })),
    outcome: run.outcome,
    created_at: run.createdAt,
    updated_at: run.updatedAt,
    completed_at: run.completedAt
  };
}

export function toEnvironmentView({ environment, knownGood }: EnvironmentStatus): EnvironmentView {
  const { policy } = environment;
  return {
    name: environment.name,
    tier: environment.tier,
    requires: environment.requires,
    suite: environment.suite.name,
    policy: {
      ...(policy.minAccuracy !== undefined ? { min_accuracy: policy.minAccuracy } : {}),
      ...(policy.maxLatencyP95Ms !== undefined ? { max_latency_p95_ms: policy.maxLatencyP95Ms } : {}),
      ...(policy.maxErrorRate !== undefined ? { max_error_rate: policy.maxErrorRate } : {}),
      requires_human_approval: policy.requiresHumanApproval
    },
    known_good: knownGood
      ? { artifact_id: knownGood.artifactId, run_id: knownGood.runId, promoted_at: knownGood.promotedAt }
      : null
  };
}
