import { z } from "zod";
import { DURATION_PATTERN } from "../utils/duration.js";

const DurationSchema = z.string().regex(DURATION_PATTERN, {
  message: "Duration must be in format like 30s, 10m, 1h, 500ms, 1d"
});

export const TierSchema = z.enum(["staging", "production"]);

export const AutoscalingSchema = z.object({
  enabled: z.boolean().default(true),
  target_invocations_per_instance: z.number().positive().default(70),
  scale_in_cooldown: DurationSchema.default("300s"),
  scale_out_cooldown: DurationSchema.default("60s")
});

export const ResourceProfileSchema = z
  .object({
    instance_class: z.string().min(1).default("ml.m5.xlarge"),
    initial_replicas: z.number().int().min(1).default(1),
    min_replicas: z.number().int().min(1).default(1),
    max_replicas: z.number().int().min(1).default(10),
    autoscaling: AutoscalingSchema.default({})
  })
  .superRefine((profile, ctx) => {
    if (profile.min_replicas > profile.max_replicas) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "min_replicas must not exceed max_replicas",
        path: ["min_replicas"]
      });
    }
    if (
      profile.initial_replicas < profile.min_replicas ||
      profile.initial_replicas > profile.max_replicas
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "initial_replicas must lie within [min_replicas, max_replicas]",
        path: ["initial_replicas"]
      });
    }
  });

export const MonitoringSchema = z.object({
  enabled: z.boolean().default(false),
  capture_sampling_percentage: z.number().int().min(1).max(100).default(100),
  capture_modes: z.array(z.enum(["input", "output"])).min(1).default(["input", "output"]),
  schedule: z.enum(["hourly", "daily"]).default("hourly")
});

export const PolicySchema = z.object({
  min_accuracy: z.number().min(0).max(1).optional(),
  max_latency_p95_ms: z.number().positive().optional(),
  max_error_rate: z.number().min(0).max(1).optional(),
  requires_human_approval: z.boolean().default(false)
});

export const TimeoutsSchema = z.object({
  deploy: DurationSchema.optional(),
  ready: DurationSchema.optional(),
  validate: DurationSchema.optional(),
  approval: DurationSchema.optional(),
  restore: DurationSchema.optional()
});

export const EnvironmentSchema = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, {
    message: "Environment names use lowercase letters, digits and dashes"
  }),
  tier: TierSchema,
  requires: z.string().optional(),
  resources: ResourceProfileSchema.default({}),
  monitoring: MonitoringSchema.default({}),
  policy: PolicySchema.default({}),
  validation_suite: z.string().min(1),
  timeouts: TimeoutsSchema.default({})
});

export const SampleSchema = z.object({
  input: z.string(),
  expected: z
    .union([z.string(), z.number(), z.boolean()])
    .transform((value) => String(value))
    .optional()
});

export const FixtureFileSchema = z.object({
  samples: z.array(SampleSchema).min(1)
});

const CheckSource = {
  name: z.string().min(1),
  samples: z.array(SampleSchema).optional(),
  fixtures: z.string().min(1).optional()
};

export const CheckSchema = z
  .discriminatedUnion("type", [
    z.object({ type: z.literal("functional"), ...CheckSource }),
    z.object({
      type: z.literal("latency"),
      ...CheckSource,
      requests: z.number().int().min(1).max(10_000).default(20),
      max_p95_ms: z.number().positive(),
      max_p99_ms: z.number().positive().optional()
    }),
    z.object({
      type: z.literal("accuracy"),
      ...CheckSource,
      min_accuracy: z.number().min(0).max(1)
    })
  ])
  .superRefine((check, ctx) => {
    if (!check.samples?.length && !check.fixtures) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "A check needs inline samples or a fixtures file",
        path: ["samples"]
      });
    }
  });

export const SuiteSchema = z.object({
  checks: z.array(CheckSchema).min(1)
});

export const RetrySchema = z.object({
  max_attempts: z.number().int().min(1).max(10).default(3),
  base_delay: DurationSchema.default("1s"),
  max_delay: DurationSchema.default("16s"),
  jitter: DurationSchema.default("400ms")
});

export const OrchestratorSchema = z.object({
  poll_interval: DurationSchema.default("30s"),
  call_timeout: DurationSchema.default("2m"),
  retry: RetrySchema.default({}),
  db_path: z.string().default("./releasegate.db")
});

export const SimulatedArtifactSchema = z.object({
  id: z.string().min(1),
  approval_status: z.enum(["PENDING", "APPROVED", "REJECTED"]).default("PENDING"),
  metrics: z.record(z.number()).default({}),
  created_at: z.string().optional(),
  latency_ms: z.number().min(0).default(0),
  responses: z.record(z.string()).default({}),
  default_response: z.string().default("0")
});

export const PlatformSchema = z.object({
  kind: z.literal("simulated").default("simulated"),
  ready_after_polls: z.number().int().min(1).default(2),
  artifacts: z.array(SimulatedArtifactSchema).default([])
});

export const WebhookSchema = z.object({
  url: z.string().url(),
  on: z.array(z.string()).default(["*"]),
  headers: z.record(z.string()).default({}),
  retries: z.number().int().min(0).max(10).default(3)
});

export const NotificationsSchema = z.object({
  webhooks: z.array(WebhookSchema).default([])
});

export const ServerSchema = z.object({
  port: z.number().int().min(1_024).max(65_535).default(4600),
  host: z.string().default("127.0.0.1")
});

export const ReleaseGateConfigSchema = z
  .object({
    orchestrator: OrchestratorSchema.default({}),
    environments: z.array(EnvironmentSchema).min(1),
    suites: z.record(SuiteSchema),
    platform: PlatformSchema.default({}),
    notifications: NotificationsSchema.default({}),
    server: ServerSchema.default({})
  })
  .superRefine((config, ctx) => {
    const byName = new Map(config.environments.map((env) => [env.name, env]));

    config.environments.forEach((env, index) => {
      if (config.environments.findIndex((other) => other.name === env.name) !== index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate environment name '${env.name}'`,
          path: ["environments", index, "name"]
        });
      }

      if (!config.suites[env.validation_suite]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown validation suite '${env.validation_suite}'`,
          path: ["environments", index, "validation_suite"]
        });
      }

      if (env.requires !== undefined && !byName.has(env.requires)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown required environment '${env.requires}'`,
          path: ["environments", index, "requires"]
        });
      }

      const seen = new Set<string>([env.name]);
      let cursor = env.requires;
      while (cursor !== undefined) {
        if (seen.has(cursor)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Environment '${env.name}' has a cyclic 'requires' chain`,
            path: ["environments", index, "requires"]
          });
          break;
        }
        seen.add(cursor);
        cursor = byName.get(cursor)?.requires;
      }
    });
  });

export type ReleaseGateConfig = z.infer<typeof ReleaseGateConfigSchema>;
export type ReleaseGateConfigInput = z.input<typeof ReleaseGateConfigSchema>;
export type EnvironmentConfig = z.infer<typeof EnvironmentSchema>;
export type ResourceProfileConfig = z.infer<typeof ResourceProfileSchema>;
export type MonitoringConfig = z.infer<typeof MonitoringSchema>;
export type PolicyConfig = z.infer<typeof PolicySchema>;
export type SuiteConfig = z.infer<typeof SuiteSchema>;
export type CheckConfig = z.infer<typeof CheckSchema>;
export type SampleConfig = z.infer<typeof SampleSchema>;
export type PlatformConfig = z.infer<typeof PlatformSchema>;
export type SimulatedArtifactConfig = z.infer<typeof SimulatedArtifactSchema>;
export type NotificationsConfig = z.infer<typeof NotificationsSchema>;
export type WebhookConfig = z.infer<typeof WebhookSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorSchema>;
