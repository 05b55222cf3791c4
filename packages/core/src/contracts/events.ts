import { z } from "zod";

export const PromotionEventTypeSchema = z.enum([
  "run_submitted",
  "transition",
  "validation_completed",
  "approval_requested",
  "rollback_started",
  "rolled_back",
  "rollback_failed",
  "promotion_succeeded",
  "promotion_failed"
]);

export type PromotionEventType = z.infer<typeof PromotionEventTypeSchema>;

export interface PromotionEventEnvelope<T = unknown> {
  type: PromotionEventType;
  timestamp: string;
  run_id: string;
  data: T;
}

export interface TransitionEventData {
  from: string | null;
  to: string;
  detail: string;
  environment: string | null;
  artifact_id: string;
}

export interface ApprovalRequestedData {
  environment: string;
  artifact_id: string;
  reason: string;
  report: unknown;
}

export interface OutcomeEventData {
  environment: string;
  artifact_id: string;
  state: string;
  detail: string;
}
