import type { ArtifactVersion, ServingEndpointHandle } from "../platform/ports.js";
import type { GateDecision } from "../statistics/evaluate-gate.js";
import type { ValidationReport } from "../validation/types.js";

export type PromotionState =
  | "REQUESTED"
  | "DEPLOYING"
  | "AWAITING_READY"
  | "VALIDATING"
  | "AWAITING_APPROVAL"
  | "ROLLING_BACK"
  | "PROMOTED"
  | "FAILED"
  | "ROLLED_BACK"
  | "ROLLBACK_FAILED";

export type TerminalState = Extract<
  PromotionState,
  "PROMOTED" | "FAILED" | "ROLLED_BACK" | "ROLLBACK_FAILED"
>;

export type PromotionTrigger = "build" | "manual";

export interface PromotionRequest {
  artifactId: string;
  environment: string;
  requestedBy: string;
  requestedAt: string;
  trigger: PromotionTrigger;
}

export interface TransitionRecord {
  from: PromotionState | null;
  to: PromotionState;
  at: string;
  detail: string;
}

export interface ApprovalRecord {
  environment: string;
  decision: "approved" | "rejected";
  by: string;
  at: string;
  note?: string;
}

export interface GateRecord {
  environment: string;
  decision: GateDecision;
  reason: string;
  at: string;
}

/** A collaborator call that was started and not yet answered. */
export interface PendingOperation {
  operation: string;
  environment: string;
  startedAt: string;
}

/** A collaborator call the run stopped waiting for after its deadline. */
export interface OutstandingOperation extends PendingOperation {
  abandonedAt: string;
  resolution?: string;
}

export interface RunOutcome {
  state: TerminalState;
  detail: string;
}

export interface PromotionRun {
  id: string;
  request: PromotionRequest;
  state: PromotionState;
  /** Environments this run deploys to, in order; the last is the target. */
  legs: string[];
  legIndex: number;
  artifact: ArtifactVersion | null;
  handle: ServingEndpointHandle | null;
  history: TransitionRecord[];
  reports: ValidationReport[];
  latestReport: ValidationReport | null;
  gates: GateRecord[];
  approvals: ApprovalRecord[];
  inFlight: PendingOperation | null;
  outstanding: OutstandingOperation[];
  outcome: RunOutcome | null;
  createdAt: string;
  updatedAt: string;
  completedAt: string | null;
}
