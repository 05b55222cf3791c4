import { InvalidTransitionError } from "../errors.js";
import { deepFreeze } from "../utils/freeze.js";
import type { PromotionRun, PromotionState, TerminalState, TransitionRecord } from "./types.js";

const ALLOWED: Record<PromotionState, PromotionState[]> = {
  REQUESTED: ["DEPLOYING", "FAILED"],
  DEPLOYING: ["AWAITING_READY", "FAILED", "ROLLING_BACK", "ROLLBACK_FAILED"],
  AWAITING_READY: ["VALIDATING", "FAILED", "ROLLING_BACK", "ROLLBACK_FAILED"],
  VALIDATING: [
    "PROMOTED",
    "DEPLOYING",
    "AWAITING_APPROVAL",
    "FAILED",
    "ROLLING_BACK",
    "ROLLBACK_FAILED"
  ],
  AWAITING_APPROVAL: ["DEPLOYING", "PROMOTED", "FAILED", "ROLLBACK_FAILED"],
  ROLLING_BACK: ["ROLLED_BACK", "ROLLBACK_FAILED"],
  PROMOTED: [],
  FAILED: [],
  ROLLED_BACK: [],
  ROLLBACK_FAILED: []
};

const TERMINAL: ReadonlySet<PromotionState> = new Set<TerminalState>([
  "PROMOTED",
  "FAILED",
  "ROLLED_BACK",
  "ROLLBACK_FAILED"
]);

export function isTerminalState(state: PromotionState): state is TerminalState {
  return TERMINAL.has(state);
}

export function allowedTransitions(from: PromotionState): readonly PromotionState[] {
  return ALLOWED[from];
}

export function assertTransitionAllowed(from: PromotionState, to: PromotionState): void {
  if (!ALLOWED[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** True when `history` starts at REQUESTED and every step is an allowed edge. */
export function isValidHistory(history: readonly TransitionRecord[]): boolean {
  const [first, ...rest] = history;
  if (!first || first.from !== null || first.to !== "REQUESTED") {
    return false;
  }

  let current: PromotionState = first.to;
  for (const record of rest) {
    if (record.from !== current || !ALLOWED[current].includes(record.to)) {
      return false;
    }
    current = record.to;
  }
  return true;
}

export function transitionRun(
  run: PromotionRun,
  to: PromotionState,
  detail: string,
  patch: Partial<PromotionRun> = {},
  at: string = new Date().toISOString()
): PromotionRun {
  assertTransitionAllowed(run.state, to);
  const record: TransitionRecord = { from: run.state, to, at, detail };
  return deepFreeze({
    ...run,
    ...patch,
    state: to,
    history: [...run.history, record],
    updatedAt: at,
    ...(isTerminalState(to) ? { outcome: { state: to, detail }, completedAt: at } : {})
  });
}
