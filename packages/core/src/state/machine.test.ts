import { describe, expect, it } from "vitest";
import { assertTransitionAllowed, isTerminalState, isValidHistory, transitionRun } from "./machine.js";
import type { PromotionRun } from "./types.js";

function requestedRun(): PromotionRun {
  const at = "2026-01-01T00:00:00.000Z";
  return {
    id: "run-1",
    request: {
      artifactId: "model-v2",
      environment: "production",
      requestedBy: "alice",
      requestedAt: at,
      trigger: "manual"
    },
    state: "REQUESTED",
    legs: ["production"],
    legIndex: 0,
    artifact: null,
    handle: null,
    history: [{ from: null, to: "REQUESTED", at, detail: "requested" }],
    reports: [],
    latestReport: null,
    gates: [],
    approvals: [],
    inFlight: null,
    outstanding: [],
    outcome: null,
    createdAt: at,
    updatedAt: at,
    completedAt: null
  };
}

describe("state transitions", () => {
  it("allows the forward path", () => {
    expect(() => assertTransitionAllowed("REQUESTED", "DEPLOYING")).not.toThrow();
    expect(() => assertTransitionAllowed("VALIDATING", "AWAITING_APPROVAL")).not.toThrow();
    expect(() => assertTransitionAllowed("AWAITING_APPROVAL", "DEPLOYING")).not.toThrow();
    expect(() => assertTransitionAllowed("ROLLING_BACK", "ROLLED_BACK")).not.toThrow();
  });

  it("rejects illegal transitions", () => {
    expect(() => assertTransitionAllowed("REQUESTED", "PROMOTED")).toThrow(
      "Invalid transition: REQUESTED -> PROMOTED"
    );
    expect(() => assertTransitionAllowed("AWAITING_APPROVAL", "ROLLING_BACK")).toThrow(
      /Invalid transition/
    );
    expect(() => assertTransitionAllowed("ROLLING_BACK", "FAILED")).toThrow(/Invalid transition/);
  });

  it("never leaves a terminal state", () => {
    for (const state of ["PROMOTED", "FAILED", "ROLLED_BACK", "ROLLBACK_FAILED"] as const) {
      expect(isTerminalState(state)).toBe(true);
      expect(() => assertTransitionAllowed(state, "DEPLOYING")).toThrow(/Invalid transition/);
    }
    expect(isTerminalState("AWAITING_APPROVAL")).toBe(false);
  });

  it("appends a history record and sets the outcome on terminal states", () => {
    const run = requestedRun();
    const deploying = transitionRun(run, "DEPLOYING", "go", {}, "2026-01-01T00:00:01.000Z");
    const failed = transitionRun(deploying, "FAILED", "boom", {}, "2026-01-01T00:00:02.000Z");

    expect(run.history).toHaveLength(1);
    expect(deploying.outcome).toBeNull();
    expect(failed.history.map((record) => record.to)).toEqual(["REQUESTED", "DEPLOYING", "FAILED"]);
    expect(failed.outcome).toEqual({ state: "FAILED", detail: "boom" });
    expect(failed.completedAt).toBe("2026-01-01T00:00:02.000Z");
    expect(isValidHistory(failed.history)).toBe(true);
  });

  it("detects histories with a skipped edge", () => {
    const history = [
      { from: null, to: "REQUESTED" as const, at: "t0", detail: "" },
      { from: "REQUESTED" as const, to: "VALIDATING" as const, at: "t1", detail: "" }
    ];
    expect(isValidHistory(history)).toBe(false);
  });
});
