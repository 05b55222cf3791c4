import { afterEach, describe, expect, it, vi } from "vitest";
import { CancelledError } from "../errors.js";
import { ApprovalWaiters } from "./approvals.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("ApprovalWaiters", () => {
  it("hands a decision to the waiting task", async () => {
    const waiters = new ApprovalWaiters();
    const pending = waiters.wait("run-1", 0, 60_000);

    expect(waiters.resolve("run-1", 0, { decision: "approved", by: "carol" })).toBe(true);
    await expect(pending).resolves.toEqual({ decision: "approved", by: "carol" });
  });

  it("holds a decision that arrives before the wait", async () => {
    const waiters = new ApprovalWaiters();
    expect(waiters.resolve("run-1", 0, { decision: "rejected", by: "dave", note: "no" })).toBe(true);
    expect(waiters.resolve("run-1", 0, { decision: "approved", by: "erin" })).toBe(false);

    await expect(waiters.wait("run-1", 0, 60_000)).resolves.toEqual({
      decision: "rejected",
      by: "dave",
      note: "no"
    });
  });

  it("refuses decisions once a gate has settled", async () => {
    const waiters = new ApprovalWaiters();
    const pending = waiters.wait("run-1", 0, 60_000);
    waiters.resolve("run-1", 0, { decision: "approved", by: "carol" });
    await pending;

    expect(waiters.resolve("run-1", 0, { decision: "approved", by: "mallory" })).toBe(false);
  });

  it("keeps a decision for one leg away from the next", async () => {
    vi.useFakeTimers();
    const waiters = new ApprovalWaiters();
    waiters.resolve("run-1", 0, { decision: "approved", by: "carol" });
    await waiters.wait("run-1", 0, 60_000);

    const nextLeg = waiters.wait("run-1", 1, 1_000);
    await vi.advanceTimersByTimeAsync(1_000);
    await expect(nextLeg).resolves.toEqual({ decision: "timeout" });
  });

  it("drops a queued decision when the gate is closed", () => {
    const waiters = new ApprovalWaiters();
    waiters.resolve("run-1", 0, { decision: "approved", by: "carol" });
    waiters.close("run-1", 0);

    expect(waiters.resolve("run-1", 0, { decision: "approved", by: "erin" })).toBe(false);
  });

  it("times out and then refuses late decisions", async () => {
    vi.useFakeTimers();
    const waiters = new ApprovalWaiters();
    const pending = waiters.wait("run-1", 0, 1_000);

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(pending).resolves.toEqual({ decision: "timeout" });
    expect(waiters.resolve("run-1", 0, { decision: "approved", by: "carol" })).toBe(false);
  });

  it("rejects on cancellation and clears its timer", async () => {
    vi.useFakeTimers();
    const waiters = new ApprovalWaiters();
    const controller = new AbortController();
    const pending = waiters.wait("run-1", 0, 60_000, controller.signal);

    controller.abort("operator");
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(vi.getTimerCount()).toBe(0);
  });
});
