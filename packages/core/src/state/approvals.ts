import { CancelledError } from "../errors.js";
import { cancellationReason } from "../utils/async.js";

export type ApprovalDecision =
  | { decision: "approved"; by: string; note?: string }
  | { decision: "rejected"; by: string; note?: string };

export type ApprovalOutcome = ApprovalDecision | { decision: "timeout" };

interface Waiter {
  settle: (outcome: ApprovalOutcome) => void;
}

/**
 * Hands operator decisions to the run task that is suspended on them. Each
 * gate is one leg of one run and takes exactly one decision: a decision that
 * arrives before the task starts waiting is held until it does, and once the
 * gate has settled or been closed every further decision is refused.
 */
export class ApprovalWaiters {
  private readonly waiters = new Map<string, Waiter>();
  private readonly early = new Map<string, ApprovalDecision>();
  private readonly closed = new Set<string>();

  /** Returns false when the gate already holds or has consumed a decision. */
  resolve(runId: string, leg: number, decision: ApprovalDecision): boolean {
    const key = gateKey(runId, leg);
    if (this.closed.has(key)) {
      return false;
    }
    const waiter = this.waiters.get(key);
    if (waiter) {
      waiter.settle(decision);
      return true;
    }
    if (this.early.has(key)) {
      return false;
    }
    this.early.set(key, decision);
    return true;
  }

  wait(runId: string, leg: number, timeoutMs: number, signal?: AbortSignal): Promise<ApprovalOutcome> {
    const key = gateKey(runId, leg);
    const queued = this.early.get(key);
    if (queued) {
      this.early.delete(key);
      this.closed.add(key);
      return Promise.resolve(queued);
    }

    return new Promise<ApprovalOutcome>((resolve, reject) => {
      if (signal?.aborted) {
        this.closed.add(key);
        reject(new CancelledError(cancellationReason(signal)));
        return;
      }

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        this.waiters.delete(key);
        this.closed.add(key);
      };

      const onAbort = () => {
        cleanup();
        reject(new CancelledError(signal ? cancellationReason(signal) : "cancelled"));
      };

      const timer = setTimeout(() => {
        cleanup();
        resolve({ decision: "timeout" });
      }, timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.set(key, {
        settle: (outcome) => {
          cleanup();
          resolve(outcome);
        }
      });
    });
  }

  /** The leg left AWAITING_APPROVAL: drop what it holds and refuse late decisions. */
  close(runId: string, leg: number): void {
    const key = gateKey(runId, leg);
    this.early.delete(key);
    this.closed.add(key);
  }

  /** Forgets every gate of a finished run. */
  discard(runId: string): void {
    const prefix = `${runId}#`;
    for (const key of [...this.early.keys()]) {
      if (key.startsWith(prefix)) this.early.delete(key);
    }
    for (const key of [...this.closed]) {
      if (key.startsWith(prefix)) this.closed.delete(key);
    }
  }
}

function gateKey(runId: string, leg: number): string {
  return `${runId}#${leg}`;
}
