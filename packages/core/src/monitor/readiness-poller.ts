import { CancelledError, OperationTimeoutError, classifyResourceError, errorMessage } from "../errors.js";
import type { EndpointStatus, ServingEndpointHandle, ServingResourceManager } from "../platform/ports.js";
import { sleep, throwIfCancelled, withTimeout } from "../utils/async.js";

export type ReadinessOutcome = "READY" | "FAILED" | "TIMED_OUT";

export interface ReadinessResult {
  outcome: ReadinessOutcome;
  /** Last status observed, or null when no status call succeeded. */
  status: EndpointStatus | null;
  polls: number;
  elapsedMs: number;
  detail: string;
}

export interface WaitUntilReadyOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
  /** Upper bound for a single getStatus call. Defaults to the interval. */
  callTimeoutMs?: number;
  onPoll?: (info: { poll: number; status: EndpointStatus | null; error?: string }) => void;
}

/**
 * Polls an endpoint until it is serving, has failed, or the budget runs out.
 * The first poll is immediate; later polls are spaced by `intervalMs` and the
 * last sleep is shortened so the result is never later than the deadline
 * plus one interval.
 */
export async function waitUntilReady(
  manager: ServingResourceManager,
  handle: ServingEndpointHandle,
  options: WaitUntilReadyOptions
): Promise<ReadinessResult> {
  const startedAt = Date.now();
  const deadline = startedAt + options.timeoutMs;
  const callTimeoutMs = options.callTimeoutMs ?? options.intervalMs;
  let polls = 0;
  let status: EndpointStatus | null = null;
  let lastError: string | null = null;

  const result = (outcome: ReadinessOutcome, detail: string): ReadinessResult => ({
    outcome,
    status,
    polls,
    elapsedMs: Date.now() - startedAt,
    detail
  });

  while (true) {
    throwIfCancelled(options.signal);
    polls += 1;

    const remaining = deadline - Date.now();
    try {
      status = await withTimeout(() => manager.getStatus(handle), {
        operation: "getStatus",
        timeoutMs: Math.min(callTimeoutMs, Math.max(1, remaining))
      });
      lastError = null;
      options.onPoll?.({ poll: polls, status });
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      const message = errorMessage(error);
      options.onPoll?.({ poll: polls, status, error: message });
      if (!(error instanceof OperationTimeoutError) && classifyResourceError(error) === "terminal") {
        return result("FAILED", `status check failed: ${message}`);
      }
      lastError = message;
    }

    if (status === "IN_SERVICE") {
      return result("READY", `${handle.id} in service after ${polls} polls`);
    }
    if (status === "FAILED" || status === "DELETED") {
      return result("FAILED", `${handle.id} reported ${status}`);
    }

    const left = deadline - Date.now();
    if (left <= 0) {
      const last = lastError ? `last error: ${lastError}` : `last status ${status ?? "unknown"}`;
      return result("TIMED_OUT", `${handle.id} not ready within ${options.timeoutMs}ms (${last})`);
    }

    await sleep(Math.min(options.intervalMs, left), options.signal);
  }
}
