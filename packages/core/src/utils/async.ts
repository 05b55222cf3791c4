import { CancelledError, OperationTimeoutError } from "../errors.js";

export type LateOutcome<T> =
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: unknown };

export interface TimeoutOptions<T> {
  operation: string;
  timeoutMs: number;
  /** Fires when the deadline trips, before the returned promise rejects. */
  onTimeout?: () => void;
  /** Receives the outcome of a call that settled after its deadline. */
  onLateSettle?: (outcome: LateOutcome<T>) => void;
}

export function cancellationReason(signal: AbortSignal): string {
  return typeof signal.reason === "string" ? signal.reason : "cancelled";
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError(cancellationReason(signal));
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(cancellationReason(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(signal ? cancellationReason(signal) : "cancelled"));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Races `run` against a deadline. The underlying call is not interrupted; its
 * eventual outcome is handed to `onLateSettle` so callers can record it.
 */
export function withTimeout<T>(run: () => Promise<T>, options: TimeoutOptions<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      options.onTimeout?.();
      reject(new OperationTimeoutError(options.operation, options.timeoutMs));
    }, Math.max(0, options.timeoutMs));

    Promise.resolve()
      .then(run)
      .then(
        (value) => {
          if (timedOut) {
            options.onLateSettle?.({ status: "fulfilled", value });
            return;
          }
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          if (timedOut) {
            options.onLateSettle?.({ status: "rejected", error });
            return;
          }
          clearTimeout(timer);
          reject(error);
        }
      );
  });
}
