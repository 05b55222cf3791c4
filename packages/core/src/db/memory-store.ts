import type { PromotionEventEnvelope } from "../contracts/events.js";
import type { KnownGoodConfig } from "../platform/ports.js";
import type { PromotionRun, TransitionRecord } from "../state/types.js";
import { TERMINAL_STATE_LIST, type RunStore } from "./store.js";

const TERMINAL: ReadonlySet<string> = new Set(TERMINAL_STATE_LIST);

/**
 * In-memory RunStore. Values are cloned on the way in and out so callers
 * cannot reach stored state by reference.
 */
export class MemoryRunStore implements RunStore {
  private readonly runs = new Map<string, PromotionRun>();
  private readonly transitions: Array<{ runId: string; record: TransitionRecord }> = [];
  private readonly events: PromotionEventEnvelope[] = [];
  private readonly knownGood = new Map<string, KnownGoodConfig>();
  private closed = false;

  saveRun(run: PromotionRun): void {
    this.assertOpen();
    this.runs.set(run.id, structuredClone(run));
  }

  recordTransition(runId: string, record: TransitionRecord): void {
    this.assertOpen();
    this.transitions.push({ runId, record: { ...record } });
  }

  recordEvent<T>(event: PromotionEventEnvelope<T>): void {
    this.assertOpen();
    this.events.push(structuredClone(event));
  }

  getRun(id: string): PromotionRun | null {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  listRuns(limit: number): PromotionRun[] {
    // Map iteration is insertion order, so reversing gives newest first.
    return [...this.runs.values()]
      .reverse()
      .slice(0, limit)
      .map((run) => structuredClone(run));
  }

  listActiveRuns(): PromotionRun[] {
    return [...this.runs.values()]
      .filter((run) => !TERMINAL.has(run.state))
      .map((run) => structuredClone(run));
  }

  saveKnownGood(config: KnownGoodConfig): void {
    this.assertOpen();
    this.knownGood.set(config.environment, structuredClone(config));
  }

  listKnownGood(): KnownGoodConfig[] {
    return [...this.knownGood.values()]
      .sort((a, b) => a.environment.localeCompare(b.environment))
      .map((config) => structuredClone(config));
  }

  getRecentEvents(runId: string | null, limit = 50): PromotionEventEnvelope[] {
    return this.events
      .filter((event) => runId === null || event.run_id === runId)
      .slice(-limit)
      .reverse()
      .map((event) => structuredClone(event));
  }

  transitionsFor(runId: string): TransitionRecord[] {
    return this.transitions.filter((entry) => entry.runId === runId).map((entry) => entry.record);
  }

  close(): void {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("Run store is closed");
    }
  }
}
