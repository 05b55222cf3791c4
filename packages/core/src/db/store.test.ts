import { afterEach, describe, expect, it } from "vitest";
import { rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { KnownGoodConfig } from "../platform/ports.js";
import type { PromotionRun } from "../state/types.js";
import { MemoryRunStore } from "./memory-store.js";
import { SqliteRunStore, type RunStore } from "./store.js";

const DB_PATH = join(tmpdir(), "releasegate-core-test.db");

afterEach(() => {
  rmSync(DB_PATH, { force: true });
  rmSync(`${DB_PATH}-wal`, { force: true });
  rmSync(`${DB_PATH}-shm`, { force: true });
});

function run(id: string, state: PromotionRun["state"], createdAt: string): PromotionRun {
  return {
    id,
    request: {
      artifactId: `model-${id}`,
      environment: "production",
      requestedBy: "alice",
      requestedAt: createdAt,
      trigger: "manual"
    },
    state,
    legs: ["production"],
    legIndex: 0,
    artifact: null,
    handle: null,
    history: [{ from: null, to: "REQUESTED", at: createdAt, detail: "requested" }],
    reports: [],
    latestReport: null,
    gates: [],
    approvals: [],
    inFlight: null,
    outstanding: [],
    outcome: null,
    createdAt,
    updatedAt: createdAt,
    completedAt: null
  };
}

const knownGood: KnownGoodConfig = {
  environment: "production",
  artifactId: "model-v1",
  handle: { id: "production-endpoint", environment: "production", artifactId: "model-v1", status: "IN_SERVICE" },
  resources: {
    instanceClass: "ml.m5.xlarge",
    initialReplicas: 1,
    minReplicas: 1,
    maxReplicas: 2,
    autoscaling: { enabled: true, targetInvocationsPerInstance: 70, scaleInCooldownMs: 300_000, scaleOutCooldownMs: 60_000 }
  },
  runId: "run-0",
  promotedAt: "2026-01-01T00:00:00.000Z"
};

function exerciseStore(store: RunStore): void {
  store.saveRun(run("a", "PROMOTED", "2026-01-01T00:00:01.000Z"));
  store.saveRun(run("b", "AWAITING_APPROVAL", "2026-01-01T00:00:02.000Z"));
  store.saveRun({ ...run("a", "FAILED", "2026-01-01T00:00:01.000Z") });
  store.saveKnownGood(knownGood);
  store.recordEvent({ type: "run_submitted", timestamp: "t1", run_id: "a", data: { n: 1 } });
  store.recordEvent({ type: "transition", timestamp: "t2", run_id: "b", data: { n: 2 } });

  expect(store.getRun("a")?.state).toBe("FAILED");
  expect(store.getRun("missing")).toBeNull();
  expect(store.listRuns(10).map((item) => item.id)).toEqual(["b", "a"]);
  expect(store.listActiveRuns().map((item) => item.id)).toEqual(["b"]);
  expect(store.listKnownGood()).toEqual([knownGood]);
  expect(store.getRecentEvents(null, 10).map((event) => event.type)).toEqual([
    "transition",
    "run_submitted"
  ]);
  expect(store.getRecentEvents("a")).toEqual([
    { type: "run_submitted", timestamp: "t1", run_id: "a", data: { n: 1 } }
  ]);
}

describe("MemoryRunStore", () => {
  it("stores runs, known-good configs and events", () => {
    exerciseStore(new MemoryRunStore());
  });

  it("hands out copies", () => {
    const store = new MemoryRunStore();
    store.saveRun(run("a", "REQUESTED", "2026-01-01T00:00:01.000Z"));
    const copy = store.getRun("a");
    copy?.history.push({ from: "REQUESTED", to: "FAILED", at: "t", detail: "" });
    expect(store.getRun("a")?.history).toHaveLength(1);
  });
});

describe("SqliteRunStore", () => {
  it("stores runs, known-good configs and events", () => {
    const store = new SqliteRunStore(DB_PATH);
    try {
      exerciseStore(store);
    } finally {
      store.close();
    }
  });

  it("reloads state written by a previous process", () => {
    const first = new SqliteRunStore(DB_PATH);
    first.saveRun(run("a", "DEPLOYING", "2026-01-01T00:00:01.000Z"));
    first.saveKnownGood(knownGood);
    first.close();

    const second = new SqliteRunStore(DB_PATH);
    expect(second.listActiveRuns().map((item) => item.state)).toEqual(["DEPLOYING"]);
    expect(second.listKnownGood()[0]?.artifactId).toBe("model-v1");
    second.close();
  });
});
