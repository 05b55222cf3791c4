import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import {
  EnvironmentListResponseSchema,
  ErrorResponseSchema,
  MemoryRunStore,
  RunListResponseSchema,
  RunViewSchema,
  parseConfig,
  setLogHandler,
  type PromotionOrchestrator,
  type PromotionState
} from "@releasegate/core";
import { createServerFromConfig } from "./bootstrap.js";
import type { ReleaseGateServer } from "./server.js";

const GOOD = { a: "1", b: "0" };

const config = parseConfig({
  orchestrator: {
    poll_interval: "5ms",
    call_timeout: "1s",
    retry: { max_attempts: 2, base_delay: "1ms", max_delay: "2ms", jitter: "0ms" }
  },
  environments: [
    { name: "staging", tier: "staging", validation_suite: "smoke", policy: { min_accuracy: 0.5 } },
    {
      name: "production",
      tier: "production",
      requires: "staging",
      validation_suite: "smoke",
      policy: { min_accuracy: 0.5, requires_human_approval: true }
    }
  ],
  suites: {
    smoke: {
      checks: [
        {
          type: "accuracy",
          name: "labels",
          min_accuracy: 0.5,
          samples: [
            { input: "a", expected: "1" },
            { input: "b", expected: "0" }
          ]
        }
      ]
    }
  },
  platform: {
    artifacts: [
      { id: "model-v1", approval_status: "APPROVED", responses: GOOD },
      { id: "model-v2", responses: GOOD }
    ]
  }
});

let server: ReleaseGateServer;

beforeEach(async () => {
  setLogHandler(() => undefined);
  server = await createServerFromConfig(config, process.cwd(), { store: new MemoryRunStore() });
});

afterEach(async () => {
  await server.stop();
  setLogHandler(null);
});

function post(path: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    server.app.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body)
    })
  );
}

async function read<T>(response: Response | Promise<Response>, schema: z.ZodType<T>): Promise<T> {
  return schema.parse(await (await response).json());
}

function waitForState(orchestrator: PromotionOrchestrator, runId: string, state: PromotionState) {
  return new Promise<void>((resolve) => {
    const check = () => {
      if (orchestrator.getRun(runId)?.state === state) {
        unsubscribe();
        resolve();
      }
    };
    const unsubscribe = orchestrator.subscribe(check);
    check();
  });
}

describe("ReleaseGateServer", () => {
  it("reports health", async () => {
    const response = await server.app.request("/health");
    expect(response.status).toBe(200);
    expect(await read(response, z.object({ ok: z.boolean() }))).toEqual({ ok: true });
  });

  it("lists environments with their policies", async () => {
    const payload = await read(server.app.request("/api/environments"), EnvironmentListResponseSchema);

    expect(payload.environments.map((env) => env.name)).toEqual(["staging", "production"]);
    expect(payload.environments[1]).toMatchObject({
      requires: "staging",
      suite: "smoke",
      policy: { min_accuracy: 0.5, requires_human_approval: true },
      known_good: null
    });
  });

  it("accepts a promotion with 202 and rejects a duplicate with 409", async () => {
    const first = await post("/api/promotions", { artifact_id: "model-v2", environment: "staging" });
    expect(first.status).toBe(202);
    const run = await read(first, RunViewSchema);
    expect(run).toMatchObject({
      artifact_id: "model-v2",
      environment: "staging",
      requested_by: "api",
      trigger: "manual",
      state: "REQUESTED"
    });

    const second = await post("/api/promotions", { artifact_id: "model-v2", environment: "staging" });
    expect(second.status).toBe(409);
    expect(await read(second, ErrorResponseSchema)).toMatchObject({ code: "CONFLICT", active_run_id: run.id });

    await server.orchestrator.waitForRun(run.id);
  });

  it("rejects invalid bodies and unknown environments with 400", async () => {
    const invalid = await post("/api/promotions", { environment: "staging" });
    expect(invalid.status).toBe(400);
    expect(await read(invalid, ErrorResponseSchema)).toMatchObject({ code: "INVALID_REQUEST" });

    const unknown = await post("/api/promotions", { artifact_id: "model-v2", environment: "qa" });
    expect(unknown.status).toBe(400);
    expect(await read(unknown, ErrorResponseSchema)).toEqual({
      error: "Unknown environment: qa",
      code: "UNKNOWN_ENVIRONMENT"
    });
  });

  it("returns 404 for an unknown run", async () => {
    const response = await server.app.request("/api/promotions/missing");
    expect(response.status).toBe(404);
    expect(await read(response, ErrorResponseSchema)).toEqual({
      error: "Promotion run not found: missing",
      code: "RUN_NOT_FOUND"
    });
  });

  it("refuses approval of a run that is not waiting for one", async () => {
    const submitted = await read(
      post("/api/promotions", { artifact_id: "model-v2", environment: "staging" }),
      RunViewSchema
    );
    await server.orchestrator.waitForRun(submitted.id);

    const response = await post(`/api/promotions/${submitted.id}/approve`, { approver: "carol" });
    expect(response.status).toBe(409);
    expect(await read(response, ErrorResponseSchema)).toEqual({
      error: `Run ${submitted.id} is PROMOTED, not AWAITING_APPROVAL`,
      code: "INVALID_STATE"
    });
  });

  it("approves a production promotion and reports it in history", async () => {
    const submitted = await read(
      post("/api/promotions", { artifact_id: "model-v2", environment: "production", requested_by: "alice" }),
      RunViewSchema
    );
    await waitForState(server.orchestrator, submitted.id, "AWAITING_APPROVAL");

    const approved = await post(`/api/promotions/${submitted.id}/approve`, { approver: "carol", comment: "ship it" });
    expect(approved.status).toBe(200);
    await server.orchestrator.waitForRun(submitted.id);

    const detail = await read(server.app.request(`/api/promotions/${submitted.id}`), RunViewSchema);
    expect(detail.state).toBe("PROMOTED");
    expect(detail.approvals).toMatchObject([{ environment: "production", by: "carol", note: "ship it" }]);

    const history = await read(server.app.request("/api/promotions?limit=1"), RunListResponseSchema);
    expect(history.runs.map((run) => run.id)).toEqual([submitted.id]);

    const environments = await read(server.app.request("/api/environments"), EnvironmentListResponseSchema);
    expect(environments.environments[1]?.known_good).toMatchObject({ artifact_id: "model-v2", run_id: submitted.id });
  });

  it("rejects a production promotion", async () => {
    const submitted = await read(
      post("/api/promotions", { artifact_id: "model-v2", environment: "production" }),
      RunViewSchema
    );
    await waitForState(server.orchestrator, submitted.id, "AWAITING_APPROVAL");

    const rejected = await post(`/api/promotions/${submitted.id}/reject`, { approver: "dave", reason: "too risky" });
    expect(rejected.status).toBe(200);
    const run = await server.orchestrator.waitForRun(submitted.id);
    expect(run.outcome?.detail).toBe("rejected by dave: too risky; deleted production-endpoint");
  });

  it("cancels a run", async () => {
    const submitted = await read(
      post("/api/promotions", { artifact_id: "model-v2", environment: "production" }),
      RunViewSchema
    );
    await waitForState(server.orchestrator, submitted.id, "AWAITING_APPROVAL");

    const response = await post(`/api/promotions/${submitted.id}/cancel`, { reason: "change freeze" });
    expect(response.status).toBe(200);
    const run = await server.orchestrator.waitForRun(submitted.id);
    expect(run.outcome?.detail).toBe("cancelled: change freeze; deleted production-endpoint");
  });

  it("submits the newest approved artifact as a build", async () => {
    const response = await post("/api/promotions/latest", { environment: "staging" });
    expect(response.status).toBe(202);
    const run = await read(response, RunViewSchema);
    expect(run).toMatchObject({ artifact_id: "model-v1", trigger: "build", requested_by: "build" });
    await server.orchestrator.waitForRun(run.id);
  });

  it("opens an event stream", async () => {
    const response = await server.app.request("/api/events");
    expect(response.headers.get("content-type")).toBe("text/event-stream");

    const reader = response.body?.getReader();
    const chunk = await reader?.read();
    expect(new TextDecoder().decode(chunk?.value)).toBe('event: connected\ndata: {"run_id":null}\n\n');
    await reader?.cancel();
  });
});
