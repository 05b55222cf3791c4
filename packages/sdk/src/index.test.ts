import { describe, expect, it, vi } from "vitest";
import type { RunView } from "@releasegate/core";
import { ReleaseGateApiError, ReleaseGateClient } from "./index.js";

const run: RunView = {
  id: "run-1",
  artifact_id: "model-v2",
  environment: "production",
  requested_by: "alice",
  trigger: "manual",
  state: "REQUESTED",
  legs: ["staging", "production"],
  current_environment: "staging",
  endpoint_id: null,
  history: [{ from: null, to: "REQUESTED", at: "2026-01-01T00:00:00.000Z", detail: "requested by alice (manual)" }],
  reports: [],
  approvals: [],
  outstanding: [],
  outcome: null,
  created_at: "2026-01-01T00:00:00.000Z",
  updated_at: "2026-01-01T00:00:00.000Z",
  completed_at: null
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" }
  });
}

describe("ReleaseGateClient", () => {
  it("submits a promotion and parses the run", async () => {
    const fetchMock = vi.fn(async () => jsonResponse(run, 202));
    const client = new ReleaseGateClient({ baseUrl: "http://gate.test/", fetch: fetchMock });

    const result = await client.submit({ artifactId: "model-v2", environment: "production", requestedBy: "alice" });

    expect(result).toEqual(run);
    expect(fetchMock).toHaveBeenCalledWith("http://gate.test/api/promotions", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ artifact_id: "model-v2", environment: "production", requested_by: "alice" })
    });
  });

  it("lists runs with a limit", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ runs: [run] }));
    const client = new ReleaseGateClient({ baseUrl: "http://gate.test", fetch: fetchMock });

    expect(await client.listRuns(5)).toEqual([run]);
    expect(fetchMock).toHaveBeenCalledWith("http://gate.test/api/promotions?limit=5", { method: "GET" });
  });

  it("raises API errors with their code and the holder of a conflict", async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({ error: "already active", code: "CONFLICT", active_run_id: "run-1" }, 409)
    );
    const client = new ReleaseGateClient({ baseUrl: "http://gate.test", fetch: fetchMock });

    const error = await client.submit({ artifactId: "model-v2", environment: "production" }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ReleaseGateApiError);
    expect(error).toMatchObject({ message: "already active", status: 409, code: "CONFLICT", activeRunId: "run-1" });
  });

  it("falls back to the HTTP status when the error body is not JSON", async () => {
    const fetchMock = vi.fn(async () => new Response("bad gateway", { status: 502 }));
    const client = new ReleaseGateClient({ baseUrl: "http://gate.test", fetch: fetchMock });

    await expect(client.getRun("run-1")).rejects.toMatchObject({ message: "HTTP 502", status: 502 });
  });

  it("reports health without throwing", async () => {
    const down = new ReleaseGateClient({
      baseUrl: "http://gate.test",
      fetch: vi.fn(async () => {
        throw new Error("ECONNREFUSED");
      })
    });
    const up = new ReleaseGateClient({ baseUrl: "http://gate.test", fetch: vi.fn(async () => jsonResponse({ ok: true })) });

    expect(await down.health()).toBe(false);
    expect(await up.health()).toBe(true);
  });
});
