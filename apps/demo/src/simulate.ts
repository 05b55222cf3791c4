import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import {
  MemoryRunStore,
  errorMessage,
  isLogLevel,
  isTerminalState,
  setLogLevel,
  sleep,
  type PromotionState,
  type RunView
} from "@releasegate/core";
import { ReleaseGateClient } from "@releasegate/sdk";
import { createServerFromPath } from "@releasegate/server";

const here = dirname(fileURLToPath(import.meta.url));
const configPath = process.env.DEMO_CONFIG ?? resolve(here, "../../../releasegate.config.yaml");
const port = Number(process.env.DEMO_PORT ?? "4650");
const logLevel = process.env.DEMO_LOG_LEVEL ?? "warn";
if (isLogLevel(logLevel)) {
  setLogLevel(logLevel);
}

const server = await createServerFromPath(configPath, { port, store: new MemoryRunStore() });
await server.start();
const api = new ReleaseGateClient({ baseUrl: server.getAddress() });

async function waitFor(id: string, states: PromotionState[], timeoutMs = 30_000): Promise<RunView> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const run = await api.getRun(id);
    if (states.includes(run.state) || isTerminalState(run.state)) {
      return run;
    }
    await sleep(100);
  }
  throw new Error(`${id} did not reach ${states.join(" or ")} within ${timeoutMs}ms`);
}

function report(run: RunView): void {
  console.log(`[demo] ${run.id} ${run.artifact_id} -> ${run.environment}: ${run.state}`);
  for (const record of run.history) {
    console.log(`[demo]   ${record.from ?? "-"} -> ${record.to}: ${record.detail}`);
  }
}

async function promote(
  artifactId: string,
  environment: string,
  decide?: (run: RunView) => Promise<void>
): Promise<RunView> {
  const submitted = await api.submit({ artifactId, environment, requestedBy: "demo" });
  let run = await waitFor(submitted.id, ["AWAITING_APPROVAL"]);
  if (run.state === "AWAITING_APPROVAL" && decide) {
    await decide(run);
    run = await waitFor(submitted.id, []);
  }
  report(run);
  return run;
}

try {
  console.log("[demo] 1. known-good baseline in staging");
  await promote("sentiment-v1", "staging");

  console.log("[demo] 2. baseline through staging into production, approved by a human");
  await promote("sentiment-v1", "production", async (run) => {
    await api.approve(run.id, "release-manager", "baseline looks good");
  });

  console.log("[demo] 3. regressed model blocked in staging and rolled back");
  await promote("sentiment-v2", "production");

  console.log("[demo] 4. healthy model rejected at the production approval");
  await promote("sentiment-v3", "production", async (run) => {
    await api.reject(run.id, "release-manager", "freeze window");
  });

  for (const env of await api.listEnvironments()) {
    console.log(`[demo] ${env.name} serves ${env.known_good?.artifact_id ?? "nothing"}`);
  }
} catch (error) {
  console.error("[demo] failed", errorMessage(error));
  process.exitCode = 1;
} finally {
  await server.stop();
}
