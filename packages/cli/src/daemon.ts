import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { sleep } from "@releasegate/core";
import { ReleaseGateClient } from "@releasegate/sdk";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Starts the control plane in the background unless one already answers on host:port. */
export async function ensureDaemon(params: {
  host: string;
  port: number;
  configPath?: string;
  dbPath?: string;
  detach?: boolean;
}): Promise<ReleaseGateClient> {
  const baseUrl = `http://${params.host}:${params.port}`;
  const client = new ReleaseGateClient({ baseUrl });

  if (await client.health()) {
    return client;
  }

  const serverBuilt = resolve(__dirname, "../../server/src/cli.js");
  const serverSrc = resolve(__dirname, "../../server/src/cli.ts");
  const built = existsSync(serverBuilt);

  const args = [built ? serverBuilt : serverSrc, "--host", params.host, "--port", String(params.port)];
  if (params.configPath) {
    args.push("--config", params.configPath);
  }
  if (params.dbPath) {
    args.push("--db", params.dbPath);
  }

  const child = spawn(built ? process.execPath : "tsx", args, {
    detached: Boolean(params.detach),
    stdio: params.detach ? "ignore" : "inherit",
    env: process.env
  });

  if (params.detach) {
    child.unref();
  }

  const deadline = Date.now() + 10_000;
  while (Date.now() < deadline) {
    if (await client.health()) {
      return client;
    }
    await sleep(250);
  }

  throw new Error(`Failed to start daemon at ${baseUrl}`);
}
