#!/usr/bin/env node
import { isLogLevel, logger, setLogLevel } from "@releasegate/core";
import { createServerFromPath } from "./bootstrap.js";

function getArg(name: string): string | undefined {
  const index = process.argv.indexOf(name);
  if (index === -1) return undefined;
  return process.argv[index + 1];
}

async function main(): Promise<void> {
  const level = getArg("--log-level") ?? process.env.RELEASEGATE_LOG_LEVEL;
  if (level && isLogLevel(level)) {
    setLogLevel(level);
  }

  const host = getArg("--host") ?? process.env.RELEASEGATE_HOST;
  const port = getArg("--port") ?? process.env.RELEASEGATE_PORT;
  const dbPath = getArg("--db") ?? process.env.RELEASEGATE_DB_PATH;
  const configPath = getArg("--config") ?? process.env.RELEASEGATE_CONFIG ?? "./releasegate.config.yaml";

  const server = await createServerFromPath(configPath, {
    ...(host ? { host } : {}),
    ...(port ? { port: Number(port) } : {}),
    ...(dbPath ? { dbPath } : {})
  });

  await server.start();

  const shutdown = async () => {
    logger.info("shutting down");
    await server.stop();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error(error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
