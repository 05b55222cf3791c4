#!/usr/bin/env node
import { dirname, resolve } from "node:path";
import { defineCommand, runMain } from "citty";
import chalk from "chalk";
import ora from "ora";
import {
  buildEnvironmentCatalog,
  errorMessage,
  formatDuration,
  isTerminalState,
  loadConfig,
  sleep,
  toEnvironmentView,
  type RunView
} from "@releasegate/core";
import { ReleaseGateClient } from "@releasegate/sdk";
import { createServerFromPath } from "@releasegate/server";
import { ensureDaemon } from "./daemon.js";
import { colorState, describePolicy, printEnvironments, printHistory, printRun } from "./output.js";

const connection = {
  host: { type: "string", default: process.env.RELEASEGATE_HOST ?? "127.0.0.1" },
  port: { type: "string", default: process.env.RELEASEGATE_PORT ?? "4600" }
} as const;

function client(host: string, port: string): ReleaseGateClient {
  return new ReleaseGateClient({ baseUrl: `http://${host}:${port}` });
}

function fail(error: unknown): never {
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
}

async function watchRun(api: ReleaseGateClient, id: string, intervalMs: number): Promise<RunView> {
  const spinner = ora(`Waiting for ${id}`).start();
  let run = await api.getRun(id);
  while (!isTerminalState(run.state)) {
    spinner.text = `${id}: ${run.state} in ${run.current_environment}`;
    await sleep(intervalMs);
    run = await api.getRun(id);
  }

  const summary = `${id}: ${run.state}${run.outcome ? ` (${run.outcome.detail})` : ""}`;
  if (run.state === "PROMOTED") {
    spinner.succeed(summary);
  } else {
    spinner.fail(summary);
  }
  return run;
}

const serveCommand = defineCommand({
  meta: { name: "serve", description: "Run the control plane" },
  args: {
    config: { type: "string", default: "./releasegate.config.yaml", alias: "c" },
    db: { type: "string" },
    detach: { type: "boolean", default: false, alias: "d" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      if (args.detach) {
        await ensureDaemon({
          host: String(args.host),
          port: Number(args.port),
          configPath: String(args.config),
          detach: true,
          ...(args.db ? { dbPath: String(args.db) } : {})
        });
        console.log(chalk.green(`Control plane running at http://${args.host}:${args.port}`));
        return;
      }

      const server = await createServerFromPath(String(args.config), {
        host: String(args.host),
        port: Number(args.port),
        ...(args.db ? { dbPath: String(args.db) } : {})
      });
      await server.start();
      console.log(chalk.green(`Control plane listening on ${server.getAddress()}`));

      const stop = () => {
        server
          .stop()
          .then(() => process.exit(0))
          .catch(fail);
      };
      process.on("SIGINT", stop);
      process.on("SIGTERM", stop);
    } catch (error) {
      fail(error);
    }
  }
});

const submitCommand = defineCommand({
  meta: { name: "submit", description: "Request promotion of an artifact" },
  args: {
    artifact: { type: "positional", required: false, description: "Artifact id (omit with --latest)" },
    env: { type: "string", required: true, alias: "e", description: "Target environment" },
    latest: { type: "boolean", default: false, description: "Promote the newest APPROVED artifact" },
    by: { type: "string", default: process.env.USER ?? "cli" },
    build: { type: "boolean", default: false, description: "Mark the request as build-triggered" },
    wait: { type: "boolean", default: false, alias: "w" },
    config: { type: "string", default: "./releasegate.config.yaml", alias: "c" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const api = await ensureDaemon({
        host: String(args.host),
        port: Number(args.port),
        configPath: String(args.config),
        detach: true
      });

      let run: RunView;
      if (args.latest) {
        run = await api.submitLatest(String(args.env), String(args.by));
      } else if (args.artifact) {
        run = await api.submit({
          artifactId: String(args.artifact),
          environment: String(args.env),
          requestedBy: String(args.by),
          trigger: args.build ? "build" : "manual"
        });
      } else {
        throw new Error("Give an artifact id or --latest");
      }

      console.log(chalk.green(`Promotion ${run.id} submitted: ${run.artifact_id} -> ${run.legs.join(" -> ")}`));
      if (args.wait) {
        const done = await watchRun(api, run.id, 1_000);
        if (done.state !== "PROMOTED") process.exit(2);
      }
    } catch (error) {
      fail(error);
    }
  }
});

const statusCommand = defineCommand({
  meta: { name: "status", description: "Show one promotion run" },
  args: {
    id: { type: "positional", required: true },
    json: { type: "boolean", default: false },
    watch: { type: "boolean", default: false, alias: "w" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const api = client(String(args.host), String(args.port));
      const run = args.watch ? await watchRun(api, String(args.id), 2_000) : await api.getRun(String(args.id));
      if (args.json) {
        console.log(JSON.stringify(run, null, 2));
      } else {
        printRun(run);
      }
    } catch (error) {
      fail(error);
    }
  }
});

const approveCommand = defineCommand({
  meta: { name: "approve", description: "Approve a run waiting for a human" },
  args: {
    id: { type: "positional", required: true },
    by: { type: "string", default: process.env.USER ?? "cli" },
    comment: { type: "string", alias: "m" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const api = client(String(args.host), String(args.port));
      await api.approve(String(args.id), String(args.by), args.comment ? String(args.comment) : undefined);
      console.log(chalk.green(`Approved ${args.id}`));
    } catch (error) {
      fail(error);
    }
  }
});

const rejectCommand = defineCommand({
  meta: { name: "reject", description: "Reject a run waiting for a human" },
  args: {
    id: { type: "positional", required: true },
    by: { type: "string", default: process.env.USER ?? "cli" },
    reason: { type: "string", alias: "m" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const api = client(String(args.host), String(args.port));
      await api.reject(String(args.id), String(args.by), args.reason ? String(args.reason) : undefined);
      console.log(chalk.yellow(`Rejected ${args.id}`));
    } catch (error) {
      fail(error);
    }
  }
});

const cancelCommand = defineCommand({
  meta: { name: "cancel", description: "Cancel an active run" },
  args: {
    id: { type: "positional", required: true },
    reason: { type: "string", alias: "m" },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const api = client(String(args.host), String(args.port));
      const run = await api.cancel(String(args.id), args.reason ? String(args.reason) : undefined);
      console.log(chalk.yellow(`Cancellation requested for ${run.id} (${colorState(run.state)})`));
    } catch (error) {
      fail(error);
    }
  }
});

const historyCommand = defineCommand({
  meta: { name: "history", description: "Show past promotion runs" },
  args: {
    limit: { type: "string", default: "20" },
    json: { type: "boolean", default: false },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const runs = await client(String(args.host), String(args.port)).listRuns(Number(args.limit));
      if (args.json) {
        console.log(JSON.stringify(runs, null, 2));
      } else {
        printHistory(runs);
      }
    } catch (error) {
      fail(error);
    }
  }
});

const environmentsCommand = defineCommand({
  meta: { name: "environments", description: "Show environments, policies and known-good artifacts" },
  args: {
    json: { type: "boolean", default: false },
    ...connection
  },
  run: async ({ args }) => {
    try {
      const environments = await client(String(args.host), String(args.port)).listEnvironments();
      if (args.json) {
        console.log(JSON.stringify(environments, null, 2));
      } else {
        printEnvironments(environments);
      }
    } catch (error) {
      fail(error);
    }
  }
});

const validateCommand = defineCommand({
  meta: { name: "validate", description: "Validate a config file and its fixtures" },
  args: {
    config: { type: "string", default: "./releasegate.config.yaml", alias: "c" }
  },
  run: async ({ args }) => {
    const spinner = ora("Validating config").start();
    try {
      const path = resolve(String(args.config));
      const catalog = await buildEnvironmentCatalog(await loadConfig(path), { baseDir: dirname(path) });
      spinner.succeed("Config valid");

      for (const env of catalog.list()) {
        const samples = env.suite.checks.reduce((sum, check) => sum + check.samples.length, 0);
        const policy = describePolicy(toEnvironmentView({ environment: env, knownGood: null }).policy);
        console.log(
          `${chalk.bold(env.name)}: ${catalog.legsFor(env.name).join(" -> ")}; ` +
            `suite '${env.suite.name}' (${env.suite.checks.length} checks, ${samples} samples); ` +
            `${policy}; ready within ${formatDuration(env.timeouts.readyMs)}` +
            (env.monitoring.enabled
              ? `; monitoring ${env.monitoring.schedule} at ${env.monitoring.captureSamplingPercentage}% capture`
              : "")
        );
      }
    } catch (error) {
      spinner.fail(errorMessage(error));
      process.exit(1);
    }
  }
});

const main = defineCommand({
  meta: {
    name: "releasegate",
    description: "Staged model promotion with validation gates, approvals and rollback"
  },
  subCommands: {
    serve: serveCommand,
    submit: submitCommand,
    status: statusCommand,
    approve: approveCommand,
    reject: rejectCommand,
    cancel: cancelCommand,
    history: historyCommand,
    environments: environmentsCommand,
    validate: validateCommand
  }
});

void runMain(main);
