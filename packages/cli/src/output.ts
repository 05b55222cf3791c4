import chalk from "chalk";
import Table from "cli-table3";
import type { EnvironmentView, PromotionState, RunView } from "@releasegate/core";

export function colorState(state: PromotionState): string {
  switch (state) {
    case "PROMOTED":
      return chalk.green(state);
    case "FAILED":
    case "ROLLBACK_FAILED":
      return chalk.red(state);
    case "ROLLED_BACK":
    case "ROLLING_BACK":
      return chalk.yellow(state);
    case "AWAITING_APPROVAL":
      return chalk.magenta(state);
    default:
      return chalk.cyan(state);
  }
}

export function formatRun(run: RunView): string {
  const lines = [
    chalk.bold(`Promotion ${run.id}`),
    `  Artifact:    ${run.artifact_id}`,
    `  Target:      ${run.environment} (${run.legs.join(" -> ")})`,
    `  State:       ${colorState(run.state)} in ${run.current_environment}`,
    `  Requested:   ${run.requested_by} (${run.trigger}) at ${run.created_at}`
  ];
  if (run.endpoint_id) {
    lines.push(`  Endpoint:    ${run.endpoint_id}`);
  }
  if (run.outcome) {
    lines.push(`  Outcome:     ${run.outcome.detail}`);
  }

  const history = new Table({
    head: ["At", "From", "To", "Detail"],
    style: { head: ["cyan"] },
    wordWrap: true,
    colWidths: [26, 19, 19, 60]
  });
  for (const record of run.history) {
    history.push([record.at, record.from ?? "-", record.to, record.detail]);
  }
  lines.push("", history.toString());

  for (const report of run.reports) {
    const status = report.passed ? chalk.green("passed") : chalk.red("failed");
    lines.push("", `  Suite '${report.suite}' in ${report.environment}: ${status}`);
    for (const check of report.checks) {
      lines.push(`    ${check.passed ? chalk.green("✔") : chalk.red("✖")} ${check.name}: ${check.detail}`);
    }
  }

  for (const approval of run.approvals) {
    const note = approval.note ? ` (${approval.note})` : "";
    lines.push(`  ${approval.decision} by ${approval.by} for ${approval.environment}${note}`);
  }

  for (const entry of run.outstanding) {
    lines.push(
      chalk.yellow(
        `  abandoned ${entry.operation} on ${entry.environment}: ${entry.resolution ?? "still unresolved"}`
      )
    );
  }

  return lines.join("\n");
}

export function printRun(run: RunView): void {
  console.log(formatRun(run));
}

export function printHistory(runs: RunView[]): void {
  const table = new Table({
    head: ["Run", "Artifact", "Environment", "State", "Created", "Completed"],
    style: { head: ["cyan"] }
  });

  for (const run of runs) {
    table.push([
      run.id,
      run.artifact_id,
      run.environment,
      colorState(run.state),
      run.created_at,
      run.completed_at ?? "-"
    ]);
  }

  console.log(table.toString());
}

export function printEnvironments(environments: EnvironmentView[]): void {
  const table = new Table({
    head: ["Environment", "Tier", "Requires", "Suite", "Policy", "Known good"],
    style: { head: ["cyan"] }
  });

  for (const env of environments) {
    table.push([
      env.name,
      env.tier,
      env.requires ?? "-",
      env.suite,
      describePolicy(env.policy),
      env.known_good ? `${env.known_good.artifact_id} (${env.known_good.promoted_at})` : "-"
    ]);
  }

  console.log(table.toString());
}

export function describePolicy(policy: EnvironmentView["policy"]): string {
  const parts: string[] = [];
  if (policy.min_accuracy !== undefined) parts.push(`accuracy >= ${policy.min_accuracy}`);
  if (policy.max_latency_p95_ms !== undefined) parts.push(`p95 <= ${policy.max_latency_p95_ms}ms`);
  if (policy.max_error_rate !== undefined) parts.push(`errors <= ${policy.max_error_rate}`);
  if (policy.requires_human_approval) parts.push("human approval");
  return parts.join(", ") || "none";
}
