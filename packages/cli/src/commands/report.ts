import chalk from "chalk";
import { describeError } from "@dbplane/core";
import type { IOutputService } from "../output/output.interface";
import type { ResourceAction, RunSummary } from "../plan/plan-runner";

const ACTION_LABELS: Record<ResourceAction, string> = {
  created: chalk.green("created"),
  updated: chalk.cyan("updated"),
  unchanged: chalk.gray("unchanged"),
  drifted: chalk.yellow("drifted"),
  refreshed: chalk.gray("refreshed"),
  deleted: chalk.red("deleted"),
  gone: chalk.gray("already gone"),
  skipped: chalk.yellow("skipped"),
  failed: chalk.red.bold("failed"),
};

/** Prints one line per resource and returns the process exit code. */
export function reportSummary(output: IOutputService, summary: RunSummary): number {
  output.newline();
  if (summary.outcomes.length === 0) {
    output.dim("Nothing to do.");
  }
  for (const outcome of summary.outcomes) {
    const id = outcome.id ? chalk.gray(` (${outcome.id})`) : "";
    output.info(`  ${outcome.kind} ${chalk.cyan(outcome.key)}${id}: ${ACTION_LABELS[outcome.action]}`);
    if (outcome.drift && outcome.drift.length > 0) {
      output.warn(`    changed outside the plan: ${outcome.drift.join(", ")}`);
    }
    if (outcome.action === "failed") {
      output.error(`    ${describeError(outcome.error)}`);
    }
  }
  output.newline();
  return summary.ok ? 0 : 1;
}
