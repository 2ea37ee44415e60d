#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { DBPLANE_VERSION, describeError } from "@dbplane/core";
import { apply } from "./commands/apply";
import { DEFAULT_STATE_FILE } from "./commands/context";
import { destroy } from "./commands/destroy";
import { refresh } from "./commands/refresh";
import { validate } from "./commands/validate";
import { ConsoleOutput } from "./output/console-output";

interface GlobalOptions {
  state: string;
  config?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("dbplane")
  .description("Reconcile managed-database resources against a plan file")
  .version(DBPLANE_VERSION);

function withStateOptions(command: Command): Command {
  return command
    .option("-s, --state <path>", "State file", DEFAULT_STATE_FILE)
    .option("-c, --config <path>", "Configuration file (default: ~/.dbplane/config.json)")
    .option("-v, --verbose", "Log engine progress and API traffic");
}

async function run(action: () => Promise<number>): Promise<void> {
  process.exitCode = await action();
}

program
  .command("validate")
  .description("Check a plan file without contacting the service")
  .argument("<plan>", "Plan file")
  .option("-c, --config <path>", "Configuration file (default: ~/.dbplane/config.json)")
  .action((plan: string, options: { config?: string }) => run(() => validate(plan, options, new ConsoleOutput())));

withStateOptions(
  program
    .command("apply")
    .description("Create, update and delete resources until they match the plan")
    .argument("<plan>", "Plan file"),
).action((plan: string, options: GlobalOptions) =>
  run(() => apply(plan, options, new ConsoleOutput(options.verbose))),
);

withStateOptions(
  program.command("refresh").description("Re-read every resource in the state file"),
).action((options: GlobalOptions) => run(() => refresh(options, new ConsoleOutput(options.verbose))));

withStateOptions(
  program
    .command("destroy")
    .description("Delete every resource in the state file, newest first")
    .option("-y, --yes", "Confirm deletion"),
).action((options: GlobalOptions & { yes?: boolean }) =>
  run(() => destroy(options, new ConsoleOutput(options.verbose))),
);

program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    if (error.code !== "commander.help" && error.code !== "commander.version" && error.code !== "commander.helpDisplayed") {
      process.exitCode = error.exitCode;
    }
    return;
  }
  console.error(chalk.red("Error:"), describeError(error));
  process.exitCode = 1;
});
