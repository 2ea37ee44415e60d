import chalk from "chalk";
import ora, { Ora } from "ora";
import type { LogCallback } from "@dbplane/core";
import type { IOutputService } from "./output.interface";

export class ConsoleOutput implements IOutputService {
  private spinner: Ora | null = null;

  constructor(private readonly verbose = false) {}

  header(text: string): void {
    this.print(chalk.blue.bold(text));
  }

  info(text: string): void {
    this.print(chalk.white(text));
  }

  success(text: string): void {
    this.print(chalk.green(`✓ ${text}`));
  }

  warn(text: string): void {
    this.print(chalk.yellow(`⚠ ${text}`));
  }

  error(text: string): void {
    this.print(chalk.red(`✗ ${text}`), true);
  }

  dim(text: string): void {
    this.print(chalk.gray(text));
  }

  newline(): void {
    this.print("");
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    this.spinner = ora(text).start();
  }

  updateSpinner(text: string): void {
    if (this.spinner) this.spinner.text = text;
  }

  stopSpinner(outcome?: "succeed" | "fail", text?: string): void {
    if (!this.spinner) return;
    if (outcome === "succeed") this.spinner.succeed(text);
    else if (outcome === "fail") this.spinner.fail(text);
    else this.spinner.stop();
    this.spinner = null;
  }

  // Engine progress lines are noise unless --verbose; failures always show.
  readonly log: LogCallback = (message, stream) => {
    if (stream === "stderr") {
      this.print(chalk.yellow(message), true);
    } else if (this.verbose) {
      this.print(chalk.gray(message));
    }
  };

  private print(line: string, toStderr = false): void {
    this.spinner?.clear();
    if (toStderr) {
      console.error(line);
    } else {
      console.log(line);
    }
    this.spinner?.render();
  }
}
