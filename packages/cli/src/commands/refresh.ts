import type { IOutputService } from "../output/output.interface";
import { createCommandContext, type CommandOptions } from "./context";
import { reportSummary } from "./report";

export async function refresh(options: CommandOptions, output: IOutputService): Promise<number> {
  const { runner } = await createCommandContext(options, output);

  output.startSpinner("Reading resources...");
  try {
    const summary = await runner.refresh();
    output.stopSpinner(summary.ok ? "succeed" : "fail", summary.ok ? "State refreshed" : "Refresh failed");
    return reportSummary(output, summary);
  } finally {
    output.stopSpinner();
  }
}
