import type { IOutputService } from "../output/output.interface";
import { createCommandContext, interruptSignal, type CommandOptions } from "./context";
import { reportSummary } from "./report";

export interface DestroyOptions extends CommandOptions {
  yes?: boolean;
}

export async function destroy(options: DestroyOptions, output: IOutputService): Promise<number> {
  if (options.yes !== true) {
    output.warn("destroy deletes every resource in the state file. Re-run with --yes to proceed.");
    return 1;
  }

  const { runner } = await createCommandContext(options, output);
  const interrupt = interruptSignal();
  output.startSpinner("Deleting resources...");
  try {
    const summary = await runner.destroy({ signal: interrupt.signal });
    output.stopSpinner(summary.ok ? "succeed" : "fail", summary.ok ? "Destroy complete" : "Destroy failed");
    return reportSummary(output, summary);
  } finally {
    output.stopSpinner();
    interrupt.dispose();
  }
}
