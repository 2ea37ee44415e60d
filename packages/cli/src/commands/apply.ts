import type { IOutputService } from "../output/output.interface";
import { loadPlan } from "../plan/plan-file";
import { validatePlan } from "../plan/validate-plan";
import { createCommandContext, interruptSignal, type CommandOptions } from "./context";
import { reportSummary } from "./report";

export async function apply(planPath: string, options: CommandOptions, output: IOutputService): Promise<number> {
  const plan = await loadPlan(planPath);
  const { config, runner } = await createCommandContext(options, output);

  // Nothing is submitted while any resource would be rejected up front.
  const problems = validatePlan(plan, config.engine.featureFlags);
  if (problems.length > 0) {
    return reportSummary(output, {
      ok: false,
      outcomes: problems.map((problem) => ({ ...problem, action: "failed" as const, id: null })),
    });
  }

  output.header(`Applying ${planPath}`);
  const interrupt = interruptSignal();
  output.startSpinner("Reconciling...");
  try {
    const summary = await runner.apply(plan, { signal: interrupt.signal });
    output.stopSpinner(summary.ok ? "succeed" : "fail", summary.ok ? "Apply complete" : "Apply failed");
    return reportSummary(output, summary);
  } finally {
    output.stopSpinner();
    interrupt.dispose();
  }
}
