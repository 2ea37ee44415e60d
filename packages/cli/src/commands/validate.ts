import chalk from "chalk";
import { describeError } from "@dbplane/core";
import { loadFeatureFlags } from "../config/cli-config";
import type { IOutputService } from "../output/output.interface";
import { loadPlan } from "../plan/plan-file";
import { validatePlan } from "../plan/validate-plan";

export interface ValidateOptions {
  config?: string;
}

/** Checks a plan without contacting the service. */
export async function validate(planPath: string, options: ValidateOptions, output: IOutputService): Promise<number> {
  const plan = await loadPlan(planPath);
  const flags = await loadFeatureFlags({ configPath: options.config });
  const problems = validatePlan(plan, flags);

  if (problems.length === 0) {
    output.success(`${planPath}: ${plan.resources.length} resource(s) valid`);
    return 0;
  }

  for (const problem of problems) {
    output.error(`${problem.kind} ${chalk.cyan(problem.key)}: ${describeError(problem.error)}`);
  }
  return 1;
}
