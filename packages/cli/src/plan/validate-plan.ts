import type { FeatureFlags } from "@dbplane/core";
import type { Plan } from "./plan-file";
import { RESOURCE_DEFINITIONS, type ResourceKind } from "./resource-kinds";

export interface PlanProblem {
  key: string;
  kind: ResourceKind;
  error: unknown;
}

/** Runs every offline check on every resource; an empty result means the plan is valid. */
export function validatePlan(plan: Plan, flags: FeatureFlags): PlanProblem[] {
  const problems: PlanProblem[] = [];
  for (const resource of plan.resources) {
    try {
      RESOURCE_DEFINITIONS[resource.kind].validate(resource.spec, flags);
    } catch (error) {
      problems.push({ key: resource.key, kind: resource.kind, error });
    }
  }
  return problems;
}
