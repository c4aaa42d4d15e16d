/**
 * Plan Builder
 * Derives the ordered step list for a task from the team's roles
 */

import type { RoleDescriptor } from "./schema.js";
import type { PlanStep } from "./types.js";
import { StepAction, TeamRoleKind } from "./types.js";

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Build the execution plan. Pure: the same roles always give the same plan.
 *
 * Order is fixed:
 *   1. the first lead analyzes the task
 *   2. researchers and analysts, in list order
 *   3. writers and executors, in list order
 *   4. the first reviewer reviews
 * When none of those matched (no roles, or monitors only) every role gets a
 * `process` step in list order.
 *
 * Only the first lead and the first reviewer get a step; later ones are dropped.
 * `task` is accepted for the contract but does not influence the plan.
 */
export function buildPlan(roles: readonly RoleDescriptor[], _task: string): PlanStep[] {
  const plan: PlanStep[] = [];
  const push = (workerKind: string, action: StepAction, description: string) => {
    plan.push({ index: plan.length, workerKind, action, description });
  };

  const lead = roles.find((r) => r.role === TeamRoleKind.Lead);
  if (lead) {
    push(lead.workerKind, StepAction.AnalyzeTask, `Lead (${lead.workerKind}) analyzes task`);
  }

  for (const role of roles) {
    if (role.role === TeamRoleKind.Researcher || role.role === TeamRoleKind.Analyst) {
      push(
        role.workerKind,
        role.role === TeamRoleKind.Researcher ? StepAction.Research : StepAction.Analyze,
        `${titleCase(role.role)} (${role.workerKind}) processes task`,
      );
    }
  }

  for (const role of roles) {
    if (role.role === TeamRoleKind.Writer || role.role === TeamRoleKind.Executor) {
      push(
        role.workerKind,
        role.role === TeamRoleKind.Writer ? StepAction.Generate : StepAction.Execute,
        `${titleCase(role.role)} (${role.workerKind}) produces output`,
      );
    }
  }

  const reviewer = roles.find((r) => r.role === TeamRoleKind.Reviewer);
  if (reviewer) {
    push(reviewer.workerKind, StepAction.Review, `Reviewer (${reviewer.workerKind}) reviews output`);
  }

  if (plan.length === 0) {
    for (const role of roles) {
      push(role.workerKind, StepAction.Process, `${role.workerKind} processes task`);
    }
  }

  return plan;
}

/**
 * Lead roles after the first; `buildPlan` gives them no step.
 */
export function droppedLeads(roles: readonly RoleDescriptor[]): RoleDescriptor[] {
  return roles.filter((r) => r.role === TeamRoleKind.Lead).slice(1);
}
