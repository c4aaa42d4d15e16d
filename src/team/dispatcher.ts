/**
 * Step Dispatcher
 * Invokes one worker capability for one plan step and folds the outcome into state
 */

import { errorMessage } from "./errors.js";
import type { TeamState } from "./state.js";
import type {
  Capability,
  CapabilityName,
  PlanStep,
  TeamArtifact,
  TeamMessage,
  Worker,
  WorkerOutput,
} from "./types.js";
import { StepAction } from "./types.js";

export const OUTPUT_PREVIEW_LENGTH = 200;

type AuxiliarySource = "context" | "workerOutputs" | "artifacts";

interface ActionRoute {
  capabilities: readonly CapabilityName[];
  auxiliary: AuxiliarySource;
  fallback: (task: string) => unknown;
}

/** Tried after an action's own capabilities, before the synthesized output. */
const GENERIC_CAPABILITIES: readonly CapabilityName[] = ["process", "run"];

const ACTION_ROUTES: Readonly<Record<StepAction, ActionRoute>> = {
  [StepAction.AnalyzeTask]: {
    capabilities: ["analyzeTask", "research"],
    auxiliary: "context",
    fallback: (task) => ({ analysis: task, subtasks: [task] }),
  },
  [StepAction.Research]: {
    capabilities: ["research", "query"],
    auxiliary: "context",
    fallback: (task) => ({ research: `Research on: ${task}` }),
  },
  [StepAction.Analyze]: {
    capabilities: ["analyze", "research"],
    auxiliary: "context",
    fallback: (task) => ({ analysis: `Analysis of: ${task}` }),
  },
  [StepAction.Generate]: {
    capabilities: ["createContent", "generate"],
    auxiliary: "workerOutputs",
    fallback: (task) => ({ content: `Generated content for: ${task}` }),
  },
  [StepAction.Execute]: {
    capabilities: ["execute"],
    auxiliary: "context",
    fallback: (task) => ({ executed: true, task }),
  },
  [StepAction.Review]: {
    capabilities: ["review"],
    auxiliary: "artifacts",
    fallback: () => ({ reviewed: true, approved: true }),
  },
  [StepAction.Process]: {
    capabilities: [],
    auxiliary: "context",
    fallback: (task) => ({ processed: task }),
  },
};

/** The part of the state one dispatched step contributes to. */
export type StepUpdate = Pick<TeamState, "workerOutputs" | "messages" | "artifacts" | "errors">;

export interface ResolvedCapability {
  name: CapabilityName;
  invoke: Capability;
}

/**
 * First capability the worker exposes for an action, or undefined when the
 * synthesized output should be used.
 */
export function resolveCapability(worker: Worker, action: StepAction): ResolvedCapability | undefined {
  for (const name of [...ACTION_ROUTES[action].capabilities, ...GENERIC_CAPABILITIES]) {
    const capability = worker[name];
    if (typeof capability === "function") {
      return {
        name,
        invoke: (task, auxiliary) => capability.call(worker, task, auxiliary),
      };
    }
  }
  return undefined;
}

function auxiliaryFor(source: AuxiliarySource, state: TeamState): Record<string, unknown> {
  switch (source) {
    case "context":
      return state.context;
    case "workerOutputs":
      return { ...state.workerOutputs };
    case "artifacts":
      return { artifacts: [...state.artifacts] };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Whether a result counts as substantial output: not null, undefined, false,
 * 0, NaN, an empty string, an empty array or an empty object.
 */
export function isSubstantial(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === "") {
    return false;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (isRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Render a result as text: strings as-is, other values as JSON where possible.
 */
export function stringifyResult(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === undefined || value === null) {
    return "";
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Run one plan step against its bound worker.
 *
 * Never rejects: a failing capability becomes `success: false` on the worker's
 * output and one `"<workerKind>: <message>"` entry in `errors`.
 * Returns the update to fold into the state.
 */
export async function dispatchStep(
  worker: Worker,
  step: PlanStep,
  state: TeamState,
): Promise<StepUpdate> {
  const route = ACTION_ROUTES[step.action];
  const output: WorkerOutput = {
    worker: step.workerKind,
    action: step.action,
    result: null,
    success: false,
  };
  const errors: string[] = [];

  try {
    const capability = resolveCapability(worker, step.action);
    output.result = capability
      ? await capability.invoke(state.task, auxiliaryFor(route.auxiliary, state))
      : route.fallback(state.task);
    output.success = true;
  } catch (error) {
    const message = errorMessage(error);
    output.error = message;
    errors.push(`${step.workerKind}: ${message}`);
  }

  const message: TeamMessage = {
    worker: step.workerKind,
    action: step.action,
    step: step.index,
    timestamp: Date.now(),
    outputPreview: stringifyResult(output.result).slice(0, OUTPUT_PREVIEW_LENGTH),
  };

  const artifacts: TeamArtifact[] =
    output.success && isSubstantial(output.result)
      ? [{ source: step.workerKind, type: step.action, content: output.result }]
      : [];

  return {
    workerOutputs: { [step.workerKind]: output },
    messages: [message],
    artifacts,
    errors,
  };
}

