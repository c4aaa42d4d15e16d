/**
 * Shared team state
 *
 * Every field declares how a partial update is folded in:
 *   - append      messages, artifacts, errors (never truncated or reordered)
 *   - by key      workerOutputs (a later write for the same worker replaces the earlier one)
 *   - replace     everything else
 * Keep these three policies separate; the run's observable ordering depends on them.
 */

import { randomUUID } from "node:crypto";
import { Annotation } from "@langchain/langgraph";
import type { PlanStep, TeamArtifact, TeamMessage, WorkerOutput } from "./types.js";
import { TeamStatus } from "./types.js";

function replace<T>(_prev: T, next: T): T {
  return next;
}

function append<T>(prev: T[], next: T[]): T[] {
  return [...prev, ...next];
}

function overwriteByKey<T>(prev: Record<string, T>, next: Record<string, T>): Record<string, T> {
  return { ...prev, ...next };
}

export const TeamStateAnnotation = Annotation.Root({
  taskId: Annotation<string>({ reducer: replace, default: () => "" }),
  task: Annotation<string>({ reducer: replace, default: () => "" }),
  status: Annotation<TeamStatus>({ reducer: replace, default: () => TeamStatus.Pending }),
  messages: Annotation<TeamMessage[]>({ reducer: append, default: () => [] }),
  artifacts: Annotation<TeamArtifact[]>({ reducer: append, default: () => [] }),
  currentWorker: Annotation<string | null>({ reducer: replace, default: () => null }),
  workerOutputs: Annotation<Record<string, WorkerOutput>>({
    reducer: overwriteByKey,
    default: () => ({}),
  }),
  context: Annotation<Record<string, unknown>>({ reducer: replace, default: () => ({}) }),
  plan: Annotation<PlanStep[]>({ reducer: replace, default: () => [] }),
  currentStep: Annotation<number>({ reducer: replace, default: () => 0 }),
  errors: Annotation<string[]>({ reducer: append, default: () => [] }),
  metadata: Annotation<Record<string, unknown>>({ reducer: replace, default: () => ({}) }),
  /** Next plan index to consider. */
  cursor: Annotation<number>({ reducer: replace, default: () => 0 }),
  /** Steps actually dispatched (skipped steps do not count). */
  iterations: Annotation<number>({ reducer: replace, default: () => 0 }),
  /** Set when a failed step ends the loop early under the "stop" error policy. */
  halted: Annotation<boolean>({ reducer: replace, default: () => false }),
});

export type TeamState = typeof TeamStateAnnotation.State;

export type TeamStateUpdate = Partial<TeamState>;

export function createTaskId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Fresh state for one run. Context and metadata are copied, not shared.
 */
export function createInitialState(
  task: string,
  options: { context?: Record<string, unknown>; metadata?: Record<string, unknown> } = {},
): TeamState {
  return {
    taskId: createTaskId(),
    task,
    status: TeamStatus.Pending,
    messages: [],
    artifacts: [],
    currentWorker: null,
    workerOutputs: {},
    context: { ...options.context },
    plan: [],
    currentStep: 0,
    errors: [],
    metadata: { ...options.metadata },
    cursor: 0,
    iterations: 0,
    halted: false,
  };
}

/**
 * Fold an update into a state snapshot with the same policies the graph uses.
 * Used outside the graph, e.g. to record the terminal error of a failed run.
 */
export function applyUpdate(state: TeamState, update: TeamStateUpdate): TeamState {
  return {
    ...state,
    ...update,
    messages: append(state.messages, update.messages ?? []),
    artifacts: append(state.artifacts, update.artifacts ?? []),
    errors: append(state.errors, update.errors ?? []),
    workerOutputs: overwriteByKey(state.workerOutputs, update.workerOutputs ?? {}),
  };
}
