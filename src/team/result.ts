/**
 * Team results
 */

import { isRecord, isSubstantial, stringifyResult } from "./dispatcher.js";
import type { TeamState } from "./state.js";
import type { TeamArtifact, TeamMessage, WorkerOutput } from "./types.js";
import { TeamStatus } from "./types.js";

export const RESULT_SEPARATOR = "\n\n---\n\n";

/**
 * Text for one compiled block: the result's `content`, `research` or `analysis`
 * field (first key present), else the whole result. A present but empty
 * field renders as `null` or `undefined`.
 */
export function extractResultText(result: unknown): string {
  if (isRecord(result)) {
    for (const key of ["content", "research", "analysis"]) {
      if (key in result) {
        const value = result[key];
        return value === null || value === undefined ? String(value) : stringifyResult(value);
      }
    }
  }
  return stringifyResult(result);
}

/**
 * One `**<workerKind>**:\n<text>` block per successful worker, in the insertion
 * order of `workerOutputs`, joined by a `---` rule. Falls back to
 * `Task completed: <task>` when no worker produced anything usable.
 */
export function compileResult(state: Pick<TeamState, "task" | "workerOutputs">): string {
  const blocks: string[] = [];
  for (const [workerKind, output] of Object.entries(state.workerOutputs)) {
    if (output.success && isSubstantial(output.result)) {
      blocks.push(`**${workerKind}**:\n${extractResultText(output.result)}`);
    }
  }
  return blocks.length > 0 ? blocks.join(RESULT_SEPARATOR) : `Task completed: ${state.task}`;
}

export interface TeamResultJSON {
  task_id: string;
  team_name: string;
  status: TeamStatus;
  result: string | null;
  artifacts: TeamArtifact[];
  agent_outputs: Record<string, WorkerOutput>;
  duration_ms: number;
  iterations: number;
  errors: string[];
  metadata: Record<string, unknown>;
}

export interface TeamResultFields {
  taskId: string;
  teamName: string;
  status: TeamStatus;
  result: string | null;
  artifacts: readonly TeamArtifact[];
  workerOutputs: Readonly<Record<string, WorkerOutput>>;
  messages: readonly TeamMessage[];
  durationMs: number;
  iterations: number;
  errors: readonly string[];
  metadata: Readonly<Record<string, unknown>>;
}

/**
 * Outcome of one `execute` call. `Completed` does not mean every worker
 * succeeded; check `errors` and each `workerOutputs[kind].success` as well.
 */
export class TeamResult {
  readonly taskId: string;
  readonly teamName: string;
  readonly status: TeamStatus;
  readonly result: string | null;
  readonly artifacts: readonly TeamArtifact[];
  readonly workerOutputs: Readonly<Record<string, WorkerOutput>>;
  readonly messages: readonly TeamMessage[];
  readonly durationMs: number;
  readonly iterations: number;
  readonly errors: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(fields: TeamResultFields) {
    this.taskId = fields.taskId;
    this.teamName = fields.teamName;
    this.status = fields.status;
    this.result = fields.result;
    this.artifacts = Object.freeze([...fields.artifacts]);
    this.workerOutputs = Object.freeze({ ...fields.workerOutputs });
    this.messages = Object.freeze([...fields.messages]);
    this.durationMs = fields.durationMs;
    this.iterations = fields.iterations;
    this.errors = Object.freeze([...fields.errors]);
    this.metadata = Object.freeze({ ...fields.metadata });
    Object.freeze(this);
  }

  get success(): boolean {
    return this.status === TeamStatus.Completed;
  }

  toJSON(): TeamResultJSON {
    return {
      task_id: this.taskId,
      team_name: this.teamName,
      status: this.status,
      result: this.result,
      artifacts: [...this.artifacts],
      agent_outputs: { ...this.workerOutputs },
      duration_ms: this.durationMs,
      iterations: this.iterations,
      errors: [...this.errors],
      metadata: { ...this.metadata },
    };
  }
}
