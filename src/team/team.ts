/**
 * Agent Team
 * Binds role workers, plans a task and drives the dispatch loop as a LangGraph StateGraph
 *
 *   START -> bind_workers -> build_plan -> dispatch_step (repeats) -> finalize -> END
 *
 * A run ends `completed` when the loop finishes, hits `maxIterations` or stops
 * early under the "stop" error policy, `failed` on a required binding failure
 * or an engine fault, and `cancelled` on timeout, caller abort or `cancel()`.
 */

import { EventEmitter } from "node:events";
import { END, START, StateGraph } from "@langchain/langgraph";
import { createSubsystemLogger } from "../logger.js";
import { dispatchStep, type StepUpdate } from "./dispatcher.js";
import { RunCancelledError, WorkerBindingError, errorMessage } from "./errors.js";
import { buildPlan, droppedLeads } from "./planner.js";
import { compileResult, TeamResult } from "./result.js";
import {
  createRole,
  createTeamConfig,
  sortByPriority,
  type RoleDescriptorInput,
  type TeamConfigInput,
} from "./roles.js";
import type { RoleDescriptor, TeamConfig } from "./schema.js";
import {
  TeamStateAnnotation,
  applyUpdate,
  createInitialState,
  type TeamState,
  type TeamStateUpdate,
} from "./state.js";
import type {
  ExecuteOptions,
  PlanStep,
  TeamStatusSnapshot,
  Worker,
  WorkerOutput,
  WorkerResolver,
} from "./types.js";
import { ErrorHandlingMode, TeamStatus } from "./types.js";

const log = createSubsystemLogger("teams");

export const TeamEvents = {
  RunStarted: "run:started",
  StepCompleted: "step:completed",
  StepSkipped: "step:skipped",
  Checkpoint: "checkpoint",
  RunFinished: "run:finished",
} as const;

export interface StepEvent {
  taskId: string;
  step: PlanStep;
  output?: WorkerOutput;
}

export interface CheckpointEvent {
  taskId: string;
  step: PlanStep;
  requiresApproval: boolean;
  state: TeamState;
}

export interface AgentTeamOptions {
  config: TeamConfigInput;
  roles: readonly RoleDescriptorInput[];
  resolver: WorkerResolver;
}

interface RunContext {
  taskId: string;
  controller: AbortController;
  bindings: Map<string, Worker>;
}

type NextNode = "dispatch_step" | "finalize";

/** Longest delay setTimeout accepts; larger values fire immediately. */
const MAX_TIMER_MS = 2_147_483_647;

function cancellationOf(signal: AbortSignal): RunCancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof RunCancelledError) {
    return reason;
  }
  return new RunCancelledError(`Run cancelled: ${errorMessage(reason ?? "aborted")}`);
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw cancellationOf(signal);
  }
}

/**
 * Settle with `work`, or reject as soon as the signal aborts.
 */
function raceCancellation<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(cancellationOf(signal));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(cancellationOf(signal));
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

function preview(task: string): string {
  return task.length > 50 ? `${task.slice(0, 50)}...` : task;
}

export class AgentTeam extends EventEmitter {
  readonly config: TeamConfig;
  /** Ordered by descending priority. */
  readonly roles: readonly RoleDescriptor[];
  private resolver: WorkerResolver;
  private workers = new Map<string, Worker>();
  private currentTaskId: string | null = null;
  private activeRun: RunContext | null = null;
  private runQueue: Promise<unknown> = Promise.resolve();

  constructor(options: AgentTeamOptions) {
    super();
    this.config = createTeamConfig(options.config);
    this.roles = Object.freeze(sortByPriority(options.roles.map((role) => createRole(role))));
    this.resolver = options.resolver;

    const extraLeads = droppedLeads(this.roles);
    if (extraLeads.length > 0) {
      log.warn(
        `team "${this.config.name}" has ${extraLeads.length + 1} lead roles; ` +
          `only the first gets a plan step (dropped: ${extraLeads.map((r) => r.workerKind).join(", ")})`,
      );
    }

    log.info(`team "${this.config.name}" initialized with ${this.roles.length} roles`);
  }

  get name(): string {
    return this.config.name;
  }

  /**
   * Swap the resolver. Cached worker bindings are dropped.
   */
  setResolver(resolver: WorkerResolver): void {
    this.resolver = resolver;
    this.workers.clear();
  }

  /**
   * Run the task once. Runs on the same team are queued, so each gets its own state.
   */
  execute(
    task: string,
    context: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<TeamResult> {
    const run = this.runQueue.then(() => this.runOnce(task, context, options));
    this.runQueue = run.catch((error: unknown) => {
      log.error(`team "${this.config.name}" run rejected: ${errorMessage(error)}`);
    });
    return run;
  }

  /**
   * Same as `execute`, started on a later turn of the event loop so that
   * synchronous worker code never runs inside the caller's turn.
   */
  async executeAsync(
    task: string,
    context: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<TeamResult> {
    await new Promise<void>((resolve) => setImmediate(resolve));
    return this.execute(task, context, options);
  }

  /**
   * Abort the in-flight run. Returns false when nothing is running.
   */
  cancel(reason = "Run cancelled"): boolean {
    if (!this.activeRun) {
      return false;
    }
    this.activeRun.controller.abort(new RunCancelledError(reason));
    return true;
  }

  getStatus(): TeamStatusSnapshot {
    return {
      name: this.config.name,
      roles: this.roles.map((r) => r.workerKind),
      boundWorkers: [...this.workers.keys()],
      currentTaskId: this.currentTaskId,
      running: this.activeRun !== null,
    };
  }

  private async runOnce(
    task: string,
    context: Record<string, unknown>,
    options: ExecuteOptions,
  ): Promise<TeamResult> {
    const startedAt = performance.now();
    const initial = createInitialState(task, { context, metadata: { ...this.config.metadata } });
    const run: RunContext = {
      taskId: initial.taskId,
      controller: new AbortController(),
      bindings: new Map(),
    };
    this.currentTaskId = run.taskId;
    this.activeRun = run;

    const timeoutSeconds = options.timeoutSeconds ?? this.config.timeoutSeconds;
    const timer = setTimeout(() => {
      run.controller.abort(new RunCancelledError(`Run timed out after ${timeoutSeconds}s`));
    }, Math.min(timeoutSeconds * 1000, MAX_TIMER_MS));
    timer.unref();

    const onCallerAbort = () => {
      run.controller.abort(
        new RunCancelledError(`Run cancelled: ${errorMessage(options.signal?.reason ?? "aborted")}`),
      );
    };
    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    let latest: TeamState = { ...initial, status: TeamStatus.Initializing };
    let final: TeamState;

    try {
      if (this.config.parallelExecution) {
        log.debug(`team "${this.config.name}": parallel execution requested, steps run sequentially`);
      }
      log.info(`team "${this.config.name}" starting task ${run.taskId}: ${preview(task)}`);
      this.emit(TeamEvents.RunStarted, { taskId: run.taskId, task });

      const graph = this.buildGraph(run);
      const stream = await graph.stream(latest, {
        streamMode: "values",
        recursionLimit: this.roles.length + 10,
        signal: run.controller.signal,
      });
      for await (const values of stream) {
        latest = values;
      }
      if (latest.status !== TeamStatus.Completed && latest.status !== TeamStatus.Failed) {
        // the graph stopped before finalize; only an abort does that
        throwIfCancelled(run.controller.signal);
      }
      final = latest;
    } catch (error) {
      if (run.controller.signal.aborted) {
        const cancellation = cancellationOf(run.controller.signal);
        log.warn(`team "${this.config.name}" task ${run.taskId} cancelled: ${cancellation.message}`);
        final = applyUpdate(latest, { status: TeamStatus.Cancelled, errors: [cancellation.message] });
      } else {
        log.error(`team "${this.config.name}" execution failed: ${errorMessage(error)}`);
        final = applyUpdate(latest, { status: TeamStatus.Failed, errors: [errorMessage(error)] });
      }
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onCallerAbort);
      this.activeRun = null;
    }

    const result = new TeamResult({
      taskId: final.taskId,
      teamName: this.config.name,
      status: final.status,
      result: final.status === TeamStatus.Completed ? compileResult(final) : null,
      artifacts: final.artifacts,
      workerOutputs: final.workerOutputs,
      messages: final.messages,
      durationMs: performance.now() - startedAt,
      iterations: final.iterations,
      errors: final.errors,
      metadata: final.metadata,
    });

    log.info(
      `team "${this.config.name}" task ${run.taskId} ${result.status} ` +
        `(${result.iterations} steps, ${result.errors.length} errors, ${result.durationMs.toFixed(0)}ms)`,
    );
    this.notify(TeamEvents.RunFinished, result);
    return result;
  }

  private buildGraph(run: RunContext) {
    const next = (state: TeamState): NextNode => this.nextNode(state);
    return new StateGraph(TeamStateAnnotation)
      .addNode("bind_workers", () => this.bindWorkersNode(run))
      .addNode("build_plan", (state: TeamState) => this.buildPlanNode(run, state))
      .addNode("dispatch_step", (state: TeamState) => this.dispatchStepNode(run, state))
      .addNode("finalize", (state: TeamState) => this.finalizeNode(state))
      .addEdge(START, "bind_workers")
      .addEdge("bind_workers", "build_plan")
      .addConditionalEdges("build_plan", next, { dispatch_step: "dispatch_step", finalize: "finalize" })
      .addConditionalEdges("dispatch_step", next, {
        dispatch_step: "dispatch_step",
        finalize: "finalize",
      })
      .addEdge("finalize", END)
      .compile();
  }

  private nextNode(state: TeamState): NextNode {
    if (state.halted || state.cursor >= state.plan.length) {
      return "finalize";
    }
    if (state.iterations >= this.config.maxIterations) {
      log.warn(`team "${this.config.name}": max iterations (${this.config.maxIterations}) reached`);
      return "finalize";
    }
    return "dispatch_step";
  }

  private async bindWorkersNode(run: RunContext): Promise<TeamStateUpdate> {
    throwIfCancelled(run.controller.signal);
    for (const role of this.roles) {
      if (run.bindings.has(role.workerKind)) {
        continue;
      }
      let worker: Worker | undefined;
      let reason = "worker kind not found";
      try {
        worker = await raceCancellation(this.loadWorker(role.workerKind), run.controller.signal);
      } catch (error) {
        if (error instanceof RunCancelledError) {
          throw error;
        }
        reason = errorMessage(error);
        log.error(`failed to load worker "${role.workerKind}": ${reason}`);
      }

      if (worker) {
        run.bindings.set(role.workerKind, worker);
      } else if (role.required) {
        throw new WorkerBindingError(role.workerKind, reason);
      } else {
        log.warn(`optional worker "${role.workerKind}" unavailable (${reason}); its steps will be skipped`);
      }
    }
    return {};
  }

  private async loadWorker(workerKind: string): Promise<Worker | undefined> {
    const cached = this.workers.get(workerKind);
    if (cached) {
      return cached;
    }
    const worker = await this.resolver.resolve(workerKind);
    if (worker) {
      this.workers.set(workerKind, worker);
      log.debug(`loaded worker: ${workerKind}`);
    }
    return worker;
  }

  private buildPlanNode(run: RunContext, state: TeamState): TeamStateUpdate {
    throwIfCancelled(run.controller.signal);
    const plan = buildPlan(this.roles, state.task);
    log.debug(`team "${this.config.name}" plan: ${plan.map((s) => `${s.workerKind}.${s.action}`).join(" -> ")}`);
    return { status: TeamStatus.Running, plan, cursor: 0 };
  }

  private async dispatchStepNode(run: RunContext, state: TeamState): Promise<TeamStateUpdate> {
    throwIfCancelled(run.controller.signal);
    const step = state.plan[state.cursor];
    const worker = run.bindings.get(step.workerKind);

    if (!worker) {
      log.warn(`worker "${step.workerKind}" not available, skipping step ${step.index}`);
      const skipped: StepEvent = { taskId: run.taskId, step };
      this.notify(TeamEvents.StepSkipped, skipped);
      return { cursor: state.cursor + 1 };
    }

    log.info(`executing ${step.workerKind}.${step.action} for task: ${preview(state.task)}`);
    const dispatching: TeamState = { ...state, currentWorker: step.workerKind, currentStep: step.index };
    let update = await raceCancellation(dispatchStep(worker, step, dispatching), run.controller.signal);

    if (update.errors.length > 0 && this.config.errorHandling === ErrorHandlingMode.Retry) {
      log.warn(`retrying ${step.workerKind}.${step.action} after: ${update.errors.join("; ")}`);
      update = await raceCancellation(dispatchStep(worker, step, dispatching), run.controller.signal);
    }

    const failed = update.errors.length > 0;
    if (failed) {
      log.error(update.errors.join("; "));
    }
    const halted = failed && this.config.errorHandling === ErrorHandlingMode.Stop;

    const completed: StepEvent = { taskId: run.taskId, step, output: update.workerOutputs[step.workerKind] };
    this.notify(TeamEvents.StepCompleted, completed);

    const stepUpdate: StepUpdate & TeamStateUpdate = {
      ...update,
      currentWorker: step.workerKind,
      currentStep: step.index,
      cursor: state.cursor + 1,
      iterations: state.iterations + 1,
      halted,
    };
    this.signalCheckpoint(run, step, applyUpdate(state, stepUpdate));
    return stepUpdate;
  }

  private finalizeNode(state: TeamState): TeamStateUpdate {
    if (state.halted) {
      log.warn(`team "${this.config.name}" ended early after a failed step (error handling: stop)`);
    }
    return { status: TeamStatus.Completed };
  }

  /**
   * Emit to listeners once the step's own work is done. A throwing listener is
   * logged and does not undo that work.
   */
  private notify(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      log.error(`team "${this.config.name}" ${event} listener failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Steps listed in `checkpointSteps` (by index, action or worker kind) emit a
   * checkpoint event; with `requireApproval` the listener is expected to gate.
   */
  private signalCheckpoint(run: RunContext, step: PlanStep, state: TeamState): void {
    const ids = this.config.checkpointSteps;
    if (ids.includes(String(step.index)) || ids.includes(step.action) || ids.includes(step.workerKind)) {
      const checkpoint: CheckpointEvent = {
        taskId: run.taskId,
        step,
        requiresApproval: this.config.requireApproval,
        state,
      };
      this.notify(TeamEvents.Checkpoint, checkpoint);
    }
  }
}
