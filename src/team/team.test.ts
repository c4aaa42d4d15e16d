/**
 * Test Suite for Agent Team
 * Validates plan execution, failure isolation, binding, limits and cancellation
 */

import { describe, it, expect, vi } from "vitest";
import { AgentTeam, TeamEvents, type CheckpointEvent, type StepEvent } from "./team.js";
import type { RoleDescriptorInput, TeamConfigInput } from "./roles.js";
import type { TeamResult } from "./result.js";
import { StepAction, TeamRoleKind, TeamStatus, type Worker, type WorkerResolver } from "./types.js";
import { WorkerRegistry } from "./workers.js";

function registryOf(workers: Record<string, Worker>): WorkerRegistry {
  const registry = new WorkerRegistry();
  for (const [kind, worker] of Object.entries(workers)) {
    registry.registerInstance(kind, worker);
  }
  return registry;
}

function makeTeam(
  roles: RoleDescriptorInput[],
  workers: Record<string, Worker>,
  config: Partial<TeamConfigInput> = {},
): AgentTeam {
  return new AgentTeam({ config: { name: "test-team", ...config }, roles, resolver: registryOf(workers) });
}

/** Worker whose `process` never settles; `started` resolves once it is called. */
function hangingWorker(): { worker: Worker; started: Promise<void> } {
  let markStarted: () => void = () => {};
  const started = new Promise<void>((resolve) => {
    markStarted = resolve;
  });
  return {
    started,
    worker: {
      process: () => {
        markStarted();
        return new Promise(() => {});
      },
    },
  };
}

function comparable(result: TeamResult) {
  return {
    status: result.status,
    result: result.result,
    iterations: result.iterations,
    errors: result.errors,
    artifacts: result.artifacts,
    workerOutputs: result.workerOutputs,
  };
}

describe("AgentTeam", () => {
  describe("Plan Execution", () => {
    it("should run lead, researcher, writer and reviewer in order", async () => {
      const team = makeTeam(
        [
          { workerKind: "editor", role: TeamRoleKind.Reviewer },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
          { workerKind: "digger", role: TeamRoleKind.Researcher },
          { workerKind: "boss", role: TeamRoleKind.Lead },
        ],
        { editor: {}, scribe: {}, digger: {}, boss: {} },
      );

      const result = await team.execute("plan a launch");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(4);
      expect(result.messages.map((m) => [m.step, m.worker, m.action])).toEqual([
        [0, "boss", StepAction.AnalyzeTask],
        [1, "digger", StepAction.Research],
        [2, "scribe", StepAction.Generate],
        [3, "editor", StepAction.Review],
      ]);
      expect(Object.keys(result.workerOutputs)).toEqual(["boss", "digger", "scribe", "editor"]);
      expect(result.artifacts).toHaveLength(4);
      expect(result.errors).toEqual([]);
    });

    it("should complete an empty team with the fallback result", async () => {
      const team = makeTeam([], {});

      const result = await team.execute("nothing to do");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(0);
      expect(result.result).toBe("Task completed: nothing to do");
      expect(result.workerOutputs).toEqual({});
    });

    it("should run a single-role team in one step", async () => {
      const team = makeTeam([{ workerKind: "solo", role: TeamRoleKind.Writer }], {
        solo: { createContent: (task) => ({ content: `Done: ${task}` }) },
      });

      const result = await team.execute("write it");

      expect(result.iterations).toBe(1);
      expect(result.result).toBe("**solo**:\nDone: write it");
    });

    it("should compile the lead analysis and the writer content", async () => {
      const team = makeTeam(
        [
          { workerKind: "alpha", role: TeamRoleKind.Lead },
          { workerKind: "beta", role: TeamRoleKind.Writer },
        ],
        {
          alpha: { analyzeTask: (task) => ({ analysis: task, subtasks: [task] }) },
          beta: { createContent: () => ({ content: "Memo: ..." }) },
        },
      );

      const result = await team.execute("draft a memo");

      expect(result.result).toBe("**alpha**:\ndraft a memo\n\n---\n\n**beta**:\nMemo: ...");
      expect(result.success).toBe(true);
    });

    it("should hand the run context to workers", async () => {
      const research = vi.fn(() => "notes");
      const team = makeTeam([{ workerKind: "digger", role: TeamRoleKind.Researcher }], { digger: { research } });

      await team.execute("look up", { region: "eu" });

      expect(research).toHaveBeenCalledWith("look up", { region: "eu" });
    });

    it("should produce the same outcome for the same inputs", async () => {
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        { boss: {}, scribe: { createContent: (task) => `text for ${task}` } },
      );

      const first = await team.execute("repeatable");
      const second = await team.execute("repeatable");

      expect(comparable(second)).toEqual(comparable(first));
      expect(second.taskId).not.toBe(first.taskId);
    });

    it("should order roles by descending priority", () => {
      const team = makeTeam(
        [
          { workerKind: "low", role: TeamRoleKind.Analyst, priority: 1 },
          { workerKind: "high", role: TeamRoleKind.Analyst, priority: 8 },
        ],
        {},
      );

      expect(team.roles.map((r) => r.workerKind)).toEqual(["high", "low"]);
    });
  });

  describe("Failure Handling", () => {
    it("should keep going after a worker fails", async () => {
      const team = makeTeam(
        [
          { workerKind: "digger", role: TeamRoleKind.Researcher },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        {
          digger: {
            research: () => {
              throw new Error("boom");
            },
          },
          scribe: { createContent: () => "still written" },
        },
      );

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(2);
      expect(result.errors).toEqual(["digger: boom"]);
      expect(result.workerOutputs.digger.success).toBe(false);
      expect(result.result).toBe("**scribe**:\nstill written");
    });

    it("should fail before any step when a required worker is missing", async () => {
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "ghost", role: TeamRoleKind.Writer },
        ],
        { boss: {} },
      );

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Failed);
      expect(result.iterations).toBe(0);
      expect(result.artifacts).toEqual([]);
      expect(result.result).toBeNull();
      expect(result.errors).toEqual(["Required worker 'ghost' failed to bind: worker kind not found"]);
    });

    it("should report the resolver error for a required worker", async () => {
      const resolver: WorkerResolver = {
        resolve: () => {
          throw new Error("registry offline");
        },
      };
      const team = new AgentTeam({
        config: { name: "t" },
        roles: [{ workerKind: "boss", role: TeamRoleKind.Lead }],
        resolver,
      });

      const result = await team.execute("t");

      expect(result.errors).toEqual(["Required worker 'boss' failed to bind: registry offline"]);
    });

    it("should skip the steps of a missing optional worker", async () => {
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "ghost", role: TeamRoleKind.Researcher, required: false },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        { boss: {}, scribe: {} },
      );
      const skipped: StepEvent[] = [];
      team.on(TeamEvents.StepSkipped, (event: StepEvent) => skipped.push(event));

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(2);
      expect(Object.keys(result.workerOutputs)).toEqual(["boss", "scribe"]);
      expect(skipped.map((e) => e.step.workerKind)).toEqual(["ghost"]);
    });

    it("should end early but complete on the first failure under the stop policy", async () => {
      const createContent = vi.fn(() => "never");
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "digger", role: TeamRoleKind.Researcher },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        {
          boss: {},
          digger: { research: () => Promise.reject(new Error("no sources")) },
          scribe: { createContent },
        },
        { errorHandling: "stop" },
      );

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(2);
      expect(result.errors).toEqual(["digger: no sources"]);
      expect(Object.keys(result.workerOutputs)).toEqual(["boss", "digger"]);
      expect(result.result).toBe("**boss**:\nt");
      expect(createContent).not.toHaveBeenCalled();
    });

    it("should retry a failed step once under the retry policy", async () => {
      let attempts = 0;
      const team = makeTeam(
        [{ workerKind: "flaky", role: TeamRoleKind.Executor }],
        {
          flaky: {
            execute: () => {
              attempts += 1;
              if (attempts === 1) {
                throw new Error("transient");
              }
              return "second try";
            },
          },
        },
        { errorHandling: "retry" },
      );

      const result = await team.execute("t");

      expect(attempts).toBe(2);
      expect(result.errors).toEqual([]);
      expect(result.workerOutputs.flaky.success).toBe(true);
      expect(result.iterations).toBe(1);
      expect(result.messages).toHaveLength(1);
    });
  });

  describe("Limits", () => {
    it("should stop dispatching at maxIterations", async () => {
      const roles = Array.from({ length: 10 }, (_, i) => ({
        workerKind: `r${i}`,
        role: TeamRoleKind.Researcher,
      }));
      const team = new AgentTeam({
        config: { name: "wide", maxIterations: 3 },
        roles,
        resolver: { resolve: () => ({}) },
      });

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(3);
      expect(Object.keys(result.workerOutputs)).toEqual(["r0", "r1", "r2"]);
    });
  });

  describe("Cancellation", () => {
    it("should cancel an in-flight run", async () => {
      const { worker, started } = hangingWorker();
      const team = makeTeam([{ workerKind: "slow", role: TeamRoleKind.Monitor }], { slow: worker });

      const pending = team.execute("t");
      await started;
      expect(team.getStatus().running).toBe(true);
      expect(team.cancel("stop now")).toBe(true);
      const result = await pending;

      expect(result.status).toBe(TeamStatus.Cancelled);
      expect(result.errors).toEqual(["stop now"]);
      expect(result.result).toBeNull();
      expect(team.getStatus().running).toBe(false);
    });

    it("should keep the outputs of steps finished before the cancel", async () => {
      const { worker, started } = hangingWorker();
      const team = makeTeam(
        [
          { workerKind: "a", role: TeamRoleKind.Lead },
          { workerKind: "b", role: TeamRoleKind.Researcher },
        ],
        { a: { analyzeTask: () => "scoped" }, b: worker },
      );

      const pending = team.execute("t");
      await started;
      await new Promise((resolve) => setImmediate(resolve));
      team.cancel("halt");
      const result = await pending;

      expect(result.status).toBe(TeamStatus.Cancelled);
      expect(Object.keys(result.workerOutputs)).toEqual(["a"]);
      expect(result.artifacts).toHaveLength(1);
      expect(result.iterations).toBe(1);
      expect(result.errors).toEqual(["halt"]);
    });

    it("should return false when nothing is running", () => {
      expect(makeTeam([], {}).cancel()).toBe(false);
    });

    it("should cancel a run that exceeds its timeout", async () => {
      const { worker } = hangingWorker();
      const team = makeTeam([{ workerKind: "slow", role: TeamRoleKind.Monitor }], { slow: worker });

      const result = await team.execute("t", {}, { timeoutSeconds: 0.05 });

      expect(result.status).toBe(TeamStatus.Cancelled);
      expect(result.errors).toEqual(["Run timed out after 0.05s"]);
    });

    it("should honour an already-aborted caller signal", async () => {
      const handler = vi.fn(() => "unreached");
      const team = makeTeam([{ workerKind: "w", role: TeamRoleKind.Monitor }], { w: { process: handler } });
      const controller = new AbortController();
      controller.abort("user left");

      const result = await team.execute("t", {}, { signal: controller.signal });

      expect(result.status).toBe(TeamStatus.Cancelled);
      expect(result.errors).toEqual(["Run cancelled: user left"]);
      expect(result.iterations).toBe(0);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe("Runs and Events", () => {
    it("should queue concurrent runs on one team", async () => {
      const order: string[] = [];
      const team = makeTeam([{ workerKind: "w", role: TeamRoleKind.Monitor }], {
        w: {
          process: async (task) => {
            order.push(`start ${task}`);
            await new Promise((resolve) => setTimeout(resolve, 10));
            order.push(`end ${task}`);
            return task;
          },
        },
      });

      const [a, b] = await Promise.all([team.execute("a"), team.execute("b")]);

      expect(order).toEqual(["start a", "end a", "start b", "end b"]);
      expect(a.result).toBe("**w**:\na");
      expect(b.result).toBe("**w**:\nb");
    });

    it("should defer executeAsync to a later turn", async () => {
      const handler = vi.fn(() => "x");
      const team = makeTeam([{ workerKind: "w", role: TeamRoleKind.Monitor }], { w: { process: handler } });

      const pending = team.executeAsync("t");
      expect(handler).not.toHaveBeenCalled();

      expect((await pending).status).toBe(TeamStatus.Completed);
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it("should emit run and step events", async () => {
      const team = makeTeam([{ workerKind: "w", role: TeamRoleKind.Writer }], { w: {} });
      const seen: string[] = [];
      team.on(TeamEvents.RunStarted, () => seen.push("started"));
      team.on(TeamEvents.StepCompleted, (event: StepEvent) => seen.push(`step ${event.output?.action}`));
      team.on(TeamEvents.RunFinished, (result: TeamResult) => seen.push(`finished ${result.status}`));

      await team.execute("t");

      expect(seen).toEqual(["started", "step generate", "finished completed"]);
    });

    it("should fail the run when a run:started listener throws", async () => {
      const team = makeTeam([{ workerKind: "w", role: TeamRoleKind.Writer }], { w: {} });
      team.on(TeamEvents.RunStarted, () => {
        throw new Error("listener bug");
      });

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Failed);
      expect(result.errors).toEqual(["listener bug"]);
      expect(result.iterations).toBe(0);
      expect(team.getStatus().running).toBe(false);
      expect(team.cancel()).toBe(false);
    });

    it("should keep a step's output when its listener throws", async () => {
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        { boss: {}, scribe: { createContent: () => "draft" } },
        { checkpointSteps: ["scribe"] },
      );
      team.on(TeamEvents.StepCompleted, () => {
        throw new Error("observer down");
      });
      team.on(TeamEvents.Checkpoint, () => {
        throw new Error("gate down");
      });

      const result = await team.execute("t");

      expect(result.status).toBe(TeamStatus.Completed);
      expect(result.iterations).toBe(2);
      expect(Object.keys(result.workerOutputs)).toEqual(["boss", "scribe"]);
      expect(result.result).toBe("**boss**:\nt\n\n---\n\n**scribe**:\ndraft");
    });

    it("should signal configured checkpoints", async () => {
      const team = makeTeam(
        [
          { workerKind: "boss", role: TeamRoleKind.Lead },
          { workerKind: "scribe", role: TeamRoleKind.Writer },
        ],
        { boss: {}, scribe: {} },
        { checkpointSteps: ["generate"], requireApproval: true },
      );
      const checkpoints: CheckpointEvent[] = [];
      team.on(TeamEvents.Checkpoint, (event: CheckpointEvent) => checkpoints.push(event));

      await team.execute("t");

      expect(checkpoints).toHaveLength(1);
      expect(checkpoints[0].step.workerKind).toBe("scribe");
      expect(checkpoints[0].requiresApproval).toBe(true);
      expect(checkpoints[0].state.iterations).toBe(2);
    });

    it("should bind each worker kind once and rebind after a resolver swap", async () => {
      const resolve = vi.fn((): Worker => ({}));
      const team = new AgentTeam({
        config: { name: "cached" },
        roles: [{ workerKind: "w", role: TeamRoleKind.Monitor }],
        resolver: { resolve },
      });

      await team.execute("one");
      await team.execute("two");
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(team.getStatus().boundWorkers).toEqual(["w"]);

      const replacement = vi.fn((): Worker => ({}));
      team.setResolver({ resolve: replacement });
      await team.execute("three");

      expect(replacement).toHaveBeenCalledTimes(1);
    });
  });
});
