#!/usr/bin/env node
/**
 * Team Runner CLI
 * Routes a task to a team and prints the run summary
 *
 *   team-runner --task "research vector stores" [--team research] [--timeout 60] [--config ./teams.config.json] [--verbose]
 *
 * Workers are in-process stand-ins that echo the task, so the CLI shows how
 * plans, routing and result compilation behave without any external service.
 */

import { fileURLToPath } from "node:url";
import { setLogLevel } from "../logger.js";
import { errorMessage } from "./errors.js";
import type { TeamResult } from "./result.js";
import { TeamManager } from "./team-manager.js";
import type { Worker } from "./types.js";
import { WorkerRegistry } from "./workers.js";

export interface TeamRunOptions {
  task: string;
  team?: string;
  timeoutSeconds?: number;
  configPath?: string;
  verbose: boolean;
}

export const STAND_IN_WORKER_KINDS = [
  "research_intel",
  "librarian",
  "knowledge_management",
  "daily_brief",
  "personal_assistant",
  "security_ops",
  "boot_hardening",
  "content_creator",
] as const;

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): TeamRunOptions {
  let task: string | undefined;
  let team: string | undefined;
  let timeoutSeconds: number | undefined;
  let configPath: string | undefined;
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--task" && args[i + 1]) {
      task = args[++i];
    } else if (arg === "--team" && args[i + 1]) {
      team = args[++i];
    } else if (arg === "--timeout" && args[i + 1]) {
      timeoutSeconds = Number(args[++i]);
      if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0) {
        throw new Error(`--timeout must be a positive number of seconds, got "${args[i]}"`);
      }
    } else if (arg === "--config" && args[i + 1]) {
      configPath = args[++i];
    } else if (arg === "--verbose") {
      verbose = true;
    }
  }

  if (!task) {
    throw new Error("Missing required argument: --task is required");
  }

  return { task, team, timeoutSeconds, configPath, verbose };
}

/**
 * Worker whose answers name its own kind and echo the task.
 */
export function createStandInWorker(workerKind: string): Worker {
  return {
    analyzeTask: (task) => ({ analysis: `${workerKind} scoped: ${task}`, subtasks: [task] }),
    research: (task) => ({ research: `${workerKind} notes on: ${task}` }),
    createContent: (task) => ({ content: `${workerKind} draft for: ${task}` }),
    review: (_task, { artifacts }) => ({
      reviewed: true,
      approved: true,
      analysis: `${workerKind} reviewed ${Array.isArray(artifacts) ? artifacts.length : 0} artifact(s)`,
    }),
    process: (task) => `${workerKind} handled: ${task}`,
  };
}

export function createStandInRegistry(): WorkerRegistry {
  const registry = new WorkerRegistry();
  for (const kind of STAND_IN_WORKER_KINDS) {
    registry.register(kind, () => createStandInWorker(kind));
  }
  return registry;
}

export function formatSummary(result: TeamResult): string {
  const lines = [
    "=".repeat(60),
    `📊 Team "${result.teamName}" ${result.status} (task ${result.taskId})`,
    "=".repeat(60),
    `   Steps: ${result.iterations}`,
    `   Duration: ${result.durationMs.toFixed(0)}ms`,
    `   Artifacts: ${result.artifacts.length}`,
  ];

  const outputs = Object.values(result.workerOutputs);
  if (outputs.length > 0) {
    lines.push("", "👥 Worker Outputs:");
    for (const output of outputs) {
      lines.push(`   [${output.worker}] ${output.action}: ${output.success ? "ok" : `failed (${output.error ?? "unknown"})`}`);
    }
  }

  if (result.errors.length > 0) {
    lines.push("", `❌ Errors (${result.errors.length}):`);
    for (const error of result.errors) {
      lines.push(`   ${error}`);
    }
  }

  if (result.result !== null) {
    lines.push("", "✅ Result:", result.result);
  }

  lines.push("=".repeat(60));
  return lines.join("\n");
}

/**
 * Run one task through the team manager and print the summary
 */
export async function runTeam(args: string[]): Promise<TeamResult> {
  const opts = parseArgs(args);
  if (opts.verbose) {
    setLogLevel("debug");
  }

  const manager = TeamManager.fromConfig(createStandInRegistry(), opts.configPath);
  const executeOptions = { timeoutSeconds: opts.timeoutSeconds };

  const result = opts.team
    ? await manager.executeTask(opts.team, opts.task, {}, executeOptions)
    : await manager.routeTask(opts.task, {}, executeOptions);

  console.log(formatSummary(result));
  return result;
}

/**
 * CLI entry point
 */
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  runTeam(process.argv.slice(2))
    .then((result) => {
      process.exitCode = result.success ? 0 : 1;
    })
    .catch((error: unknown) => {
      console.error(`\n❌ Team Execution Failed: ${errorMessage(error)}\n`);
      process.exit(1);
    });
}
