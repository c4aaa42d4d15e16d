/**
 * Agent Teams Module
 * Role-based teams of workers that plan a task, dispatch it step by step and compile one result
 */

export { AgentTeam, TeamEvents } from "./team.js";
export type { AgentTeamOptions, CheckpointEvent, StepEvent } from "./team.js";
export { TeamManager } from "./team-manager.js";
export type { TeamListing, TeamManagerOptions, TemplateListing } from "./team-manager.js";
export { buildPlan } from "./planner.js";
export { dispatchStep, resolveCapability } from "./dispatcher.js";
export { compileResult, TeamResult, RESULT_SEPARATOR } from "./result.js";
export type { TeamResultJSON } from "./result.js";
export { createRole, createTeamConfig, defaultCapabilities } from "./roles.js";
export type { RoleDescriptorInput, TeamConfigInput } from "./roles.js";
export type { RoleDescriptor, TeamConfig, TeamConfigDefaults } from "./schema.js";
export { createInitialState } from "./state.js";
export type { TeamState } from "./state.js";
export { builtinTemplates, createTemplate, DEFAULT_TEMPLATE } from "./templates.js";
export type { TeamTemplate } from "./templates.js";
export { WorkerRegistry } from "./workers.js";
export type { WorkerFactory } from "./workers.js";
export { clearTeamsConfigCache, loadTeamsConfig } from "./config-loader.js";
export type { TeamsSettings } from "./config-loader.js";
export {
  RunCancelledError,
  TeamError,
  TeamErrorCodes,
  TeamNotFoundError,
  TeamValidationError,
  WorkerBindingError,
} from "./errors.js";
export {
  AgentCapability,
  ErrorHandlingMode,
  StepAction,
  TeamRoleKind,
  TeamStatus,
} from "./types.js";
export type {
  Capability,
  ExecuteOptions,
  PlanStep,
  TeamArtifact,
  TeamMessage,
  TeamStatusSnapshot,
  Worker,
  WorkerOutput,
  WorkerResolver,
} from "./types.js";
export { TaskRouter, routeTaskToTemplate } from "../routing/task-router.js";
export type { RouteDecision, RouteRule } from "../routing/task-router.js";
export { runTeam } from "./team-runner.js";
