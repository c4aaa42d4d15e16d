/**
 * Role descriptors and team configuration factories
 */

import { Value } from "@sinclair/typebox/value";
import { TeamValidationError } from "./errors.js";
import {
  RoleDescriptorSchema,
  TeamConfigSchema,
  collectIssues,
  type RoleDescriptor,
  type TeamConfig,
} from "./schema.js";
import { AgentCapability, ErrorHandlingMode, TeamRoleKind } from "./types.js";

export interface RoleDescriptorInput {
  workerKind: string;
  role: TeamRoleKind | `${TeamRoleKind}`;
  /** Empty or omitted: taken from the default capability table. */
  capabilities?: ReadonlyArray<AgentCapability | `${AgentCapability}`>;
  /** Higher runs earlier among roles of the same kind. */
  priority?: number;
  required?: boolean;
  config?: Readonly<Record<string, unknown>>;
}

export interface TeamConfigInput {
  name: string;
  description?: string;
  maxIterations?: number;
  timeoutSeconds?: number;
  parallelExecution?: boolean;
  requireApproval?: boolean;
  checkpointSteps?: readonly string[];
  errorHandling?: ErrorHandlingMode | `${ErrorHandlingMode}`;
  metadata?: Readonly<Record<string, unknown>>;
}

const DEFAULT_CAPABILITIES: Readonly<Record<string, readonly AgentCapability[]>> = {
  research_intel: [AgentCapability.Research, AgentCapability.Analysis],
  librarian: [AgentCapability.Retrieval, AgentCapability.Synthesis],
  content_creator: [AgentCapability.Generation, AgentCapability.MediaProcessing],
  daily_brief: [AgentCapability.Monitoring, AgentCapability.Synthesis],
  personal_assistant: [AgentCapability.Persistence, AgentCapability.Communication],
  security_ops: [AgentCapability.Monitoring, AgentCapability.Analysis],
  knowledge_management: [AgentCapability.Persistence, AgentCapability.Retrieval],
};

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_TIMEOUT_SECONDS = 300;

export function defaultCapabilities(workerKind: string): AgentCapability[] {
  return Object.hasOwn(DEFAULT_CAPABILITIES, workerKind)
    ? [...DEFAULT_CAPABILITIES[workerKind]]
    : [];
}

/**
 * Build an immutable role descriptor. Unknown role or capability values are rejected.
 */
export function createRole(input: RoleDescriptorInput): RoleDescriptor {
  const capabilities =
    input.capabilities && input.capabilities.length > 0
      ? [...new Set(input.capabilities)]
      : defaultCapabilities(input.workerKind);

  const candidate: unknown = {
    workerKind: input.workerKind,
    role: input.role,
    capabilities,
    priority: input.priority ?? 0,
    required: input.required ?? true,
    config: { ...input.config },
  };

  if (!Value.Check(RoleDescriptorSchema, candidate)) {
    throw new TeamValidationError(
      `Invalid role descriptor for worker '${input.workerKind}'`,
      collectIssues(RoleDescriptorSchema, candidate),
    );
  }
  Object.freeze(candidate.capabilities);
  Object.freeze(candidate.config);
  return Object.freeze(candidate);
}

/**
 * Build an immutable team configuration with defaults filled in.
 */
export function createTeamConfig(input: TeamConfigInput): TeamConfig {
  const candidate: unknown = {
    name: input.name,
    description: input.description ?? "",
    maxIterations: input.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    timeoutSeconds: input.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    parallelExecution: input.parallelExecution ?? false,
    requireApproval: input.requireApproval ?? false,
    checkpointSteps: [...(input.checkpointSteps ?? [])],
    errorHandling: input.errorHandling ?? ErrorHandlingMode.Continue,
    metadata: { ...input.metadata },
  };

  if (!Value.Check(TeamConfigSchema, candidate)) {
    throw new TeamValidationError(
      `Invalid configuration for team '${input.name}'`,
      collectIssues(TeamConfigSchema, candidate),
    );
  }
  Object.freeze(candidate.checkpointSteps);
  Object.freeze(candidate.metadata);
  return Object.freeze(candidate);
}

/**
 * Stable sort by descending priority; equal priorities keep list order.
 */
export function sortByPriority(roles: readonly RoleDescriptor[]): RoleDescriptor[] {
  return [...roles].sort((a, b) => b.priority - a.priority);
}
