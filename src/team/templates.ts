/**
 * Built-in team templates
 * Named (roles, config) pairs used when a team is created by name only
 */

import { createRole, createTeamConfig, type RoleDescriptorInput, type TeamConfigInput } from "./roles.js";
import type { RoleDescriptor, TeamConfig } from "./schema.js";
import { AgentCapability, ErrorHandlingMode, TeamRoleKind } from "./types.js";

export interface TeamTemplate {
  name: string;
  config: TeamConfig;
  roles: readonly RoleDescriptor[];
}

export interface TeamTemplateInput {
  config: TeamConfigInput;
  roles: readonly RoleDescriptorInput[];
}

export function createTemplate(name: string, input: TeamTemplateInput): TeamTemplate {
  return Object.freeze({
    name,
    config: createTeamConfig({ ...input.config, name: input.config.name || name }),
    roles: Object.freeze(input.roles.map((role) => createRole(role))),
  });
}

const { Research, Retrieval, Generation, Analysis, Synthesis, Monitoring, Communication } =
  AgentCapability;
const { Persistence, MediaProcessing } = AgentCapability;

const BUILTIN_TEMPLATE_INPUTS: Readonly<Record<string, TeamTemplateInput>> = {
  research: {
    config: {
      name: "research",
      description: "Research and investigation team for gathering and synthesizing information",
      maxIterations: 15,
      timeoutSeconds: 600,
      errorHandling: ErrorHandlingMode.Continue,
    },
    roles: [
      { workerKind: "research_intel", role: TeamRoleKind.Lead, capabilities: [Research, Analysis], priority: 10 },
      { workerKind: "librarian", role: TeamRoleKind.Researcher, capabilities: [Retrieval, Synthesis], priority: 8 },
      {
        workerKind: "knowledge_management",
        role: TeamRoleKind.Analyst,
        capabilities: [Persistence, Analysis],
        priority: 5,
        required: false,
      },
    ],
  },
  daily_ops: {
    config: {
      name: "daily_ops",
      description: "Daily briefing and operational status team",
      maxIterations: 10,
      timeoutSeconds: 300,
      parallelExecution: true,
      errorHandling: ErrorHandlingMode.Continue,
    },
    roles: [
      { workerKind: "daily_brief", role: TeamRoleKind.Lead, capabilities: [Monitoring, Synthesis], priority: 10 },
      {
        workerKind: "personal_assistant",
        role: TeamRoleKind.Analyst,
        capabilities: [Persistence, Communication],
        priority: 7,
      },
      {
        workerKind: "security_ops",
        role: TeamRoleKind.Monitor,
        capabilities: [Monitoring, Analysis],
        priority: 5,
        required: false,
      },
    ],
  },
  content: {
    config: {
      name: "content",
      description: "Content creation and media processing team",
      maxIterations: 12,
      timeoutSeconds: 900,
      errorHandling: ErrorHandlingMode.Continue,
    },
    roles: [
      {
        workerKind: "content_creator",
        role: TeamRoleKind.Lead,
        capabilities: [Generation, MediaProcessing],
        priority: 10,
      },
      {
        workerKind: "research_intel",
        role: TeamRoleKind.Researcher,
        capabilities: [Research, Analysis],
        priority: 8,
        required: false,
      },
      {
        workerKind: "librarian",
        role: TeamRoleKind.Reviewer,
        capabilities: [Retrieval, Analysis],
        priority: 5,
        required: false,
      },
    ],
  },
  security: {
    config: {
      name: "security",
      description: "Security auditing and monitoring team",
      maxIterations: 10,
      timeoutSeconds: 300,
      parallelExecution: true,
      // later checks are skipped once one fails
      errorHandling: ErrorHandlingMode.Stop,
    },
    roles: [
      { workerKind: "security_ops", role: TeamRoleKind.Lead, capabilities: [Monitoring, Analysis], priority: 10 },
      { workerKind: "boot_hardening", role: TeamRoleKind.Analyst, capabilities: [Analysis, Monitoring], priority: 8 },
      {
        workerKind: "daily_brief",
        role: TeamRoleKind.Monitor,
        capabilities: [Monitoring, Synthesis],
        priority: 5,
        required: false,
      },
    ],
  },
  full_stack: {
    config: {
      name: "full_stack",
      description: "Full-capability team for complex multi-domain tasks",
      maxIterations: 20,
      timeoutSeconds: 1200,
      errorHandling: ErrorHandlingMode.Continue,
    },
    roles: [
      { workerKind: "research_intel", role: TeamRoleKind.Lead, capabilities: [Research, Analysis], priority: 10 },
      { workerKind: "librarian", role: TeamRoleKind.Researcher, capabilities: [Retrieval, Synthesis], priority: 9 },
      {
        workerKind: "daily_brief",
        role: TeamRoleKind.Monitor,
        capabilities: [Monitoring, Synthesis],
        priority: 8,
        required: false,
      },
      {
        workerKind: "content_creator",
        role: TeamRoleKind.Writer,
        capabilities: [Generation, MediaProcessing],
        priority: 7,
        required: false,
      },
      {
        workerKind: "personal_assistant",
        role: TeamRoleKind.Executor,
        capabilities: [Persistence, Communication],
        priority: 6,
        required: false,
      },
      {
        workerKind: "security_ops",
        role: TeamRoleKind.Reviewer,
        capabilities: [Monitoring, Analysis],
        priority: 5,
        required: false,
      },
    ],
  },
};

/** Name of the catch-all template `routeTask` falls back to. */
export const DEFAULT_TEMPLATE = "full_stack";

/**
 * Fresh map of the built-in templates, keyed by name.
 */
export function builtinTemplates(): Map<string, TeamTemplate> {
  return new Map(
    Object.entries(BUILTIN_TEMPLATE_INPUTS).map(([name, input]) => [name, createTemplate(name, input)]),
  );
}
