/**
 * Team Schemas
 * TypeBox schemas for role descriptors, team configuration and the config file
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { AgentCapability, ErrorHandlingMode, TeamRoleKind } from "./types.js";

/**
 * Worker kinds start with a letter so they never look like array indices;
 * that keeps `workerOutputs` in insertion order.
 */
export const WORKER_KIND_PATTERN = "^[A-Za-z][A-Za-z0-9_.-]*$";

export const RoleDescriptorSchema = Type.Object({
  workerKind: Type.String({ pattern: WORKER_KIND_PATTERN }),
  role: Type.Enum(TeamRoleKind),
  capabilities: Type.Array(Type.Enum(AgentCapability), { uniqueItems: true }),
  priority: Type.Integer(),
  required: Type.Boolean(),
  config: Type.Record(Type.String(), Type.Unknown()),
});

export type RoleDescriptor = Readonly<Static<typeof RoleDescriptorSchema>>;

export const TeamConfigSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
  description: Type.String(),
  maxIterations: Type.Integer({ minimum: 1 }),
  timeoutSeconds: Type.Number({ exclusiveMinimum: 0 }),
  parallelExecution: Type.Boolean(),
  requireApproval: Type.Boolean(),
  checkpointSteps: Type.Array(Type.String()),
  errorHandling: Type.Enum(ErrorHandlingMode),
  metadata: Type.Record(Type.String(), Type.Unknown()),
});

export type TeamConfig = Readonly<Static<typeof TeamConfigSchema>>;

/** Config fields a file or caller may override; everything but the name. */
export const TeamConfigDefaultsSchema = Type.Partial(Type.Omit(TeamConfigSchema, ["name"]));

export type TeamConfigDefaults = Static<typeof TeamConfigDefaultsSchema>;

export const RoleInputSchema = Type.Object({
  workerKind: Type.String(),
  role: Type.Enum(TeamRoleKind),
  capabilities: Type.Optional(Type.Array(Type.Enum(AgentCapability))),
  priority: Type.Optional(Type.Integer()),
  required: Type.Optional(Type.Boolean()),
  config: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export const TemplateFileSchema = Type.Object({
  description: Type.Optional(Type.String()),
  config: Type.Optional(TeamConfigDefaultsSchema),
  roles: Type.Array(RoleInputSchema, { minItems: 1 }),
});

export const TeamsConfigFileSchema = Type.Object({
  defaults: Type.Optional(TeamConfigDefaultsSchema),
  templates: Type.Optional(Type.Record(Type.String(), TemplateFileSchema)),
});

export type TeamsConfigFile = Static<typeof TeamsConfigFileSchema>;

/**
 * Collect validation issues as `path message` strings.
 */
export function collectIssues(schema: TSchema, value: unknown): string[] {
  return [...Value.Errors(schema, value)].map((issue) => `${issue.path || "/"} ${issue.message}`);
}
