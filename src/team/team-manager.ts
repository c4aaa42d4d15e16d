/**
 * Team Manager
 * Catalog of team instances and templates, with keyword-based task routing
 *
 * Not a singleton: build one at startup and pass it to whatever needs it.
 */

import { createSubsystemLogger } from "../logger.js";
import { TaskRouter } from "../routing/task-router.js";
import { loadTeamsConfig } from "./config-loader.js";
import { TeamNotFoundError } from "./errors.js";
import type { TeamResult } from "./result.js";
import { createTeamConfig, type RoleDescriptorInput, type TeamConfigInput } from "./roles.js";
import type { TeamConfigDefaults } from "./schema.js";
import { AgentTeam } from "./team.js";
import { DEFAULT_TEMPLATE, builtinTemplates, type TeamTemplate } from "./templates.js";
import type {
  AgentCapability,
  ExecuteOptions,
  TeamStatusSnapshot,
  WorkerResolver,
} from "./types.js";

const log = createSubsystemLogger("teams").child("manager");

export interface TeamManagerOptions {
  resolver: WorkerResolver;
  /** Added to the built-in templates; same-name entries replace them. */
  templates?: Iterable<TeamTemplate>;
  /** Config defaults for teams created without a template. */
  defaults?: TeamConfigDefaults;
  router?: TaskRouter;
}

export interface TeamListing {
  name: string;
  roles: string[];
  status: TeamStatusSnapshot;
}

export interface TemplateListing {
  name: string;
  description: string;
  roles: string[];
}

export class TeamManager {
  private teams = new Map<string, AgentTeam>();
  private templates: Map<string, TeamTemplate>;
  private resolver: WorkerResolver;
  private defaults: TeamConfigDefaults;
  private router: TaskRouter;

  constructor(options: TeamManagerOptions) {
    this.resolver = options.resolver;
    this.defaults = { ...options.defaults };
    this.router = options.router ?? new TaskRouter({ fallbackTemplate: DEFAULT_TEMPLATE });
    this.templates = builtinTemplates();
    for (const template of options.templates ?? []) {
      this.templates.set(template.name, template);
    }
    log.info(`team manager initialized with ${this.templates.size} templates`);
  }

  /**
   * Manager configured from teams.config.json (or TEAMS_CONFIG_PATH) and the environment.
   */
  static fromConfig(resolver: WorkerResolver, configPath?: string): TeamManager {
    const settings = loadTeamsConfig(configPath);
    return new TeamManager({ resolver, templates: settings.templates, defaults: settings.defaults });
  }

  /**
   * Use a different resolver for every existing and future team.
   */
  setWorkerResolver(resolver: WorkerResolver): void {
    this.resolver = resolver;
    for (const team of this.teams.values()) {
      team.setResolver(resolver);
    }
  }

  /**
   * Create and register a team, replacing any team of the same name.
   *
   * Without `roles`, `name` must be a template: its roles are used, and its
   * config unless `config` is given.
   */
  createTeam(
    name: string,
    roles?: readonly RoleDescriptorInput[],
    config?: Partial<TeamConfigInput>,
  ): AgentTeam {
    const template = this.templates.get(name);
    let teamRoles = roles;
    let teamConfig = config ? createTeamConfig({ ...this.defaults, ...config, name: config.name ?? name }) : undefined;

    if (!teamRoles && template) {
      teamRoles = template.roles;
      teamConfig ??= template.config;
    }
    if (!teamRoles) {
      throw new TeamNotFoundError(name);
    }

    const team = new AgentTeam({
      config: teamConfig ?? { ...this.defaults, name },
      roles: teamRoles,
      resolver: this.resolver,
    });

    if (this.teams.has(name)) {
      log.info(`replacing team "${name}"`);
    }
    this.teams.set(name, team);
    log.info(`created team "${name}" with ${team.roles.length} roles`);
    return team;
  }

  getTeam(name: string): AgentTeam | undefined {
    return this.teams.get(name);
  }

  listTeams(): TeamListing[] {
    return [...this.teams.entries()].map(([name, team]) => ({
      name,
      roles: team.roles.map((r) => r.workerKind),
      status: team.getStatus(),
    }));
  }

  listTemplates(): TemplateListing[] {
    return [...this.templates.values()].map((template) => ({
      name: template.name,
      description: template.config.description,
      roles: template.roles.map((r) => r.workerKind),
    }));
  }

  destroyTeam(name: string): boolean {
    const removed = this.teams.delete(name);
    if (removed) {
      log.info(`destroyed team "${name}"`);
    }
    return removed;
  }

  /**
   * Pick a template by keyword, make sure its team exists and run the task on it.
   */
  async routeTask(
    task: string,
    context: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<TeamResult> {
    const decision = this.router.route(task);
    const team = this.ensureTeam(decision.template);
    log.info(`routing task to team "${decision.template}" (${decision.reasoning}): ${task.slice(0, 50)}`);
    return team.executeAsync(task, context, options);
  }

  /**
   * Run a task on a named team, creating it from its template on first use.
   */
  async executeTask(
    teamName: string,
    task: string,
    context: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<TeamResult> {
    return this.ensureTeam(teamName).execute(task, context, options);
  }

  /**
   * Capability tags per team: the union over its roles, in role order.
   */
  getCapabilities(): Record<string, AgentCapability[]> {
    const capabilities: Record<string, AgentCapability[]> = {};
    for (const [name, team] of this.teams) {
      const tags = new Set<AgentCapability>();
      for (const role of team.roles) {
        for (const tag of role.capabilities) {
          tags.add(tag);
        }
      }
      capabilities[name] = [...tags];
    }
    return capabilities;
  }

  private ensureTeam(name: string): AgentTeam {
    return this.teams.get(name) ?? this.createTeam(name);
  }
}
