/**
 * Teams Config Loader
 * Loads and caches the optional teams.config.json file
 */

import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import { Value } from "@sinclair/typebox/value";
import { createSubsystemLogger } from "../logger.js";
import { TeamValidationError, errorMessage } from "./errors.js";
import {
  TeamsConfigFileSchema,
  collectIssues,
  type TeamConfigDefaults,
  type TeamsConfigFile,
} from "./schema.js";
import { createTemplate, type TeamTemplate } from "./templates.js";

export interface TeamsSettings {
  /** Source file, or null when none was found. */
  source: string | null;
  /** Applied beneath the config of teams created without a template. */
  defaults: TeamConfigDefaults;
  /** Templates from the file; they replace built-ins of the same name. */
  templates: TeamTemplate[];
}

const CACHE_TTL_MS = 60000; // Reload every 60 seconds
const DEFAULT_CONFIG_FILE = "teams.config.json";

const log = createSubsystemLogger("teams").child("config");

let cached: { key: string; loadedAt: number; settings: TeamsSettings } | null = null;

/**
 * TEAMS_CONFIG_PATH, else teams.config.json in the working directory
 */
export function resolveTeamsConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.TEAMS_CONFIG_PATH?.trim();
  return fromEnv ? path.resolve(fromEnv) : path.resolve(process.cwd(), DEFAULT_CONFIG_FILE);
}

/**
 * Config defaults taken from the environment. They win over the file's defaults.
 */
export function readEnvDefaults(env: NodeJS.ProcessEnv = process.env): TeamConfigDefaults {
  const defaults: TeamConfigDefaults = {};
  const timeout = env.TEAMS_DEFAULT_TIMEOUT_SECONDS?.trim();
  if (timeout) {
    const seconds = Number(timeout);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new TeamValidationError(`TEAMS_DEFAULT_TIMEOUT_SECONDS must be a positive number, got "${timeout}"`);
    }
    defaults.timeoutSeconds = seconds;
  }
  const maxIterations = env.TEAMS_DEFAULT_MAX_ITERATIONS?.trim();
  if (maxIterations) {
    const count = Number(maxIterations);
    if (!Number.isInteger(count) || count <= 0) {
      throw new TeamValidationError(`TEAMS_DEFAULT_MAX_ITERATIONS must be a positive integer, got "${maxIterations}"`);
    }
    defaults.maxIterations = count;
  }
  return defaults;
}

function parseConfigFile(configPath: string): TeamsConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new TeamValidationError(`Teams config not readable or not valid JSON: ${configPath}`, [errorMessage(err)]);
  }
  if (!Value.Check(TeamsConfigFileSchema, parsed)) {
    throw new TeamValidationError(
      `Teams config invalid: ${configPath}`,
      collectIssues(TeamsConfigFileSchema, parsed),
    );
  }
  return parsed;
}

/**
 * Load team settings. Uses 60-second caching to avoid filesystem reads on every call.
 *
 * A missing file is fine unless its path was given explicitly (argument or
 * TEAMS_CONFIG_PATH); then it is an error.
 */
export function loadTeamsConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): TeamsSettings {
  const explicit = configPath !== undefined || Boolean(env.TEAMS_CONFIG_PATH?.trim());
  const resolved = configPath ? path.resolve(configPath) : resolveTeamsConfigPath(env);
  const envDefaults = readEnvDefaults(env);
  const key = `${resolved}|${JSON.stringify(envDefaults)}`;

  const now = Date.now();
  if (cached && cached.key === key && now - cached.loadedAt < CACHE_TTL_MS) {
    return cached.settings;
  }

  let settings: TeamsSettings;
  if (!existsSync(resolved)) {
    if (explicit) {
      throw new TeamValidationError(`Teams config not found: ${resolved}`);
    }
    settings = { source: null, defaults: envDefaults, templates: [] };
  } else {
    const file = parseConfigFile(resolved);
    const defaults: TeamConfigDefaults = { ...file.defaults, ...envDefaults };
    const templates = Object.entries(file.templates ?? {}).map(([name, template]) =>
      createTemplate(name, {
        config: {
          ...defaults,
          ...template.config,
          name,
          description: template.description ?? template.config?.description ?? "",
        },
        roles: template.roles,
      }),
    );
    settings = { source: resolved, defaults, templates };
    log.info(`loaded ${templates.length} template(s) from ${resolved}`);
  }

  cached = { key, loadedAt: now, settings };
  return settings;
}

export function clearTeamsConfigCache(): void {
  cached = null;
}
