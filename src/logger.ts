/**
 * Console logger
 * Level-filtered logging with per-subsystem prefixes
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let overrideLevel: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Resolve the active level: explicit override, then TEAMS_LOG_LEVEL,
 * then "silent" under test runners and "info" everywhere else.
 */
export function getLogLevel(): LogLevel {
  if (overrideLevel) {
    return overrideLevel;
  }
  const fromEnv = process.env.TEAMS_LOG_LEVEL?.trim().toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Force a level for the rest of the process. Pass null to go back to the environment.
 */
export function setLogLevel(level: LogLevel | null): void {
  overrideLevel = level;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()];
}

export function logDebug(message: string, ...details: unknown[]): void {
  if (enabled("debug")) {
    console.debug(message, ...details);
  }
}

export function logInfo(message: string, ...details: unknown[]): void {
  if (enabled("info")) {
    console.log(message, ...details);
  }
}

export function logWarn(message: string, ...details: unknown[]): void {
  if (enabled("warn")) {
    console.warn(message, ...details);
  }
}

export function logError(message: string, ...details: unknown[]): void {
  if (enabled("error")) {
    console.error(message, ...details);
  }
}

export interface SubsystemLogger {
  readonly subsystem: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(name: string): SubsystemLogger;
}

/**
 * Logger whose lines are prefixed with `[subsystem]`.
 * Children join their name with a slash: `[teams/manager]`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const prefix = `[${subsystem}]`;
  return {
    subsystem,
    debug: (message, ...details) => logDebug(`${prefix} ${message}`, ...details),
    info: (message, ...details) => logInfo(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => logWarn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => logError(`${prefix} ${message}`, ...details),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
