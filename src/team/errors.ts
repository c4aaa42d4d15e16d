/**
 * Team error types
 */

export const TeamErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  WORKER_BINDING_FAILED: "WORKER_BINDING_FAILED",
  TEAM_NOT_FOUND: "TEAM_NOT_FOUND",
  RUN_CANCELLED: "RUN_CANCELLED",
} as const;

export type TeamErrorCode = keyof typeof TeamErrorCodes;

export class TeamError extends Error {
  readonly code: TeamErrorCode;

  constructor(code: TeamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TeamError";
    this.code = code;
  }
}

export class TeamValidationError extends TeamError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("VALIDATION_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "TeamValidationError";
    this.issues = issues;
  }
}

export class WorkerBindingError extends TeamError {
  readonly workerKind: string;

  constructor(workerKind: string, reason: string, options?: { cause?: unknown }) {
    super("WORKER_BINDING_FAILED", `Required worker '${workerKind}' failed to bind: ${reason}`, options);
    this.name = "WorkerBindingError";
    this.workerKind = workerKind;
  }
}

export class TeamNotFoundError extends TeamError {
  constructor(name: string) {
    super("TEAM_NOT_FOUND", `No roles provided and '${name}' is not a known template`);
    this.name = "TeamNotFoundError";
  }
}

export class RunCancelledError extends TeamError {
  constructor(reason: string) {
    super("RUN_CANCELLED", reason);
    this.name = "RunCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
