/**
 * Agent Team Types
 * Enums and interfaces shared by the planner, dispatcher, team and manager
 */

export enum TeamStatus {
  Pending = "pending",
  Initializing = "initializing",
  Running = "running",
  /** Reserved for approval checkpoints; the base run never enters it. */
  WaitingInput = "waiting_input",
  Completed = "completed",
  Failed = "failed",
  Cancelled = "cancelled",
}

export enum TeamRoleKind {
  Lead = "lead",
  Researcher = "researcher",
  Analyst = "analyst",
  Writer = "writer",
  Reviewer = "reviewer",
  Executor = "executor",
  Monitor = "monitor",
}

export enum AgentCapability {
  Research = "research",
  Retrieval = "retrieval",
  Generation = "generation",
  Analysis = "analysis",
  Synthesis = "synthesis",
  Execution = "execution",
  Monitoring = "monitoring",
  Communication = "communication",
  Persistence = "persistence",
  MediaProcessing = "media_processing",
}

export enum StepAction {
  AnalyzeTask = "analyze_task",
  Research = "research",
  Analyze = "analyze",
  Generate = "generate",
  Execute = "execute",
  Review = "review",
  Process = "process",
}

export enum ErrorHandlingMode {
  Continue = "continue",
  Stop = "stop",
  Retry = "retry",
}

/**
 * A worker capability. `auxiliary` is the run context, the accumulated
 * worker outputs or `{ artifacts }` depending on the step action.
 */
export type Capability = (task: string, auxiliary: Record<string, unknown>) => unknown;

/**
 * A bound worker. Any subset of the capabilities may be present;
 * the dispatcher falls back to `process`, then `run`, then a synthesized output.
 */
export interface Worker {
  analyzeTask?: Capability;
  research?: Capability;
  query?: Capability;
  analyze?: Capability;
  createContent?: Capability;
  generate?: Capability;
  execute?: Capability;
  review?: Capability;
  process?: Capability;
  run?: Capability;
}

export type CapabilityName = keyof Worker;

/**
 * Resolves a worker kind to a worker instance.
 * `undefined` means "not found"; throwing or rejecting is a binding failure too.
 */
export interface WorkerResolver {
  resolve(workerKind: string): Worker | undefined | Promise<Worker | undefined>;
}

export interface PlanStep {
  index: number;
  workerKind: string;
  action: StepAction;
  description: string;
}

export interface WorkerOutput {
  worker: string;
  action: StepAction;
  result: unknown;
  success: boolean;
  error?: string;
}

export interface TeamMessage {
  worker: string;
  action: StepAction;
  step: number;
  timestamp: number; // epoch ms
  outputPreview: string;
}

export interface TeamArtifact {
  source: string;
  type: StepAction;
  content: unknown;
}

export interface TeamStatusSnapshot {
  name: string;
  roles: string[];
  boundWorkers: string[];
  currentTaskId: string | null;
  running: boolean;
}

export interface ExecuteOptions {
  /** Aborting this signal cancels the run. */
  signal?: AbortSignal;
  /** Overrides `TeamConfig.timeoutSeconds` for this run. */
  timeoutSeconds?: number;
}
