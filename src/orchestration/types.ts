/**
 * Lab Orchestration — Types
 *
 * A plan is a dependency graph of steps; the engine runs it one step at a
 * time in topological order.
 */

import type { LabConfig } from "../config/schema.js";
import type { NodeTarget } from "../types.js";

// =============================================================================
// Step Definitions
// =============================================================================

/** Registered step type, e.g. "host-features". */
export type StepTypeId = string;

/** Step instance within a plan, e.g. "node1-features". */
export type StepInstanceId = string;

export type StepStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type ValidationSeverity = "error" | "warning" | "info";

export type StepValueType = "string" | "number" | "boolean" | "object" | "array";

export type StepParameterDef = {
  name: string;
  type: StepValueType;
  description: string;
  required?: boolean;
  default?: unknown;
};

export type StepOutputDef = {
  name: string;
  type: StepValueType;
  description: string;
};

export type StepCategory = "host" | "network" | "remoting" | "security" | "storage" | "cluster" | "guests" | "diagnostics";

export type StepTypeDefinition = {
  id: StepTypeId;
  label: string;
  description: string;
  category: StepCategory;
  parameters: StepParameterDef[];
  /** Outputs available to later steps as `<stepId>.outputs.<name>`. */
  outputs: StepOutputDef[];
  /** Hint for progress reporting. */
  estimatedDurationMs?: number;
};

// =============================================================================
// Plans
// =============================================================================

/** `<stepInstanceId>.outputs.<outputName>` */
export type StepOutputRef = `${string}.outputs.${string}`;

export type PlanStep = {
  id: StepInstanceId;
  type: StepTypeId;
  name: string;
  /**
   * Literal values, output references or `$global.<name>` references.
   */
  params: Record<string, unknown>;
  dependsOn: StepInstanceId[];
  /** Run only when this holds; otherwise the step is skipped. */
  condition?: StepCondition;
  timeoutMs?: number;
  /** Overrides the engine's `maxRetries`; 0 for steps that retry on their own. */
  maxRetries?: number;
};

export type StepCondition = {
  stepId: StepInstanceId;
  check: "succeeded" | "failed" | "output-equals" | "output-truthy";
  outputName?: string;
  expectedValue?: unknown;
};

export type ExecutionPlan = {
  id: string;
  name: string;
  description: string;
  blueprintId?: string;
  steps: PlanStep[];
  globalParams: Record<string, unknown>;
  createdAt: string;
  estimatedDurationMs?: number;
};

export type PlanValidation = {
  valid: boolean;
  issues: PlanValidationIssue[];
};

export type PlanValidationIssue = {
  severity: ValidationSeverity;
  stepId?: StepInstanceId;
  message: string;
  code: string;
};

// =============================================================================
// Execution State
// =============================================================================

export type StepExecutionState = {
  stepId: StepInstanceId;
  status: StepStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  outputs: Record<string, unknown>;
  warnings: string[];
  error?: string;
  retryCount: number;
};

export type PlanStatus = "pending" | "running" | "succeeded" | "failed" | "cancelled";

export type ExecutionState = {
  planId: string;
  status: PlanStatus;
  startedAt?: string;
  completedAt?: string;
  steps: Map<StepInstanceId, StepExecutionState>;
  /** Outputs of completed steps, by step ID. */
  resolvedOutputs: Map<StepInstanceId, Record<string, unknown>>;
};

// =============================================================================
// Options
// =============================================================================

export type OrchestrationOptions = {
  /** Validate and walk the plan without calling any handler. */
  dryRun?: boolean;
  /** Stop at the first failed step (default true). */
  failFast?: boolean;
  /** Whole-plan timeout in ms; 0 disables it. */
  timeoutMs?: number;
  /** Default per-step timeout in ms; 0 disables it. */
  stepTimeoutMs?: number;
  /** Retries after a failed attempt (default 1). */
  maxRetries?: number;
  /** Fixed pause between attempts in ms. */
  retryDelayMs?: number;
  signal?: AbortSignal;
};

// =============================================================================
// Events
// =============================================================================

export type OrchestrationEventType =
  | "plan:start"
  | "plan:complete"
  | "plan:failed"
  | "plan:cancelled"
  | "step:start"
  | "step:complete"
  | "step:warning"
  | "step:failed"
  | "step:skipped"
  | "step:retry";

export type OrchestrationEvent = {
  type: OrchestrationEventType;
  planId: string;
  stepId?: StepInstanceId;
  stepName?: string;
  timestamp: string;
  message: string;
  error?: string;
  outputs?: Record<string, unknown>;
  progress?: { completed: number; total: number; percentage: number };
};

export type OrchestrationEventListener = (event: OrchestrationEvent) => void;

// =============================================================================
// Results
// =============================================================================

export type OrchestrationResult = {
  planId: string;
  planName: string;
  status: PlanStatus;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  steps: StepExecutionResult[];
  /** Outputs of every succeeded step, by step ID. */
  outputs: Record<string, Record<string, unknown>>;
  errors: string[];
};

export type StepExecutionResult = {
  stepId: StepInstanceId;
  stepName: string;
  stepType: StepTypeId;
  status: StepStatus;
  durationMs: number;
  outputs: Record<string, unknown>;
  warnings: string[];
  error?: string;
  /** Why a skipped step did not run. */
  reason?: string;
};

// =============================================================================
// Step Handlers
// =============================================================================

export type StepContext = {
  stepId: StepInstanceId;
  /** Params with references already resolved. */
  params: Record<string, unknown>;
  globalParams: Record<string, unknown>;
  log: StepLogger;
  signal: AbortSignal;
};

/**
 * `warn` records a warning on the step result and emits `step:warning`;
 * the step still succeeds.
 */
export type StepLogger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export type StepExecuteFn = (ctx: StepContext) => Promise<Record<string, unknown>>;

export type StepHandler = {
  execute: StepExecuteFn;
};

// =============================================================================
// Blueprints
// =============================================================================

export type BlueprintCategory = "lab" | "remoting" | "diagnostics" | "guests";

export type BlueprintParameter = {
  name: string;
  type: "string" | "number" | "boolean" | "array";
  description: string;
  required?: boolean;
  default?: unknown;
};

export type BlueprintContext = {
  config: LabConfig;
  /** Lab nodes with their addresses, in node order. */
  nodes: NodeTarget[];
};

/**
 * Generates an execution plan from the lab configuration and a few
 * per-run parameters.
 */
export type Blueprint = {
  id: string;
  name: string;
  description: string;
  category: BlueprintCategory;
  parameters: BlueprintParameter[];
  generate: (context: BlueprintContext, params?: Record<string, unknown>) => ExecutionPlan;
};
