/**
 * Lab Orchestration
 *
 * Public API for the step engine, the lab step types and the blueprints.
 */

// Types
export type {
  StepTypeId,
  StepInstanceId,
  StepStatus,
  StepValueType,
  StepParameterDef,
  StepOutputDef,
  StepTypeDefinition,
  StepCategory,
  PlanStep,
  StepCondition,
  StepOutputRef,
  ExecutionPlan,
  PlanValidation,
  PlanValidationIssue,
  StepExecutionState,
  ExecutionState,
  PlanStatus,
  OrchestrationOptions,
  OrchestrationEventType,
  OrchestrationEvent,
  OrchestrationEventListener,
  OrchestrationResult,
  StepExecutionResult,
  StepContext,
  StepLogger,
  StepExecuteFn,
  StepHandler,
  Blueprint,
  BlueprintCategory,
  BlueprintContext,
  BlueprintParameter,
} from "./types.js";

// Registry
export {
  registerStepType,
  getStepDefinition,
  getStepHandler,
  listStepTypes,
  listStepTypesByCategory,
  hasStepType,
  unregisterStepType,
  clearStepRegistry,
} from "./registry.js";

// Lab steps
export { LAB_STEP_DEFINITIONS, registerLabSteps, registerLabStepsDryRun, type LabStepServices } from "./steps.js";

// Planner
export {
  validatePlan,
  topologicalSort,
  flattenLayers,
  stepDependencies,
  isOutputRef,
  parseOutputRef,
  resolveStepParams,
  evaluateCondition,
} from "./planner.js";

// Engine
export { Orchestrator, DEFAULT_ORCHESTRATION_OPTIONS, NO_CHANGE_WARNING } from "./engine.js";

// Blueprints
export {
  nestedS2dLabBlueprint,
  remotingBlueprint,
  diagnosticsBlueprint,
  guestsBlueprint,
  BUILTIN_BLUEPRINTS,
  getBlueprint,
  listBlueprints,
  registerBlueprint,
} from "./blueprints.js";
