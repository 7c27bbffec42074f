/**
 * Lab Orchestration — Step Registry
 *
 * Step type definitions and their handlers, keyed by type ID.
 */

import { LabError } from "../errors.js";
import type { StepCategory, StepHandler, StepTypeDefinition, StepTypeId } from "./types.js";

const stepDefinitions = new Map<StepTypeId, StepTypeDefinition>();
const stepHandlers = new Map<StepTypeId, StepHandler>();

/**
 * Register a step type. Registering an ID twice is an error unless
 * `replace` is set.
 */
export function registerStepType(
  definition: StepTypeDefinition,
  handler: StepHandler,
  options: { replace?: boolean } = {},
): void {
  if (stepDefinitions.has(definition.id) && !options.replace) {
    throw new LabError(`Step type "${definition.id}" is already registered`, "DUPLICATE_STEP_TYPE");
  }
  stepDefinitions.set(definition.id, definition);
  stepHandlers.set(definition.id, handler);
}

export function getStepDefinition(id: StepTypeId): StepTypeDefinition | undefined {
  return stepDefinitions.get(id);
}

export function getStepHandler(id: StepTypeId): StepHandler | undefined {
  return stepHandlers.get(id);
}

export function listStepTypes(): StepTypeDefinition[] {
  return [...stepDefinitions.values()];
}

export function listStepTypesByCategory(category: StepCategory): StepTypeDefinition[] {
  return [...stepDefinitions.values()].filter((d) => d.category === category);
}

export function hasStepType(id: StepTypeId): boolean {
  return stepDefinitions.has(id);
}

/** Remove a step type (tests). */
export function unregisterStepType(id: StepTypeId): boolean {
  stepHandlers.delete(id);
  return stepDefinitions.delete(id);
}

/** Clear all registrations (tests). */
export function clearStepRegistry(): void {
  stepDefinitions.clear();
  stepHandlers.clear();
}
