/**
 * Lab Orchestration — Planner
 *
 * Plan validation, reference resolution, condition evaluation and
 * dependency ordering.
 */

import type {
  ExecutionPlan,
  PlanStep,
  PlanValidation,
  PlanValidationIssue,
  StepCondition,
  StepInstanceId,
  StepOutputRef,
  StepStatus,
} from "./types.js";
import { getStepDefinition } from "./registry.js";

const GLOBAL_PREFIX = "$global.";

// =============================================================================
// Plan Validation
// =============================================================================

/**
 * Check a plan for unknown step types, missing required parameters, bad
 * `dependsOn` entries, bad output references, bad conditions, cycles and
 * duplicate step IDs.
 */
export function validatePlan(plan: ExecutionPlan): PlanValidation {
  const issues: PlanValidationIssue[] = [];
  const stepIds = new Set(plan.steps.map((s) => s.id));
  const stepMap = new Map(plan.steps.map((s) => [s.id, s]));

  // 1. Step types and required parameters
  for (const step of plan.steps) {
    const def = getStepDefinition(step.type);
    if (!def) {
      issues.push({ severity: "error", stepId: step.id, code: "UNKNOWN_STEP_TYPE", message: `Unknown step type "${step.type}"` });
      continue;
    }

    for (const paramDef of def.parameters) {
      if (!paramDef.required || paramDef.default !== undefined) continue;
      const value = step.params[paramDef.name];
      if (value === undefined || value === null || value === "") {
        issues.push({
          severity: "error",
          stepId: step.id,
          code: "MISSING_PARAM",
          message: `Missing required parameter "${paramDef.name}" for step type "${step.type}"`,
        });
      } else if (typeof value === "string" && value.startsWith(GLOBAL_PREFIX)) {
        const key = value.slice(GLOBAL_PREFIX.length);
        if (plan.globalParams[key] === undefined) {
          issues.push({
            severity: "error",
            stepId: step.id,
            code: "MISSING_GLOBAL",
            message: `Parameter "${paramDef.name}" refers to undefined global "${key}"`,
          });
        }
      }
    }
  }

  // 2. dependsOn
  for (const step of plan.steps) {
    for (const depId of step.dependsOn) {
      if (depId === step.id) {
        issues.push({ severity: "error", stepId: step.id, code: "SELF_DEP", message: "Step depends on itself" });
      } else if (!stepIds.has(depId)) {
        issues.push({
          severity: "error",
          stepId: step.id,
          code: "INVALID_DEP",
          message: `dependsOn refers to unknown step "${depId}"`,
        });
      }
    }
  }

  // 3. Output references
  for (const step of plan.steps) {
    for (const [paramName, value] of Object.entries(step.params)) {
      if (typeof value !== "string" || !isOutputRef(value)) continue;
      const parsed = parseOutputRef(value);
      if (!parsed) continue;

      const { sourceStepId, outputName } = parsed;
      const sourceStep = stepMap.get(sourceStepId);
      if (!sourceStep) {
        issues.push({
          severity: "error",
          stepId: step.id,
          code: "UNKNOWN_OUTPUT_STEP",
          message: `Output ref "${value}" in "${paramName}" refers to unknown step "${sourceStepId}"`,
        });
        continue;
      }
      if (!isTransitiveDependency(step.id, sourceStepId, stepMap)) {
        issues.push({
          severity: "warning",
          stepId: step.id,
          code: "UNDECLARED_DEP",
          message: `Output ref "${value}" references step "${sourceStepId}" which is not a declared dependency`,
        });
      }
      const sourceDef = getStepDefinition(sourceStep.type);
      if (sourceDef && !sourceDef.outputs.some((o) => o.name === outputName)) {
        issues.push({
          severity: "error",
          stepId: step.id,
          code: "INVALID_OUTPUT_NAME",
          message: `Output ref "${value}": step type "${sourceStep.type}" has no output named "${outputName}"`,
        });
      }
    }
  }

  // 4. Conditions
  for (const step of plan.steps) {
    if (step.condition) validateCondition(step.condition, step, stepMap, issues);
  }

  // 5. Cycles
  const cycle = detectCycle(plan.steps);
  if (cycle) {
    issues.push({ severity: "error", code: "CYCLE", message: `Circular dependency detected: ${cycle.join(" -> ")}` });
  }

  // 6. Duplicate IDs
  const seen = new Set<string>();
  for (const step of plan.steps) {
    if (seen.has(step.id)) {
      issues.push({ severity: "error", stepId: step.id, code: "DUPLICATE_ID", message: `Duplicate step ID "${step.id}"` });
    }
    seen.add(step.id);
  }

  return {
    valid: issues.every((i) => i.severity !== "error"),
    issues,
  };
}

// =============================================================================
// Ordering
// =============================================================================

/** Declared dependencies plus the steps named by output references and conditions. */
export function stepDependencies(step: PlanStep): Set<StepInstanceId> {
  const deps = new Set<StepInstanceId>(step.dependsOn);
  for (const value of Object.values(step.params)) {
    if (typeof value !== "string") continue;
    const parsed = parseOutputRef(value);
    if (parsed) deps.add(parsed.sourceStepId);
  }
  if (step.condition) deps.add(step.condition.stepId);
  return deps;
}

/**
 * Kahn's algorithm. Returns layers: a step's dependencies are all in
 * earlier layers. Order inside a layer follows plan order.
 *
 * @throws Error when the plan has a cycle (validatePlan reports it first).
 */
export function topologicalSort(steps: readonly PlanStep[]): PlanStep[][] {
  const inDegree = new Map<StepInstanceId, number>();
  const dependents = new Map<StepInstanceId, StepInstanceId[]>();
  const known = new Set(steps.map((s) => s.id));

  for (const step of steps) {
    inDegree.set(step.id, 0);
    dependents.set(step.id, []);
  }

  for (const step of steps) {
    for (const dep of stepDependencies(step)) {
      if (!known.has(dep) || dep === step.id) continue;
      dependents.get(dep)?.push(step.id);
      inDegree.set(step.id, (inDegree.get(step.id) ?? 0) + 1);
    }
  }

  const layers: PlanStep[][] = [];
  let current = steps.filter((s) => inDegree.get(s.id) === 0);
  let processed = 0;

  while (current.length > 0) {
    layers.push(current);
    processed += current.length;

    const ready = new Set<StepInstanceId>();
    for (const step of current) {
      for (const next of dependents.get(step.id) ?? []) {
        const degree = (inDegree.get(next) ?? 1) - 1;
        inDegree.set(next, degree);
        if (degree === 0) ready.add(next);
      }
    }
    current = steps.filter((s) => ready.has(s.id));
  }

  if (processed < steps.length) {
    throw new Error("Cycle detected in execution plan: topological sort failed");
  }
  return layers;
}

export function flattenLayers(layers: PlanStep[][]): PlanStep[] {
  return layers.flat();
}

// =============================================================================
// References
// =============================================================================

const OUTPUT_REF_REGEX = /^([a-zA-Z0-9_-]+)\.outputs\.([a-zA-Z0-9_]+)$/;

export function isOutputRef(value: string): value is StepOutputRef {
  return OUTPUT_REF_REGEX.test(value);
}

export function parseOutputRef(ref: string): { sourceStepId: string; outputName: string } | null {
  const match = OUTPUT_REF_REGEX.exec(ref);
  if (!match) return null;
  return { sourceStepId: match[1], outputName: match[2] };
}

/**
 * Replace output references and `$global.` references in a step's params
 * with concrete values.
 */
export function resolveStepParams(
  step: PlanStep,
  resolvedOutputs: ReadonlyMap<string, Record<string, unknown>>,
  globalParams: Record<string, unknown>,
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(step.params)) {
    if (typeof value !== "string") {
      resolved[key] = value;
      continue;
    }

    const parsed = parseOutputRef(value);
    if (parsed) {
      const outputs = resolvedOutputs.get(parsed.sourceStepId);
      if (!outputs) {
        throw new Error(`Cannot resolve "${value}": step "${parsed.sourceStepId}" has no outputs yet`);
      }
      const outputValue = outputs[parsed.outputName];
      if (outputValue === undefined) {
        throw new Error(`Cannot resolve "${value}": output "${parsed.outputName}" not found in step "${parsed.sourceStepId}"`);
      }
      resolved[key] = outputValue;
    } else if (value.startsWith(GLOBAL_PREFIX)) {
      resolved[key] = globalParams[value.slice(GLOBAL_PREFIX.length)] ?? value;
    } else {
      resolved[key] = value;
    }
  }

  return resolved;
}

// =============================================================================
// Conditions
// =============================================================================

export function evaluateCondition(
  condition: StepCondition,
  stepStates: ReadonlyMap<string, { status: StepStatus }>,
  resolvedOutputs: ReadonlyMap<string, Record<string, unknown>>,
): boolean {
  switch (condition.check) {
    case "succeeded":
      return stepStates.get(condition.stepId)?.status === "succeeded";

    case "failed":
      return stepStates.get(condition.stepId)?.status === "failed";

    case "output-equals": {
      const outputs = resolvedOutputs.get(condition.stepId);
      if (!outputs || !condition.outputName) return false;
      return outputs[condition.outputName] === condition.expectedValue;
    }

    case "output-truthy": {
      const outputs = resolvedOutputs.get(condition.stepId);
      if (!outputs || !condition.outputName) return false;
      return Boolean(outputs[condition.outputName]);
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateCondition(
  condition: StepCondition,
  step: PlanStep,
  stepMap: ReadonlyMap<string, PlanStep>,
  issues: PlanValidationIssue[],
): void {
  const target = stepMap.get(condition.stepId);
  if (!target) {
    issues.push({
      severity: "error",
      stepId: step.id,
      code: "INVALID_CONDITION_STEP",
      message: `Condition references unknown step "${condition.stepId}"`,
    });
    return;
  }

  const needsOutput = condition.check === "output-equals" || condition.check === "output-truthy";
  if (!needsOutput) return;
  if (!condition.outputName) {
    issues.push({
      severity: "error",
      stepId: step.id,
      code: "INVALID_CONDITION",
      message: `Condition "${condition.check}" needs an outputName`,
    });
    return;
  }
  const def = getStepDefinition(target.type);
  if (def && !def.outputs.some((o) => o.name === condition.outputName)) {
    issues.push({
      severity: "error",
      stepId: step.id,
      code: "INVALID_OUTPUT_NAME",
      message: `Condition: step type "${target.type}" has no output named "${condition.outputName}"`,
    });
  }
}

/**
 * Whether `sourceStepId` is reachable through `dependsOn` from `stepId`.
 */
function isTransitiveDependency(
  stepId: string,
  sourceStepId: string,
  stepMap: ReadonlyMap<string, PlanStep>,
): boolean {
  const visited = new Set<string>();
  const stack = [stepId];

  for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
    if (visited.has(current)) continue;
    visited.add(current);

    for (const dep of stepMap.get(current)?.dependsOn ?? []) {
      if (dep === sourceStepId) return true;
      stack.push(dep);
    }
  }

  return false;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * DFS cycle detection. Returns the cycle path, or null.
 */
function detectCycle(steps: readonly PlanStep[]): string[] | null {
  const stepMap = new Map(steps.map((s) => [s.id, s]));
  const color = new Map<string, number>();
  const parent = new Map<string, string | null>();

  for (const step of steps) {
    color.set(step.id, WHITE);
    parent.set(step.id, null);
  }

  for (const step of steps) {
    if (color.get(step.id) === WHITE) {
      const cycle = dfs(step.id, stepMap, color, parent);
      if (cycle) return cycle;
    }
  }

  return null;
}

function dfs(
  nodeId: string,
  stepMap: ReadonlyMap<string, PlanStep>,
  color: Map<string, number>,
  parent: Map<string, string | null>,
): string[] | null {
  color.set(nodeId, GRAY);

  const step = stepMap.get(nodeId);
  const deps = step ? stepDependencies(step) : new Set<string>();

  for (const dep of deps) {
    if (!color.has(dep) || dep === nodeId) continue;
    if (color.get(dep) === GRAY) {
      const cycle = [dep, nodeId];
      let cur = parent.get(nodeId) ?? null;
      while (cur !== null && cur !== dep) {
        cycle.push(cur);
        cur = parent.get(cur) ?? null;
      }
      cycle.push(dep);
      return cycle.reverse();
    }
    if (color.get(dep) === WHITE) {
      parent.set(dep, nodeId);
      const cycle = dfs(dep, stepMap, color, parent);
      if (cycle) return cycle;
    }
  }

  color.set(nodeId, BLACK);
  return null;
}
