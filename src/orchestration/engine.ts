/**
 * Lab Orchestration — Engine
 *
 * Runs a validated plan one step at a time in dependency order:
 * - resolves output and `$global.` references at run time
 * - evaluates step conditions, skipping steps whose condition is false
 * - retries failed attempts with a fixed delay, under a per-step timeout;
 *   a timed-out attempt is aborted and awaited before the next one starts
 * - stops at the first failure (fail-fast) or skips only the dependents
 * - honours an AbortSignal and an optional whole-plan timeout
 * - emits lifecycle events, including `step:warning` for steps that
 *   succeeded without changing anything
 *
 * Dry-run walks the same path without calling handlers.
 */

import { getLabLogger } from "../logging/index.js";
import { formatErrorMessage, sleep } from "../retry.js";
import { getStepDefinition, getStepHandler } from "./registry.js";
import { evaluateCondition, flattenLayers, resolveStepParams, stepDependencies, topologicalSort, validatePlan } from "./planner.js";
import type {
  ExecutionPlan,
  ExecutionState,
  OrchestrationEvent,
  OrchestrationEventListener,
  OrchestrationOptions,
  OrchestrationResult,
  PlanStep,
  StepContext,
  StepExecutionResult,
  StepExecutionState,
  StepHandler,
  StepInstanceId,
  StepLogger,
} from "./types.js";

// =============================================================================
// Default Options
// =============================================================================

type ResolvedOptions = Required<Omit<OrchestrationOptions, "signal">> & { signal?: AbortSignal };

export const DEFAULT_ORCHESTRATION_OPTIONS: Required<Omit<OrchestrationOptions, "signal">> = {
  dryRun: false,
  failFast: true,
  timeoutMs: 0,
  stepTimeoutMs: 1_800_000, // 30 min: feature installs and S2D enablement are slow
  maxRetries: 1,
  retryDelayMs: 15_000,
};

/** Message attached to steps that report `changed: false`. */
export const NO_CHANGE_WARNING = "already in the desired state, nothing changed";

// =============================================================================
// Orchestrator
// =============================================================================

export class Orchestrator {
  private options: ResolvedOptions;
  private listeners: OrchestrationEventListener[] = [];
  private log = getLabLogger("orchestration");

  constructor(options: OrchestrationOptions = {}) {
    const defaults = DEFAULT_ORCHESTRATION_OPTIONS;
    this.options = {
      dryRun: options.dryRun ?? defaults.dryRun,
      failFast: options.failFast ?? defaults.failFast,
      timeoutMs: options.timeoutMs ?? defaults.timeoutMs,
      stepTimeoutMs: options.stepTimeoutMs ?? defaults.stepTimeoutMs,
      maxRetries: options.maxRetries ?? defaults.maxRetries,
      retryDelayMs: options.retryDelayMs ?? defaults.retryDelayMs,
      signal: options.signal,
    };
  }

  /** Subscribe to lifecycle events. Returns an unsubscribe function. */
  on(listener: OrchestrationEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<OrchestrationEvent, "timestamp">): void {
    const full: OrchestrationEvent = { ...event, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (error) {
        this.log.warn(`Event listener failed on ${full.type}: ${formatErrorMessage(error)}`);
      }
    }
  }

  async execute(plan: ExecutionPlan): Promise<OrchestrationResult> {
    const started = Date.now();
    const opts = this.options;

    // 1. Validate
    const validation = validatePlan(plan);
    for (const issue of validation.issues) {
      if (issue.severity === "warning") this.log.warn(issue.message, { code: issue.code, stepId: issue.stepId });
    }
    if (!validation.valid) {
      const errors = validation.issues.filter((i) => i.severity === "error").map((i) => i.message);
      this.emit({ type: "plan:failed", planId: plan.id, message: `Plan "${plan.name}" is invalid`, error: errors[0] });
      return this.result(plan, "failed", started, [], new Map(), errors);
    }

    // 2. Order
    let order: PlanStep[];
    try {
      order = flattenLayers(topologicalSort(plan.steps));
    } catch (error) {
      return this.result(plan, "failed", started, [], new Map(), [formatErrorMessage(error)]);
    }

    // 3. State
    const state: ExecutionState = {
      planId: plan.id,
      status: "running",
      startedAt: new Date(started).toISOString(),
      steps: new Map(),
      resolvedOutputs: new Map(),
    };
    for (const step of plan.steps) {
      state.steps.set(step.id, { stepId: step.id, status: "pending", outputs: {}, warnings: [], retryCount: 0 });
    }

    const stepResults: StepExecutionResult[] = [];
    const blocked = new Set<StepInstanceId>();
    const total = plan.steps.length;

    this.emit({
      type: "plan:start",
      planId: plan.id,
      message: `Starting plan "${plan.name}" with ${total} steps${opts.dryRun ? " (dry-run)" : ""}`,
      progress: progress(0, total),
    });

    // 4. Cancellation and plan timeout
    const timeoutController = new AbortController();
    const planTimer = opts.timeoutMs > 0 ? setTimeout(() => timeoutController.abort(), opts.timeoutMs) : undefined;
    const signal = opts.signal ? anySignal([opts.signal, timeoutController.signal]) : timeoutController.signal;

    let planFailed = false;

    try {
      // 5. Run in order
      for (const step of order) {
        if (signal.aborted) break;
        if (planFailed && opts.failFast) break;

        const blocker = this.findBlocker(step, state, blocked);
        if (blocker) {
          blocked.add(step.id);
          this.markSkipped(state, step, stepResults, plan.id, `dependency "${blocker}" did not succeed`);
          continue;
        }

        if (step.condition && !evaluateCondition(step.condition, state.steps, state.resolvedOutputs)) {
          this.markSkipped(state, step, stepResults, plan.id, "condition not met");
          continue;
        }

        const result = await this.executeStep(step, state, plan, signal);
        stepResults.push(result);
        if (result.status === "failed") {
          planFailed = true;
          blocked.add(step.id);
        }

        this.emitProgress(plan.id, stepResults.length, total);
      }

      for (const step of plan.steps) {
        if (state.steps.get(step.id)?.status === "pending") {
          this.markSkipped(
            state,
            step,
            stepResults,
            plan.id,
            signal.aborted ? "plan cancelled" : planFailed ? "skipped due to earlier failure" : "not reached",
          );
        }
      }
    } finally {
      if (planTimer) clearTimeout(planTimer);
    }

    const errors = stepResults.flatMap((r) => (r.error ? [`${r.stepId}: ${r.error}`] : []));

    // 6. Outcome
    if (signal.aborted) {
      const reason = timeoutController.signal.aborted
        ? `Plan timed out after ${opts.timeoutMs}ms`
        : "Orchestration was cancelled";
      this.emit({ type: "plan:cancelled", planId: plan.id, message: reason });
      return this.result(plan, "cancelled", started, stepResults, state.resolvedOutputs, [...errors, reason]);
    }

    const status = planFailed ? "failed" : "succeeded";
    this.emit({
      type: planFailed ? "plan:failed" : "plan:complete",
      planId: plan.id,
      message: planFailed
        ? `Plan "${plan.name}" failed`
        : `Plan "${plan.name}" completed in ${Date.now() - started}ms`,
      error: errors[0],
    });
    return this.result(plan, status, started, stepResults, state.resolvedOutputs, errors);
  }

  // ---------------------------------------------------------------------------
  // Step Execution
  // ---------------------------------------------------------------------------

  private async executeStep(
    step: PlanStep,
    state: ExecutionState,
    plan: ExecutionPlan,
    signal: AbortSignal,
  ): Promise<StepExecutionResult> {
    const opts = this.options;
    const stepState: StepExecutionState = state.steps.get(step.id) ?? {
      stepId: step.id,
      status: "pending",
      outputs: {},
      warnings: [],
      retryCount: 0,
    };
    state.steps.set(step.id, stepState);

    const stepStart = Date.now();
    stepState.status = "running";
    stepState.startedAt = new Date(stepStart).toISOString();

    this.emit({
      type: "step:start",
      planId: plan.id,
      stepId: step.id,
      stepName: step.name,
      message: `Starting step "${step.name}" (${step.type})`,
    });

    const fail = (error: string, message: string): StepExecutionResult => {
      stepState.status = "failed";
      stepState.completedAt = new Date().toISOString();
      stepState.durationMs = Date.now() - stepStart;
      stepState.error = error;
      this.emit({ type: "step:failed", planId: plan.id, stepId: step.id, stepName: step.name, message, error });
      return this.stepResult(step, stepState.durationMs, {}, stepState.warnings, { error });
    };

    const handler = getStepHandler(step.type);
    if (!handler) {
      const error = `No handler registered for step type "${step.type}"`;
      return fail(error, error);
    }

    let params: Record<string, unknown>;
    try {
      params = { ...parameterDefaults(step.type), ...resolveStepParams(step, state.resolvedOutputs, plan.globalParams) };
    } catch (err) {
      const error = formatErrorMessage(err);
      return fail(error, `Failed to resolve params: ${error}`);
    }

    const ctx: StepContext = {
      stepId: step.id,
      params,
      globalParams: plan.globalParams,
      log: this.createStepLogger(plan.id, step, stepState.warnings),
      signal,
    };

    if (opts.dryRun) {
      const outputs: Record<string, unknown> = {};
      for (const out of getStepDefinition(step.type)?.outputs ?? []) {
        outputs[out.name] = `<dry-run:${out.name}>`;
      }
      return this.succeed(step, stepState, state, plan, stepStart, outputs, " (dry-run)");
    }

    const timeoutMs = step.timeoutMs ?? opts.stepTimeoutMs;
    const maxAttempts = Math.max(0, step.maxRetries ?? opts.maxRetries) + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal.aborted) break;

      try {
        const outputs = await runAttempt(handler, ctx, timeoutMs, signal, `Step "${step.id}"`);
        return this.succeed(step, stepState, state, plan, stepStart, outputs, "");
      } catch (error) {
        lastError = error;
        stepState.retryCount = attempt;

        if (attempt < maxAttempts && !signal.aborted) {
          const message = formatErrorMessage(error);
          ctx.log.debug(`Attempt ${attempt}/${maxAttempts} failed: ${message}`);
          this.emit({
            type: "step:retry",
            planId: plan.id,
            stepId: step.id,
            stepName: step.name,
            message: `Retrying step "${step.name}" (attempt ${attempt + 1}/${maxAttempts}) in ${opts.retryDelayMs}ms`,
            error: message,
          });
          await sleep(opts.retryDelayMs, signal);
        }
      }
    }

    const error = lastError === undefined ? "cancelled before it started" : formatErrorMessage(lastError);
    return fail(error, `Step "${step.name}" failed: ${error}`);
  }

  private succeed(
    step: PlanStep,
    stepState: StepExecutionState,
    state: ExecutionState,
    plan: ExecutionPlan,
    stepStart: number,
    outputs: Record<string, unknown>,
    suffix: string,
  ): StepExecutionResult {
    if (outputs.changed === false) {
      stepState.warnings.push(NO_CHANGE_WARNING);
      this.emit({
        type: "step:warning",
        planId: plan.id,
        stepId: step.id,
        stepName: step.name,
        message: `Step "${step.name}": ${NO_CHANGE_WARNING}`,
      });
    }

    const durationMs = Date.now() - stepStart;
    stepState.status = "succeeded";
    stepState.completedAt = new Date().toISOString();
    stepState.outputs = outputs;
    stepState.durationMs = durationMs;
    state.resolvedOutputs.set(step.id, outputs);

    this.emit({
      type: "step:complete",
      planId: plan.id,
      stepId: step.id,
      stepName: step.name,
      message: `Step "${step.name}" succeeded in ${durationMs}ms${suffix}`,
      outputs,
    });
    return this.stepResult(step, durationMs, outputs, stepState.warnings, {});
  }

  /**
   * First dependency that failed or was itself blocked. A dependency only
   * named by a `failed` condition never blocks.
   */
  private findBlocker(step: PlanStep, state: ExecutionState, blocked: ReadonlySet<StepInstanceId>): StepInstanceId | undefined {
    const onFailure = step.condition?.check === "failed" ? step.condition.stepId : undefined;
    for (const dep of stepDependencies(step)) {
      if (dep === onFailure) continue;
      if (blocked.has(dep) || state.steps.get(dep)?.status === "failed") return dep;
    }
    return undefined;
  }

  private markSkipped(
    state: ExecutionState,
    step: PlanStep,
    stepResults: StepExecutionResult[],
    planId: string,
    reason: string,
  ): void {
    const stepState = state.steps.get(step.id);
    if (stepState) {
      stepState.status = "skipped";
      stepState.completedAt = new Date().toISOString();
    }
    this.emit({
      type: "step:skipped",
      planId,
      stepId: step.id,
      stepName: step.name,
      message: `Step "${step.name}" skipped: ${reason}`,
    });
    stepResults.push({
      stepId: step.id,
      stepName: step.name,
      stepType: step.type,
      status: "skipped",
      durationMs: 0,
      outputs: {},
      warnings: [],
      reason,
    });
  }

  private emitProgress(planId: string, completed: number, total: number): void {
    this.log.debug(`Progress ${completed}/${total}`, { planId });
  }

  private createStepLogger(planId: string, step: PlanStep, warnings: string[]): StepLogger {
    const log = this.log.withContext({ planId, stepId: step.id });
    return {
      debug: (msg) => log.debug(msg),
      info: (msg) => log.info(msg),
      warn: (msg) => {
        warnings.push(msg);
        log.warn(msg);
        this.emit({ type: "step:warning", planId, stepId: step.id, stepName: step.name, message: msg });
      },
      error: (msg) => log.error(msg),
    };
  }

  private stepResult(
    step: PlanStep,
    durationMs: number,
    outputs: Record<string, unknown>,
    warnings: string[],
    extra: { error?: string },
  ): StepExecutionResult {
    return {
      stepId: step.id,
      stepName: step.name,
      stepType: step.type,
      status: extra.error === undefined ? "succeeded" : "failed",
      durationMs,
      outputs,
      warnings: [...warnings],
      ...extra,
    };
  }

  private result(
    plan: ExecutionPlan,
    status: OrchestrationResult["status"],
    started: number,
    steps: StepExecutionResult[],
    outputs: ReadonlyMap<string, Record<string, unknown>>,
    errors: string[],
  ): OrchestrationResult {
    return {
      planId: plan.id,
      planName: plan.name,
      status,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      totalDurationMs: Date.now() - started,
      steps,
      outputs: Object.fromEntries(outputs),
      errors,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function progress(completed: number, total: number): { completed: number; total: number; percentage: number } {
  return { completed, total, percentage: total === 0 ? 100 : Math.round((completed / total) * 100) };
}

function parameterDefaults(type: string): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const param of getStepDefinition(type)?.parameters ?? []) {
    if (param.default !== undefined) defaults[param.name] = param.default;
  }
  return defaults;
}

/**
 * One handler call under its own AbortSignal, which aborts on timeout or
 * when the plan signal does. The handler is always awaited, so an abandoned
 * attempt has finished before the caller moves on.
 */
async function runAttempt(
  handler: StepHandler,
  ctx: StepContext,
  timeoutMs: number,
  signal: AbortSignal,
  label: string,
): Promise<Record<string, unknown>> {
  if (signal.aborted) throw new Error(`${label} was cancelled`);

  const attempt = new AbortController();
  let interrupted: Error | undefined;
  const interrupt = (reason: Error): void => {
    interrupted ??= reason;
    attempt.abort(reason);
  };
  const onAbort = (): void => interrupt(new Error(`${label} was cancelled`));
  signal.addEventListener("abort", onAbort, { once: true });
  const timer =
    timeoutMs > 0 ? setTimeout(() => interrupt(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs) : undefined;

  try {
    const outputs = await handler.execute({ ...ctx, signal: attempt.signal });
    if (interrupted) throw interrupted;
    return outputs;
  } catch (error) {
    throw interrupted ?? error;
  } finally {
    if (timer) clearTimeout(timer);
    signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Combine AbortSignals: aborts when any of them does.
 */
function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      return controller.signal;
    }
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}
