/**
 * Progress reporting for long-running lab operations (terraform apply,
 * plan execution).
 */

import type { OrchestrationEvent, OrchestrationEventListener } from "./orchestration/types.js";

// =============================================================================
// Types
// =============================================================================

export type ProgressReporter = {
  /** Set the label text. */
  setLabel: (label: string) => void;
  /** Set the completion percentage (0–100). */
  setPercent: (percent: number) => void;
  /** Increment progress by one unit. */
  tick: () => void;
  /** Mark progress as complete and clean up. */
  done: () => void;
};

export type ProgressStream = {
  write: (chunk: string) => unknown;
};

export type ProgressOptions = {
  /** Show on stderr (default: true). */
  stderr?: boolean;
  /** Total units for tick-based progress. */
  total?: number;
  /** Suppress output entirely. */
  silent?: boolean;
  /** Write here instead of a process stream. */
  stream?: ProgressStream;
};

// =============================================================================
// Core Progress Reporter
// =============================================================================

export function createLabProgress(label: string, options?: ProgressOptions): ProgressReporter {
  const silent = options?.silent ?? false;
  const total = options?.total ?? 100;
  const stream: ProgressStream = options?.stream ?? (options?.stderr !== false ? process.stderr : process.stdout);
  let currentLabel = label;
  let currentPercent = 0;
  let ticks = 0;
  let isDone = false;

  function render() {
    if (silent || isDone) return;
    const pct = Math.min(100, Math.round(currentPercent));
    stream.write(`\r  ${currentLabel} [${pct}%]`);
  }

  render();

  return {
    setLabel(newLabel: string) {
      currentLabel = newLabel;
      render();
    },
    setPercent(percent: number) {
      currentPercent = percent;
      render();
    },
    tick() {
      ticks++;
      currentPercent = (ticks / total) * 100;
      render();
    },
    done() {
      if (isDone) return;
      isDone = true;
      currentPercent = 100;
      if (!silent) stream.write(`\r  ${currentLabel} [100%]\n`);
    },
  };
}

/**
 * Run `fn` with a progress line that is closed whether it succeeds or not.
 */
export async function withLabProgress<T>(
  label: string,
  fn: (progress: ProgressReporter) => Promise<T>,
  options?: ProgressOptions,
): Promise<T> {
  const progress = createLabProgress(label, options);
  try {
    return await fn(progress);
  } finally {
    progress.done();
  }
}

// =============================================================================
// Multi-Step Progress
// =============================================================================

export type MultiStepProgress = ProgressReporter & {
  /** Advance to the next step. */
  nextStep: (label: string) => void;
};

export function createMultiStepProgress(name: string, totalSteps: number, options?: ProgressOptions): MultiStepProgress {
  let currentStep = 0;
  const progress = createLabProgress(`${name}: initializing`, { ...options, total: totalSteps });

  return {
    ...progress,
    nextStep(label: string) {
      currentStep++;
      progress.setLabel(`${name}: ${label} (${currentStep}/${totalSteps})`);
      progress.setPercent((currentStep / totalSteps) * 100);
    },
  };
}

/**
 * Listener that drives a multi-step progress line from plan events. The
 * line is closed when the plan finishes, fails or is cancelled.
 */
export function planProgressListener(name: string, totalSteps: number, options?: ProgressOptions): OrchestrationEventListener {
  const progress = createLabProgress(`${name}: starting`, options);
  let finished = 0;

  return (event: OrchestrationEvent) => {
    switch (event.type) {
      case "step:start":
        progress.setLabel(`${name}: ${event.stepName ?? event.stepId ?? "step"} (${finished + 1}/${totalSteps})`);
        break;
      case "step:complete":
      case "step:failed":
      case "step:skipped":
        finished++;
        progress.setPercent(totalSteps === 0 ? 100 : (finished / totalSteps) * 100);
        break;
      case "plan:complete":
      case "plan:failed":
      case "plan:cancelled":
        progress.done();
        break;
      default:
        break;
    }
  };
}
