import type { Command } from "commander";

import { LabError } from "../../errors.js";
import type { OrchestrationResult, StepStatus } from "../../orchestration/index.js";
import { planProgressListener } from "../../progress.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

const STEP_ICONS: Record<StepStatus, string> = {
  succeeded: theme.success("✓"),
  failed: theme.error("✗"),
  skipped: theme.muted("○"),
  pending: theme.muted("·"),
  running: theme.info("…"),
};

/** `key=value`; the value is read as JSON when it parses, else kept as text. */
export function parseParam(value: string, previous: Record<string, unknown> = {}): Record<string, unknown> {
  const at = value.indexOf("=");
  if (at <= 0) throw new LabError(`Expected key=value, got "${value}"`, "INVALID_PARAM");
  const key = value.slice(0, at);
  const text = value.slice(at + 1);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    parsed = text;
  }
  return { ...previous, [key]: parsed };
}

export function printPlanResult(session: CliSession, result: OrchestrationResult) {
  for (const s of result.steps) {
    session.out.log(`  ${STEP_ICONS[s.status]} ${s.stepName} [${s.stepType}] ${s.durationMs}ms`);
    for (const w of s.warnings) session.out.log(`      ${theme.warn(w)}`);
    if (s.error) session.out.log(`      ${theme.error(s.error)}`);
    if (s.reason) session.out.log(`      ${theme.muted(s.reason)}`);
  }
  const status = result.status === "succeeded" ? theme.success(result.status) : theme.error(result.status);
  session.out.log(`\nStatus: ${status} (${result.totalDurationMs}ms)`);
  if (result.errors.length > 0) {
    session.out.log(theme.error("\nErrors:"));
    for (const e of result.errors) session.out.log(`  - ${e}`);
  }
}

export function registerConfigureCommand(program: Command, session: CliSession) {
  program
    .command("configure")
    .description("Run a blueprint against the lab nodes")
    .option("-b, --blueprint <id>", "Blueprint to run", "nested-s2d-lab")
    .option("-n, --node <name...>", "Limit a per-node blueprint to these nodes")
    .option("-p, --param <key=value>", "Blueprint parameter (repeatable)", parseParam, {})
    .option("--dry-run", "Walk the plan without touching any node")
    .action(
      async (opts: { blueprint: string; node?: string[]; param: Record<string, unknown>; dryRun?: boolean }) => {
        await session.run("Configure failed", async () => {
          const manager = await session.manager();
          const options = { params: opts.param, nodes: opts.node, dryRun: opts.dryRun };
          const plan = await manager.createPlan(opts.blueprint, options);

          session.out.log(`${theme.info(opts.dryRun ? "DRY RUN" : "LIVE EXECUTION")}: ${plan.name} (${plan.steps.length} steps)\n`);
          const result = await manager.execute(plan, {
            ...options,
            onEvent: planProgressListener(plan.name, plan.steps.length, session.ctx.progress),
          });
          printPlanResult(session, result);
          if (result.status !== "succeeded") session.ctx.setExitCode(1);
        });
      },
    );
}
