import type { Command } from "commander";

import type { CheckStatus } from "../../diagnostics/index.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

const CHECK_ICONS: Record<CheckStatus, string> = {
  pass: theme.success("✓"),
  warn: theme.warn("!"),
  fail: theme.error("✗"),
};

function colorStatus(status: CheckStatus): string {
  return status === "pass" ? theme.success(status) : status === "warn" ? theme.warn(status) : theme.error(status);
}

export function registerStatusCommand(program: Command, session: CliSession) {
  program
    .command("status")
    .description("Check features, networking, remoting and storage on the lab nodes")
    .option("-n, --node <name...>", "Only these nodes")
    .option("--json", "Output as JSON")
    .action(async (opts: { node?: string[]; json?: boolean }) => {
      await session.run("Failed to collect status", async () => {
        const { reports, summary } = await (await session.manager()).status(opts.node);
        if (summary.status === "fail") session.ctx.setExitCode(1);

        if (opts.json) {
          session.out.log(JSON.stringify({ summary, reports }, null, 2));
          return;
        }

        for (const report of reports) {
          session.out.log(`\n${report.node} (${report.computerName}): ${colorStatus(report.status)}`);
          for (const check of report.checks) {
            session.out.log(`  ${CHECK_ICONS[check.status]} ${check.id}: ${check.message}`);
          }
        }
        const { pass, warn, fail } = summary.counts;
        session.out.log(`\nStatus: ${colorStatus(summary.status)} (${pass} pass, ${warn} warn, ${fail} fail)`);
      });
    });
}
