import type { Command } from "commander";

import { getBlueprint, listBlueprints } from "../../orchestration/index.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

export function registerBlueprintsCommand(program: Command, session: CliSession) {
  program
    .command("blueprints")
    .description("List the blueprints that configure can run")
    .action(async () => {
      await session.run("Failed to list blueprints", async () => {
        for (const summary of listBlueprints()) {
          session.out.log(`\n  ${theme.info(summary.id)}  ${summary.name}`);
          session.out.log(`    ${summary.description}`);
          for (const p of getBlueprint(summary.id)?.parameters ?? []) {
            const fallback = p.default === undefined ? "" : theme.muted(` (default: ${JSON.stringify(p.default)})`);
            session.out.log(`    --param ${p.name}=<${p.type}>  ${p.description}${fallback}`);
          }
        }
      });
    });
}
