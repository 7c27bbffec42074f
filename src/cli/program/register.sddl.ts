import type { Command } from "commander";

import { LabError } from "../../errors.js";
import {
  explainSddl,
  formatExplainedAce,
  formatSddl,
  grantAccess,
  isSidAlias,
  parseSddl,
  resolveSidAlias,
  revokeAccess,
  sidToAlias,
  wmiPermissionsToMask,
} from "../../sddl/index.js";
import { parseList, parseWmiPermissions } from "../options.js";
import type { CliSession } from "../program.js";

function localSid(principal: string): string {
  const sid = resolveSidAlias(principal);
  if (sid) return sidToAlias(sid);
  // Domain-relative aliases (DA, DU...) need the domain SID, so they stay aliases.
  if (isSidAlias(principal)) return principal.toUpperCase();
  throw new LabError(`${principal} is not a SID or a well-known alias; resolve accounts with "wmi grant"`, "UNKNOWN_PRINCIPAL");
}

export function registerSddlCommands(program: Command, session: CliSession) {
  const sddl = program.command("sddl").description("Edit SDDL strings offline");

  sddl
    .command("grant <sddl>")
    .description("Add WMI permissions for a principal and print the new SDDL")
    .requiredOption("--principal <sid>", "SID alias (BA, RM, AU...) or string SID")
    .requiredOption("--permissions <list>", "Comma separated WMI permission names", parseList)
    .option("--inherit", "Add the CI (container inherit) flag")
    .action(async (text: string, opts: { principal: string; permissions: string[]; inherit?: boolean }) => {
      await session.run("Failed to edit SDDL", async () => {
        const mask = wmiPermissionsToMask(parseWmiPermissions(opts.permissions));
        const sd = grantAccess(parseSddl(text), localSid(opts.principal), mask, { inherit: opts.inherit === true });
        session.out.log(formatSddl(sd));
      });
    });

  sddl
    .command("revoke <sddl>")
    .description("Remove a principal's explicit allow entries and print the new SDDL")
    .requiredOption("--principal <sid>", "SID alias or string SID")
    .action(async (text: string, opts: { principal: string }) => {
      await session.run("Failed to edit SDDL", async () => {
        session.out.log(formatSddl(revokeAccess(parseSddl(text), localSid(opts.principal))));
      });
    });

  sddl
    .command("explain <sddl>")
    .description("List the entries of an SDDL string with WMI permission names")
    .option("--json", "Output as JSON")
    .action(async (text: string, opts: { json?: boolean }) => {
      await session.run("Failed to parse SDDL", async () => {
        const rows = explainSddl(parseSddl(text));
        if (opts.json) {
          session.out.log(JSON.stringify(rows, null, 2));
          return;
        }
        for (const row of rows) session.out.log(formatExplainedAce(row));
      });
    });
}
