import type { Command } from "commander";

import { describeWmiMask, formatExplainedAce } from "../../sddl/index.js";
import type { WmiEditResult } from "../../wmi/index.js";
import { parseList, parseWmiPermissions } from "../options.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

type WmiOptions = { node: string; namespace?: string };

function printEdit(session: CliSession, verb: string, result: WmiEditResult) {
  const target = `${result.principal} on ${result.namespace} (${result.node})`;
  session.out.log(result.changed ? theme.success(`${verb} ${target}`) : theme.muted(`No change for ${target}`));
  const rights = describeWmiMask(result.effectiveMask);
  session.out.log(`  Effective: ${rights.length > 0 ? rights.join(", ") : "none"}`);
  session.out.log(theme.muted(`  Before: ${result.sddlBefore}`));
  session.out.log(theme.muted(`  After:  ${result.sddlAfter}`));
}

export function registerWmiCommands(program: Command, session: CliSession) {
  const wmi = program.command("wmi").description("Read and edit WMI namespace security on a node");

  const namespaceOf = async (opts: WmiOptions) => opts.namespace ?? (await session.load()).config.wmi.namespace;

  wmi
    .command("show")
    .description("Print the namespace ACL with WMI permission names")
    .requiredOption("-n, --node <name>", "Lab node")
    .option("--namespace <ns>", "WMI namespace (default: wmi.namespace)")
    .option("--json", "Output as JSON")
    .action(async (opts: WmiOptions & { json?: boolean }) => {
      await session.run("Failed to read WMI security", async () => {
        const manager = await session.manager();
        const view = await manager.wmi().show(await manager.node(opts.node), await namespaceOf(opts));
        if (opts.json) {
          session.out.log(JSON.stringify(view, null, 2));
          return;
        }
        session.out.log(`\n${view.namespace} on ${view.node}\n`);
        for (const ace of view.aces) session.out.log(`  ${formatExplainedAce(ace)}`);
        session.out.log(theme.muted(`\n  ${view.sddl}`));
      });
    });

  wmi
    .command("grant")
    .description("Allow a principal on a namespace")
    .requiredOption("-n, --node <name>", "Lab node")
    .requiredOption("--principal <name>", "Account, group, SID alias or SID")
    .requiredOption("--permissions <list>", "Comma separated, e.g. Enable,MethodExecute,RemoteAccess", parseList)
    .option("--namespace <ns>", "WMI namespace (default: wmi.namespace)")
    .option("--no-inherit", "Do not apply to subnamespaces")
    .action(async (opts: WmiOptions & { principal: string; permissions: string[]; inherit: boolean }) => {
      await session.run("Failed to grant WMI access", async () => {
        const permissions = parseWmiPermissions(opts.permissions);
        const manager = await session.manager();
        const result = await manager
          .wmi()
          .grant(await manager.node(opts.node), await namespaceOf(opts), opts.principal, permissions, {
            inherit: opts.inherit,
          });
        printEdit(session, "Granted", result);
      });
    });

  wmi
    .command("revoke")
    .description("Remove a principal's explicit allow entries from a namespace")
    .requiredOption("-n, --node <name>", "Lab node")
    .requiredOption("--principal <name>", "Account, group, SID alias or SID")
    .option("--namespace <ns>", "WMI namespace (default: wmi.namespace)")
    .action(async (opts: WmiOptions & { principal: string }) => {
      await session.run("Failed to revoke WMI access", async () => {
        const manager = await session.manager();
        const result = await manager.wmi().revoke(await manager.node(opts.node), await namespaceOf(opts), opts.principal);
        printEdit(session, "Revoked", result);
      });
    });
}
