import { readFile, writeFile } from "node:fs/promises";
import type { Command } from "commander";

import { parseList } from "../options.js";
import type { CliSession } from "../program.js";
import { printPlanResult } from "./register.configure.js";
import { theme } from "../theme.js";

export function registerGuestCommands(program: Command, session: CliSession) {
  const guest = program.command("guest").description("Nested AlmaLinux guests on the Hyper-V host node");

  guest
    .command("kickstart <vm>")
    .description("Render the Kickstart file of a configured guest")
    .requiredOption("--public-key <file>", "SSH public key file to authorize")
    .option("-o, --out <file>", "Write to a file instead of stdout")
    .action(async (vm: string, opts: { publicKey: string; out?: string }) => {
      await session.run("Failed to render kickstart", async () => {
        const publicKey = (await readFile(opts.publicKey, "utf8")).trim();
        const text = await (await session.manager()).guestKickstart(vm, publicKey);
        if (!opts.out) {
          session.out.log(text);
          return;
        }
        await writeFile(opts.out, text, "utf8");
        session.out.log(theme.success(`Wrote ${opts.out}`));
      });
    });

  guest
    .command("diagnose <vm>")
    .description("Report why cloud-init is or is not running on a guest")
    .option("--key-path <path>", "Private key on the host node")
    .option("--json", "Output as JSON")
    .action(async (vm: string, opts: { keyPath?: string; json?: boolean }) => {
      await session.run("Failed to diagnose guest", async () => {
        const diagnosis = await (await session.manager()).guestDiagnose(vm, { keyPath: opts.keyPath });
        if (opts.json) {
          session.out.log(JSON.stringify(diagnosis, null, 2));
          return;
        }
        session.out.log(`\ncloud-init on ${vm}: ${diagnosis.status}${diagnosis.disabled ? theme.warn(" (disabled)") : ""}`);
        for (const s of diagnosis.services) session.out.log(`  ${s.name}: ${s.enabled}, ${s.active}`);
        for (const f of diagnosis.disableFiles.filter((file) => file.present)) {
          session.out.log(`  ${theme.warn("disable file")}: ${f.path}`);
        }
        session.out.log(`  ds-identify: ${diagnosis.dsIdentifyConfigured ? "configured" : "not configured"}, ${diagnosis.dsIdentifyCheck}`);
        if (diagnosis.datasources.length > 0) session.out.log(`  datasources: ${diagnosis.datasources.join(", ")}`);
        if (!diagnosis.generatorPresent) session.out.log(`  ${theme.warn("cloud-init generator missing")}`);
        session.out.log(`  product: ${diagnosis.productName}`);
        session.out.log(`  cidata drive: ${diagnosis.cdrom.present ? diagnosis.cdrom.files.join(", ") || "present" : "absent"}`);
      });
    });

  guest
    .command("postinstall <vm>")
    .description("Run the post-install script on a guest over SSH from the host node")
    .option("--ports <list>", "Firewall ports to open, e.g. 8080/tcp,3000/tcp", parseList)
    .option("--key-path <path>", "Private key on the host node")
    .option("--dry-run", "Show the step without running it")
    .action(async (vm: string, opts: { ports?: string[]; keyPath?: string; dryRun?: boolean }) => {
      await session.run("Post-install failed", async () => {
        const result = await (await session.manager()).guestPostinstall(vm, {
          ports: opts.ports,
          keyPath: opts.keyPath,
          dryRun: opts.dryRun,
        });
        printPlanResult(session, result);
        if (result.status !== "succeeded") session.ctx.setExitCode(1);
      });
    });
}
