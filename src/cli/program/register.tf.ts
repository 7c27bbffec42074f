import type { Command } from "commander";

import type { LabOutputs } from "../../types.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

function printNodes(session: CliSession, outputs: LabOutputs) {
  session.out.log(`\nResource group: ${outputs.resourceGroup}\n`);
  for (const node of outputs.nodes) {
    session.out.log(`  ${node.name}`);
    session.out.log(`    Private IP: ${node.privateIp}`);
    if (node.publicIp) session.out.log(`    Public IP: ${node.publicIp}`);
  }
}

export function registerTerraformCommands(program: Command, session: CliSession) {
  const tf = program.command("tf").description("Generate and run the terraform configuration for the Azure side");

  tf.command("render")
    .description("Write the terraform files into terraform.workingDir")
    .action(async () => {
      await session.run("Failed to render terraform files", async () => {
        const files = await (await session.manager()).render();
        for (const file of files) session.out.log(`  ${file}`);
        session.out.log(theme.success(`Wrote ${files.length} file(s)`));
      });
    });

  tf.command("validate")
    .description("Check the generated terraform files with terraform validate")
    .action(async () => {
      await session.run("Failed to validate", async () => {
        const result = await (await session.manager()).validate();
        for (const warning of result.warnings) session.out.log(theme.warn(`  ! ${warning}`));
        if (result.valid) {
          session.out.log(theme.success("Terraform configuration is valid"));
          return;
        }
        session.fail(`Terraform configuration has ${result.errors.length} error(s):`);
        for (const error of result.errors) session.out.error(`  - ${error}`);
      });
    });

  tf.command("plan")
    .description("Show what terraform would change")
    .option("--destroy", "Plan the teardown instead")
    .action(async (opts: { destroy?: boolean }) => {
      await session.run("Failed to plan", async () => {
        session.out.log(await (await session.manager()).plan({ destroy: opts.destroy }));
      });
    });

  tf.command("apply")
    .description("Create the resource group, network and lab VMs")
    .action(async () => {
      await session.run("Failed to provision", async () => {
        const outputs = await (await session.manager()).provision();
        printNodes(session, outputs);
        session.out.log(theme.success(`\nProvisioned ${outputs.nodes.length} node(s)`));
      });
    });

  tf.command("destroy")
    .description("Delete everything terraform created")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (opts: { yes?: boolean }) => {
      await session.run("Failed to destroy", async () => {
        const destroyed = await (await session.manager()).teardown({ yes: opts.yes });
        session.out.log(destroyed ? theme.success("Lab destroyed") : theme.warn("Teardown cancelled"));
      });
    });

  tf.command("output")
    .description("Show the lab nodes")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await session.run("Failed to read outputs", async () => {
        const outputs = await (await session.manager()).loadOutputs();
        if (opts.json) {
          session.out.log(JSON.stringify(outputs, null, 2));
          return;
        }
        printNodes(session, outputs);
      });
    });
}
