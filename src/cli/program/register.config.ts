import type { Command } from "commander";

import { DEFAULT_CONFIG_PATH, redactConfig, writeDefaultConfig } from "../../config/loader.js";
import { ConfigValidationError } from "../../errors.js";
import type { CliSession } from "../program.js";
import { theme } from "../theme.js";

export function registerConfigCommands(program: Command, session: CliSession) {
  const config = program.command("config").description("Create, check and print the lab configuration");

  config
    .command("init")
    .description("Write a configuration file with every default filled in")
    .option("--force", "Overwrite an existing file")
    .action(async (opts: { force?: boolean }) => {
      await session.run("Failed to write configuration", async () => {
        const path = await writeDefaultConfig(session.globals().config ?? DEFAULT_CONFIG_PATH, { force: opts.force });
        session.out.log(theme.success(`Wrote ${path}`));
        session.out.log(theme.muted("Set the admin password with S2DLAB_ADMIN_PASSWORD or nodes.adminPassword."));
      });
    });

  config
    .command("validate")
    .description("Check the configuration and list every problem")
    .action(async () => {
      await session.run("Failed to validate configuration", async () => {
        try {
          const { source } = await session.load();
          session.out.log(theme.success(`Configuration is valid (${source ?? "defaults only"})`));
        } catch (error) {
          if (!(error instanceof ConfigValidationError)) throw error;
          session.fail(`Configuration has ${error.issues.length} problem(s):`);
          for (const issue of error.issues) session.out.error(`  - ${issue}`);
        }
      });
    });

  config
    .command("show")
    .description("Print the effective configuration with secrets hidden")
    .action(async () => {
      await session.run("Failed to load configuration", async () => {
        const { config: loaded } = await session.load();
        session.out.log(JSON.stringify(redactConfig(loaded), null, 2));
      });
    });
}
