/**
 * The `s2dlab` command line.
 */

import { Command } from "commander";
import { loadLabConfig, type LoadedConfig } from "../config/loader.js";
import type { LabManager } from "../lab/manager.js";
import type { LabLoggerImpl } from "../logging/index.js";
import { formatErrorMessage } from "../retry.js";
import { defaultCliContext, type CliContext } from "./context.js";
import { registerBlueprintsCommand } from "./program/register.blueprints.js";
import { registerConfigCommands } from "./program/register.config.js";
import { registerConfigureCommand } from "./program/register.configure.js";
import { registerGuestCommands } from "./program/register.guest.js";
import { registerSddlCommands } from "./program/register.sddl.js";
import { registerStatusCommand } from "./program/register.status.js";
import { registerTerraformCommands } from "./program/register.tf.js";
import { registerWmiCommands } from "./program/register.wmi.js";
import { theme } from "./theme.js";

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};

/** Shared state of one CLI invocation. */
export class CliSession {
  private loaded: LoadedConfig | null = null;
  private labManager: LabManager | null = null;
  private logger: LabLoggerImpl | null = null;

  constructor(
    readonly ctx: CliContext,
    private program: Command,
  ) {}

  get out() {
    return this.ctx.out;
  }

  globals(): GlobalOptions {
    return this.program.opts<GlobalOptions>();
  }

  async load(): Promise<LoadedConfig> {
    if (!this.loaded) {
      const { config, verbose } = this.globals();
      this.loaded = await loadLabConfig({ path: config, env: this.ctx.env });
      this.logger = this.ctx.setupLogging(this.loaded.config, { verbose: verbose === true });
    }
    return this.loaded;
  }

  async manager(): Promise<LabManager> {
    if (!this.labManager) {
      const { config } = await this.load();
      this.labManager = this.ctx.createManager(config, this.ctx);
    }
    return this.labManager;
  }

  fail(message: string): void {
    this.ctx.out.error(theme.error(message));
    this.ctx.setExitCode(1);
  }

  /** Run an action body; any error is printed as `<failure>: <reason>` with exit code 1. */
  async run(failure: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.fail(`${failure}: ${formatErrorMessage(error)}`);
    } finally {
      await this.logger?.close();
    }
  }
}

export function createProgram(ctx: CliContext = defaultCliContext()): Command {
  const program = new Command();
  program
    .name("s2dlab")
    .description("Provision and configure a nested Hyper-V lab with Storage Spaces Direct in Azure")
    .option("-c, --config <path>", "Lab configuration file (default: ./s2dlab.config.json)")
    .option("-v, --verbose", "Log debug output")
    .showHelpAfterError();

  const session = new CliSession(ctx, program);

  registerConfigCommands(program, session);
  registerTerraformCommands(program, session);
  registerConfigureCommand(program, session);
  registerStatusCommand(program, session);
  registerWmiCommands(program, session);
  registerSddlCommands(program, session);
  registerGuestCommands(program, session);
  registerBlueprintsCommand(program, session);

  return program;
}

