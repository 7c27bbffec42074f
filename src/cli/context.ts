/**
 * What the CLI commands need from the outside world. Tests swap in an
 * in-memory output and a manager built around a RecordingRunner.
 */

import { createInterface } from "node:readline";
import { configSecrets } from "../config/loader.js";
import type { LabConfig } from "../config/schema.js";
import { LabManager } from "../lab/manager.js";
import { createLabLogger, setGlobalLabLogger, type LabLoggerImpl } from "../logging/index.js";
import type { ProgressOptions } from "../progress.js";

export type CliOutput = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export type CliContext = {
  out: CliOutput;
  env: NodeJS.ProcessEnv;
  /** Ask a yes/no question on the terminal. */
  confirm: (question: string) => Promise<boolean>;
  createManager: (config: LabConfig, ctx: CliContext) => LabManager;
  /** Install the process logger for a loaded configuration. */
  setupLogging: (config: LabConfig, options: { verbose: boolean }) => LabLoggerImpl | null;
  setExitCode: (code: number) => void;
  progress?: ProgressOptions;
};

export function promptConfirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(`${question} [y/N] `, (answer) => {
      rl.close();
      resolve(/^y(es)?$/i.test(answer.trim()));
    });
  });
}

export function setupCliLogging(config: LabConfig, options: { verbose: boolean }): LabLoggerImpl {
  const logger = createLabLogger("s2dlab", {
    level: options.verbose ? "debug" : config.logging.level,
    file: config.logging.file,
    secrets: configSecrets(config),
    colors: process.stderr.isTTY === true,
  });
  setGlobalLabLogger(logger);
  return logger;
}

export function defaultCliContext(): CliContext {
  return {
    out: {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    },
    env: process.env,
    confirm: promptConfirm,
    createManager: (config, ctx) => new LabManager(config, { confirm: ctx.confirm, progress: ctx.progress }),
    setupLogging: setupCliLogging,
    setExitCode: (code) => {
      process.exitCode = code;
    },
  };
}
