/**
 * Remote execution types.
 */

import type { PowerShellScript } from "../powershell/script.js";
import type { NodeTarget } from "../types.js";

/** A script ready to run on a lab node. */
export type RemoteScript = PowerShellScript;

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Parsed result line, or undefined when the script printed none. */
  payload?: unknown;
  durationMs: number;
};

/**
 * Runs one script on one node. Implementations throw `RemoteCommandError`
 * when the script reports a terminating error.
 */
export interface CommandRunner {
  run(node: NodeTarget, script: RemoteScript): Promise<CommandResult>;
}
