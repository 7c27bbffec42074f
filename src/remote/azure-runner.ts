/**
 * Azure Run Command runner
 *
 * Executes scripts on lab VMs through `virtualMachines.beginRunCommandAndWait`.
 * The VM agent runs one command at a time; a busy agent is retried.
 */

import type { RunCommandResult } from "@azure/arm-compute";
import type { LabCredentialsManager } from "../credentials/manager.js";
import { getLabLogger } from "../logging/index.js";
import { withLabRetry } from "../retry.js";
import type { LabRetryOptions, NodeTarget } from "../types.js";
import { toCommandResult } from "./payload.js";
import type { CommandResult, CommandRunner, RemoteScript } from "./types.js";

const STDOUT_CODE = "ComponentStatus/StdOut/succeeded";
const STDERR_CODE = "ComponentStatus/StdErr/succeeded";

export function readRunCommandOutput(result: RunCommandResult): { stdout: string; stderr: string } {
  const statuses = result.value ?? [];
  return {
    stdout: statuses.find((s) => s.code === STDOUT_CODE)?.message ?? "",
    stderr: statuses.find((s) => s.code === STDERR_CODE)?.message ?? "",
  };
}

export class AzureRunCommandRunner implements CommandRunner {
  private log = getLabLogger("remote");

  constructor(
    private credentialsManager: LabCredentialsManager,
    private retryOptions: LabRetryOptions = {},
  ) {}

  private async getComputeClient() {
    const { credential } = await this.credentialsManager.getCredential();
    const subscriptionId = this.credentialsManager.requireSubscriptionId();
    const { ComputeManagementClient } = await import("@azure/arm-compute");
    return new ComputeManagementClient(credential, subscriptionId);
  }

  async run(node: NodeTarget, script: RemoteScript): Promise<CommandResult> {
    const client = await this.getComputeClient();
    const log = this.log.withContext({ node: node.name });
    const commandId = script.kind === "shell" ? "RunShellScript" : "RunPowerShellScript";

    log.debug(`Running ${script.name}`, { commandId, lines: script.lines.length });
    const started = Date.now();

    const result = await withLabRetry(
      () =>
        client.virtualMachines.beginRunCommandAndWait(node.resourceGroup, node.name, {
          commandId,
          script: script.lines,
        }),
      this.retryOptions,
    );

    const durationMs = Date.now() - started;
    const { stdout, stderr } = readRunCommandOutput(result);
    log.debug(`${script.name} finished`, { durationMs, stdoutBytes: stdout.length });
    if (stderr.trim().length > 0) log.trace(`${script.name} stderr`, { stderr });

    return toCommandResult(node, script, stdout, stderr, durationMs);
  }
}
