/**
 * Lab VM Manager
 *
 * Power operations and lookups for the lab nodes via @azure/arm-compute.
 */

import type { VirtualMachine } from "@azure/arm-compute";
import type { LabCredentialsManager } from "../credentials/manager.js";
import { getLabLogger } from "../logging/index.js";
import { formatErrorMessage, sleep, withLabRetry } from "../retry.js";
import type { LabRetryOptions } from "../types.js";
import {
  LAB_TAG,
  type LabVMInstance,
  type RestartOptions,
  type VMOperation,
  type VMOperationResult,
  type VMPowerState,
} from "./types.js";

const POWER_STATES: Record<string, VMPowerState> = {
  running: "running",
  deallocated: "deallocated",
  stopped: "stopped",
  starting: "starting",
  stopping: "stopping",
  deallocating: "deallocating",
};

export function parsePowerState(code?: string): VMPowerState {
  if (!code) return "unknown";
  return POWER_STATES[code.replace("PowerState/", "").toLowerCase()] ?? "unknown";
}

function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "statusCode" in error && error.statusCode === 404;
}

function extractResourceGroup(resourceId: string): string {
  const match = resourceId.match(/resourceGroups\/([^/]+)/i);
  return match?.[1] ?? "";
}

// =============================================================================
// LabVMManager
// =============================================================================

export class LabVMManager {
  private log = getLabLogger("vms");

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

  /**
   * Get a VM with its instance view, or null when it does not exist.
   */
  async getVM(resourceGroup: string, vmName: string): Promise<LabVMInstance | null> {
    const client = await this.getComputeClient();

    return withLabRetry(async () => {
      try {
        const vm = await client.virtualMachines.get(resourceGroup, vmName, { expand: "instanceView" });
        return this.mapToInstance(vm);
      } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
      }
    }, this.retryOptions);
  }

  async getPowerState(resourceGroup: string, vmName: string): Promise<VMPowerState> {
    const client = await this.getComputeClient();

    return withLabRetry(async () => {
      const view = await client.virtualMachines.instanceView(resourceGroup, vmName);
      const power = view.statuses?.find((s) => s.code?.startsWith("PowerState/"));
      return parsePowerState(power?.code);
    }, this.retryOptions);
  }

  /**
   * Lab VMs in a resource group, recognised by the lab tag.
   */
  async listLabVMs(resourceGroup: string, prefix: string): Promise<LabVMInstance[]> {
    const client = await this.getComputeClient();

    return withLabRetry(async () => {
      const vms: LabVMInstance[] = [];
      for await (const vm of client.virtualMachines.list(resourceGroup)) {
        if (vm.tags?.[LAB_TAG] !== prefix) continue;
        vms.push(this.mapToInstance(vm));
      }
      return vms.sort((a, b) => a.name.localeCompare(b.name));
    }, this.retryOptions);
  }

  async startVM(resourceGroup: string, vmName: string): Promise<VMOperationResult> {
    const client = await this.getComputeClient();
    return this.operate("start", vmName, async () => {
      await withLabRetry(() => client.virtualMachines.beginStartAndWait(resourceGroup, vmName), this.retryOptions);
      return `VM ${vmName} started`;
    });
  }

  async deallocateVM(resourceGroup: string, vmName: string): Promise<VMOperationResult> {
    const client = await this.getComputeClient();
    return this.operate("deallocate", vmName, async () => {
      await withLabRetry(() => client.virtualMachines.beginDeallocateAndWait(resourceGroup, vmName), this.retryOptions);
      return `VM ${vmName} deallocated`;
    });
  }

  /**
   * Restart a VM and wait until Azure reports it running again.
   */
  async restartVM(resourceGroup: string, vmName: string, options: RestartOptions = {}): Promise<VMOperationResult> {
    const client = await this.getComputeClient();
    const timeoutMs = options.timeoutMs ?? 600_000;
    const pollIntervalMs = options.pollIntervalMs ?? 10_000;

    return this.operate("restart", vmName, async () => {
      await withLabRetry(() => client.virtualMachines.beginRestartAndWait(resourceGroup, vmName), this.retryOptions);

      const deadline = Date.now() + timeoutMs;
      for (;;) {
        const state = await this.getPowerState(resourceGroup, vmName);
        if (state === "running") return `VM ${vmName} restarted`;
        if (Date.now() >= deadline) {
          throw new Error(`VM ${vmName} is ${state} ${Math.round(timeoutMs / 1000)}s after restart`);
        }
        this.log.debug(`Waiting for ${vmName} to run`, { state });
        await sleep(pollIntervalMs);
      }
    });
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async operate(
    operation: VMOperation,
    vmName: string,
    fn: () => Promise<string>,
  ): Promise<VMOperationResult> {
    try {
      const message = await fn();
      this.log.info(message);
      return { success: true, vmName, operation, message };
    } catch (error) {
      const text = formatErrorMessage(error);
      this.log.error(`${operation} ${vmName} failed: ${text}`);
      return { success: false, vmName, operation, error: text };
    }
  }

  private mapToInstance(vm: VirtualMachine): LabVMInstance {
    const power = vm.instanceView?.statuses?.find((s) => s.code?.startsWith("PowerState/"));
    return {
      id: vm.id ?? "",
      name: vm.name ?? "",
      resourceGroup: extractResourceGroup(vm.id ?? ""),
      location: vm.location,
      vmSize: vm.hardwareProfile?.vmSize ?? "",
      powerState: parsePowerState(power?.code),
      provisioningState: vm.provisioningState ?? "",
      osType: vm.storageProfile?.osDisk?.osType === "Linux" ? "Linux" : "Windows",
      computerName: vm.osProfile?.computerName,
      tags: vm.tags ?? {},
      dataDiskCount: vm.storageProfile?.dataDisks?.length ?? 0,
    };
  }
}

export function createVMManager(
  credentialsManager: LabCredentialsManager,
  retryOptions?: LabRetryOptions,
): LabVMManager {
  return new LabVMManager(credentialsManager, retryOptions);
}
