/**
 * Lab VMs — Type Definitions
 */

export type VMPowerState = "running" | "deallocated" | "stopped" | "starting" | "stopping" | "deallocating" | "unknown";

export type LabVMInstance = {
  id: string;
  name: string;
  resourceGroup: string;
  location: string;
  vmSize: string;
  powerState: VMPowerState;
  provisioningState: string;
  osType: "Windows" | "Linux";
  computerName?: string;
  tags: Record<string, string>;
  dataDiskCount: number;
};

export type VMOperation = "start" | "restart" | "deallocate";

export type VMOperationResult = {
  success: boolean;
  vmName: string;
  operation: VMOperation;
  powerState?: VMPowerState;
  message?: string;
  error?: string;
};

export type RestartOptions = {
  /** Give up waiting for `PowerState/running` after this long. */
  timeoutMs?: number;
  pollIntervalMs?: number;
};

/** Tag put on every lab resource; the value is the lab prefix. */
export const LAB_TAG = "s2dlab-lab";
