/**
 * Shared Types
 *
 * Core type definitions used across the lab modules.
 */

// =============================================================================
// Retry
// =============================================================================

export type LabRetryOptions = {
  maxAttempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  jitterFactor?: number;
};

// =============================================================================
// Lab Topology
// =============================================================================

/** A Windows Server VM that is part of the lab (a Hyper-V host / cluster node). */
export type NodeTarget = {
  /** Azure VM name, also the Windows computer name. */
  name: string;
  resourceGroup: string;
  privateIp: string;
  publicIp?: string;
};

/** Values read back from `terraform output` once the Azure side exists. */
export type LabOutputs = {
  resourceGroup: string;
  nodes: NodeTarget[];
};

// =============================================================================
// Common Result Types
// =============================================================================

export type LabOperationResult<T = unknown> = {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
};

export type LabTagSet = Record<string, string>;
