/**
 * nested-s2d-lab
 *
 * Library entry point. The `s2dlab` command line is in ./cli/run.ts.
 */

export * from "./errors.js";
export type { LabOutputs, LabRetryOptions, NodeTarget, LabOperationResult, LabTagSet } from "./types.js";
export { withLabRetry, retryFixed, formatErrorMessage, LAB_RETRY_DEFAULTS, type FixedRetryOptions } from "./retry.js";
export {
  loadLabConfig,
  parseLabConfig,
  validateLabConfig,
  redactConfig,
  writeDefaultConfig,
  deriveNodes,
  labConfigSchema,
  type LabConfig,
  type LabConfigInput,
  type LoadedConfig,
} from "./config/index.js";
export { getLabLogger, setGlobalLabLogger, createLabLogger, type LabLogger } from "./logging/index.js";
export {
  parseSddl,
  formatSddl,
  grantAccess,
  denyAccess,
  revokeAccess,
  effectiveAllowMask,
  explainSddl,
  wmiPermissionsToMask,
  describeWmiMask,
  type SecurityDescriptor,
} from "./sddl/index.js";
export { ScriptBuilder, createScript, renderScript, type PowerShellScript } from "./powershell/index.js";
export {
  AzureRunCommandRunner,
  RecordingRunner,
  runRecipe,
  type CommandRunner,
  type CommandResult,
} from "./remote/index.js";
export { LabVMManager } from "./vms/index.js";
export { LabCredentialsManager, createCredentialsManagerFromConfig } from "./credentials/index.js";
export { buildLabTemplate, writeLabTemplate, parseLabOutputs } from "./terraform/index.js";
export {
  Orchestrator,
  validatePlan,
  registerLabSteps,
  registerLabStepsDryRun,
  getBlueprint,
  listBlueprints,
  registerBlueprint,
  type Blueprint,
  type ExecutionPlan,
  type OrchestrationResult,
} from "./orchestration/index.js";
export { WmiSecurityManager } from "./wmi/index.js";
export { collectNodeReport, summarizeReports, type NodeStatusReport } from "./diagnostics/index.js";
export { renderKickstart, renderPostInstall, parseCloudInitDiagnosis } from "./guests/index.js";
export { LabManager, type LabManagerOptions } from "./lab/index.js";
export { createLabProgress, planProgressListener } from "./progress.js";
