/**
 * Configuration Module Index
 */

export {
  labConfigSchema,
  deriveNodes,
  nodeName,
  WMI_PERMISSION_NAMES,
  LOG_LEVEL_NAMES,
  type LabConfig,
  type LabConfigInput,
  type DerivedNode,
  type WmiGrant,
  type WmiPermissionName,
  type GuestVmConfig,
} from "./schema.js";

export {
  DEFAULT_CONFIG_PATH,
  loadLabConfig,
  parseLabConfig,
  validateLabConfig,
  applyEnvOverrides,
  requireAdminPassword,
  configSecrets,
  redactConfig,
  defaultConfigInput,
  writeDefaultConfig,
  formatIssue,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./loader.js";

export {
  parseIpv4,
  formatIpv4,
  parseCidr,
  cidrContainsAddress,
  cidrContainsCidr,
  netmaskFor,
  type Cidr,
} from "./network.js";
