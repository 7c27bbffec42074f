/**
 * SDDL Module Index
 */

export * from "./types.js";
export { SddlParser, parseSddl, formatSddl, formatAce } from "./parser.js";
export { grantAccess, denyAccess, revokeAccess, effectiveAllowMask, acesFor } from "./editor.js";
export {
  WMI_PERMISSIONS,
  wmiPermissionsToMask,
  describeWmiMask,
  isWmiPermissionName,
  formatRights,
  rightsToCodes,
  rightCodeMask,
} from "./rights.js";
export { resolveSidAlias, sidToAlias, sidDisplayName, isSidAlias, isStringSid, sameSid } from "./sids.js";
export { explainSddl, formatExplainedAce, type ExplainedAce } from "./explain.js";
