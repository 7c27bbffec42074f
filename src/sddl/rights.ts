/**
 * SDDL — Access Rights
 *
 * Two-letter right codes, hex masks and the WMI namespace permission names.
 */

import type { WmiPermissionName } from "../config/schema.js";

/** Codes that map to a single bit, in the order they are written. */
const SINGLE_BIT_CODES: ReadonlyArray<readonly [string, number]> = [
  ["CC", 0x1],
  ["DC", 0x2],
  ["LC", 0x4],
  ["SW", 0x8],
  ["RP", 0x10],
  ["WP", 0x20],
  ["DT", 0x40],
  ["LO", 0x80],
  ["CR", 0x100],
  ["SD", 0x10000],
  ["RC", 0x20000],
  ["WD", 0x40000],
  ["WO", 0x80000],
  ["GA", 0x10000000],
  ["GX", 0x20000000],
  ["GW", 0x40000000],
  ["GR", 0x80000000],
];

/** File and registry shorthands; accepted when parsing, never written. */
const COMPOSITE_CODES: ReadonlyArray<readonly [string, number]> = [
  ["FA", 0x1f01ff],
  ["FR", 0x120089],
  ["FW", 0x120116],
  ["FX", 0x1200a0],
  ["KA", 0xf003f],
  ["KR", 0x20019],
  ["KW", 0x20006],
  ["KX", 0x20019],
];

const CODE_MASKS = new Map<string, number>([...SINGLE_BIT_CODES, ...COMPOSITE_CODES]);

export function rightCodeMask(code: string): number | undefined {
  return CODE_MASKS.get(code.toUpperCase());
}

/**
 * Render a mask as two-letter codes, or `0x…` hex when some bit has no code.
 */
export function formatRights(mask: number): string {
  const value = mask >>> 0;
  if (value === 0) return "";

  let remaining = value;
  let codes = "";
  for (const [code, bit] of SINGLE_BIT_CODES) {
    if ((value & bit) >>> 0 === bit) {
      codes += code;
      remaining = (remaining & ~bit) >>> 0;
    }
  }
  return remaining === 0 ? codes : `0x${value.toString(16)}`;
}

/**
 * Split a mask into the codes that name it; leftover bits come back separately.
 */
export function rightsToCodes(mask: number): { codes: string[]; unnamed: number } {
  let remaining = mask >>> 0;
  const codes: string[] = [];
  for (const [code, bit] of SINGLE_BIT_CODES) {
    if ((remaining & bit) >>> 0 === bit) {
      codes.push(code);
      remaining = (remaining & ~bit) >>> 0;
    }
  }
  return { codes, unnamed: remaining };
}

// =============================================================================
// WMI Namespace Permissions
// =============================================================================

export const WMI_PERMISSIONS: Readonly<Record<WmiPermissionName, number>> = {
  Enable: 0x1,
  MethodExecute: 0x2,
  FullWrite: 0x4,
  PartialWrite: 0x8,
  ProviderWrite: 0x10,
  RemoteAccess: 0x20,
  ReadSecurity: 0x20000,
  EditSecurity: 0x40000,
};

const WMI_PERMISSION_ENTRIES = Object.entries(WMI_PERMISSIONS);

export function isWmiPermissionName(name: string): name is WmiPermissionName {
  return Object.hasOwn(WMI_PERMISSIONS, name);
}

export function wmiPermissionsToMask(names: readonly WmiPermissionName[]): number {
  let mask = 0;
  for (const name of names) mask |= WMI_PERMISSIONS[name];
  return mask >>> 0;
}

/**
 * Permission names present in `mask`. Bits with no WMI meaning are
 * appended as a single hex entry.
 */
export function describeWmiMask(mask: number): string[] {
  let remaining = mask >>> 0;
  const names: string[] = [];
  for (const [name, bit] of WMI_PERMISSION_ENTRIES) {
    if ((remaining & bit) === bit) {
      names.push(name);
      remaining = (remaining & ~bit) >>> 0;
    }
  }
  if (remaining !== 0) names.push(`0x${remaining.toString(16)}`);
  return names;
}
