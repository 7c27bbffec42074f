/**
 * SDDL — DACL editing
 *
 * Pure functions over SecurityDescriptor. Inputs are never mutated; every
 * edit returns a new descriptor. ACEs are kept in canonical order:
 * explicit deny, explicit allow, inherited.
 */

import { sameSid } from "./sids.js";
import type { AccessOptions, Ace, AceFlag, Acl, SecurityDescriptor } from "./types.js";

function cloneAcl(acl: Acl | undefined): Acl {
  if (!acl) return { flags: [], aces: [] };
  return { flags: [...acl.flags], aces: acl.aces.map((ace) => ({ ...ace, flags: [...ace.flags] })) };
}

function isInherited(ace: Ace): boolean {
  return ace.flags.includes("ID");
}

function flagsFor(options: AccessOptions | undefined): AceFlag[] {
  return options?.inherit ? ["CI"] : [];
}

function sameFlags(a: readonly AceFlag[], b: readonly AceFlag[]): boolean {
  if (a.length !== b.length) return false;
  const sorted = [...a].sort();
  return [...b].sort().every((flag, i) => flag === sorted[i]);
}

function isExplicit(ace: Ace, type: "A" | "D", sid: string): boolean {
  return ace.type === type && !isInherited(ace) && sameSid(ace.sid, sid);
}

function newAce(type: "A" | "D", sid: string, mask: number, flags: AceFlag[]): Ace {
  return { type, flags, rights: mask >>> 0, objectGuid: "", inheritObjectGuid: "", sid };
}

/**
 * Merge `mask` into an explicit ACE of `type` for `sid` with matching
 * inheritance flags, or insert a new one at `insertAt`.
 */
function mergeOrInsert(
  sd: SecurityDescriptor,
  type: "A" | "D",
  sid: string,
  mask: number,
  options: AccessOptions | undefined,
  insertAt: (aces: Ace[]) => number,
): SecurityDescriptor {
  const dacl = cloneAcl(sd.dacl);
  const flags = flagsFor(options);

  const existing = dacl.aces.find((ace) => isExplicit(ace, type, sid) && sameFlags(ace.flags, flags));
  if (existing) {
    existing.rights = (existing.rights | mask) >>> 0;
  } else {
    dacl.aces.splice(insertAt(dacl.aces), 0, newAce(type, sid, mask, flags));
  }

  return { ...sd, dacl };
}

/**
 * Allow `mask` for `sid`. Idempotent: granting rights already held leaves
 * the descriptor unchanged. A missing DACL is created.
 */
export function grantAccess(
  sd: SecurityDescriptor,
  sid: string,
  mask: number,
  options?: AccessOptions,
): SecurityDescriptor {
  return mergeOrInsert(sd, "A", sid, mask, options, (aces) => {
    let lastDeny = -1;
    let firstInherited = aces.length;
    aces.forEach((ace, i) => {
      if (isInherited(ace)) {
        if (i < firstInherited) firstInherited = i;
      } else if (ace.type === "D") {
        lastDeny = i;
      }
    });
    return Math.max(lastDeny + 1, Math.min(firstInherited, aces.length));
  });
}

/**
 * Deny `mask` for `sid`. New deny ACEs go to the front of the DACL.
 */
export function denyAccess(
  sd: SecurityDescriptor,
  sid: string,
  mask: number,
  options?: AccessOptions,
): SecurityDescriptor {
  return mergeOrInsert(sd, "D", sid, mask, options, () => 0);
}

/**
 * Remove every explicit allow ACE for `sid`. Inherited ACEs stay.
 */
export function revokeAccess(sd: SecurityDescriptor, sid: string): SecurityDescriptor {
  if (!sd.dacl) return sd;
  const dacl = cloneAcl(sd.dacl);
  dacl.aces = dacl.aces.filter((ace) => !isExplicit(ace, "A", sid));
  return { ...sd, dacl };
}

/**
 * Rights explicitly allowed to `sid` minus rights explicitly denied to it.
 */
export function effectiveAllowMask(sd: SecurityDescriptor, sid: string): number {
  let allow = 0;
  let deny = 0;
  for (const ace of sd.dacl?.aces ?? []) {
    if (isExplicit(ace, "A", sid)) allow |= ace.rights;
    else if (isExplicit(ace, "D", sid)) deny |= ace.rights;
  }
  return (allow & ~deny) >>> 0;
}

/**
 * Explicit ACEs that mention `sid`, in DACL order.
 */
export function acesFor(sd: SecurityDescriptor, sid: string): Ace[] {
  return (sd.dacl?.aces ?? []).filter((ace) => sameSid(ace.sid, sid));
}
