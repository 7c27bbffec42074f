/**
 * SDDL — Human-readable ACE listing (`s2dlab sddl explain`, `s2dlab wmi show`).
 */

import { describeWmiMask, formatRights } from "./rights.js";
import { resolveSidAlias, sidDisplayName } from "./sids.js";
import type { AceType, SecurityDescriptor } from "./types.js";

const ACE_TYPE_LABELS: Partial<Record<AceType, string>> = {
  A: "allow",
  D: "deny",
  OA: "object-allow",
  OD: "object-deny",
  AU: "audit",
  AL: "alarm",
  ML: "label",
};

export type ExplainedAce = {
  acl: "dacl" | "sacl";
  index: number;
  type: string;
  sid: string;
  /** Friendly principal name for well-known SIDs. */
  principal?: string;
  rights: string;
  mask: number;
  wmiPermissions: string[];
  flags: string[];
  inherited: boolean;
};

export function explainSddl(sd: SecurityDescriptor): ExplainedAce[] {
  const rows: ExplainedAce[] = [];
  const acls = [
    ["dacl", sd.dacl],
    ["sacl", sd.sacl],
  ] as const;

  for (const [name, acl] of acls) {
    acl?.aces.forEach((ace, index) => {
      rows.push({
        acl: name,
        index,
        type: ACE_TYPE_LABELS[ace.type] ?? ace.type,
        sid: resolveSidAlias(ace.sid) ?? ace.sid,
        principal: sidDisplayName(ace.sid),
        rights: formatRights(ace.rights),
        mask: ace.rights,
        wmiPermissions: describeWmiMask(ace.rights),
        flags: [...ace.flags],
        inherited: ace.flags.includes("ID"),
      });
    });
  }

  return rows;
}

export function formatExplainedAce(row: ExplainedAce): string {
  const who = row.principal ? `${row.principal} (${row.sid})` : row.sid;
  const flags = row.flags.length > 0 ? ` [${row.flags.join(",")}]` : "";
  const perms = row.wmiPermissions.length > 0 ? row.wmiPermissions.join(", ") : "none";
  return `${row.type.padEnd(6)} ${who}: ${perms} (0x${row.mask.toString(16)})${flags}`;
}
