/**
 * SDDL — Well-known SID aliases
 */

type SidAlias = {
  sid: string;
  name: string;
};

const WELL_KNOWN: Readonly<Record<string, SidAlias>> = {
  WD: { sid: "S-1-1-0", name: "Everyone" },
  CO: { sid: "S-1-3-0", name: "Creator Owner" },
  CG: { sid: "S-1-3-1", name: "Creator Group" },
  OW: { sid: "S-1-3-4", name: "Owner Rights" },
  NU: { sid: "S-1-5-2", name: "Network" },
  IU: { sid: "S-1-5-4", name: "Interactive" },
  SU: { sid: "S-1-5-6", name: "Service" },
  AN: { sid: "S-1-5-7", name: "Anonymous Logon" },
  ED: { sid: "S-1-5-9", name: "Enterprise Domain Controllers" },
  PS: { sid: "S-1-5-10", name: "Principal Self" },
  AU: { sid: "S-1-5-11", name: "Authenticated Users" },
  RC: { sid: "S-1-5-12", name: "Restricted Code" },
  SY: { sid: "S-1-5-18", name: "Local System" },
  LS: { sid: "S-1-5-19", name: "Local Service" },
  NS: { sid: "S-1-5-20", name: "Network Service" },
  BA: { sid: "S-1-5-32-544", name: "Administrators" },
  BU: { sid: "S-1-5-32-545", name: "Users" },
  BG: { sid: "S-1-5-32-546", name: "Guests" },
  PU: { sid: "S-1-5-32-547", name: "Power Users" },
  AO: { sid: "S-1-5-32-548", name: "Account Operators" },
  SO: { sid: "S-1-5-32-549", name: "Server Operators" },
  PO: { sid: "S-1-5-32-550", name: "Print Operators" },
  BO: { sid: "S-1-5-32-551", name: "Backup Operators" },
  RE: { sid: "S-1-5-32-552", name: "Replicator" },
  RD: { sid: "S-1-5-32-555", name: "Remote Desktop Users" },
  NO: { sid: "S-1-5-32-556", name: "Network Configuration Operators" },
  MU: { sid: "S-1-5-32-558", name: "Performance Monitor Users" },
  LU: { sid: "S-1-5-32-559", name: "Performance Log Users" },
  ER: { sid: "S-1-5-32-573", name: "Event Log Readers" },
  HA: { sid: "S-1-5-32-578", name: "Hyper-V Administrators" },
  RM: { sid: "S-1-5-32-580", name: "Remote Management Users" },
};

/** Aliases relative to the domain SID (`<domain>-<rid>`). */
const DOMAIN_RELATIVE: Readonly<Record<string, { rid: number; name: string }>> = {
  LA: { rid: 500, name: "Local Administrator" },
  LG: { rid: 501, name: "Local Guest" },
  DA: { rid: 512, name: "Domain Admins" },
  DU: { rid: 513, name: "Domain Users" },
  DG: { rid: 514, name: "Domain Guests" },
  DC: { rid: 515, name: "Domain Computers" },
  DD: { rid: 516, name: "Domain Controllers" },
  CA: { rid: 517, name: "Cert Publishers" },
};

const SID_PATTERN = /^S-1-\d+(-\d+)*$/i;

export function isStringSid(value: string): boolean {
  return SID_PATTERN.test(value);
}

export function isSidAlias(value: string): boolean {
  const key = value.toUpperCase();
  return Object.hasOwn(WELL_KNOWN, key) || Object.hasOwn(DOMAIN_RELATIVE, key);
}

/**
 * Map an alias to its string SID. String SIDs pass through unchanged.
 * Domain-relative aliases need `domainSid`; without it they resolve to undefined.
 */
export function resolveSidAlias(value: string, options: { domainSid?: string } = {}): string | undefined {
  if (isStringSid(value)) return value.toUpperCase();

  const key = value.toUpperCase();
  const known = WELL_KNOWN[key];
  if (known) return known.sid;

  const relative = DOMAIN_RELATIVE[key];
  if (relative && options.domainSid) return `${options.domainSid.toUpperCase()}-${relative.rid}`;

  return undefined;
}

const ALIAS_BY_SID = new Map<string, string>(Object.entries(WELL_KNOWN).map(([alias, entry]) => [entry.sid, alias]));

/**
 * Reverse lookup for well-known SIDs; other SIDs come back unchanged.
 */
export function sidToAlias(sid: string): string {
  return ALIAS_BY_SID.get(sid.toUpperCase()) ?? sid;
}

export function sidDisplayName(value: string): string | undefined {
  const key = value.toUpperCase();
  const alias = isStringSid(value) ? ALIAS_BY_SID.get(key) : key;
  if (!alias) return undefined;
  return WELL_KNOWN[alias]?.name ?? DOMAIN_RELATIVE[alias]?.name;
}

/**
 * Compare two SIDs, treating an alias and its string form as equal.
 */
export function sameSid(a: string, b: string): boolean {
  const left = resolveSidAlias(a) ?? a.toUpperCase();
  const right = resolveSidAlias(b) ?? b.toUpperCase();
  return left === right;
}
