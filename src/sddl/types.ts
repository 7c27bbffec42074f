/**
 * SDDL — Types
 *
 * In-memory form of a Windows security descriptor string
 * (`O:<sid>G:<sid>D:<flags>(ace)(ace)S:<flags>(ace)`).
 */

export const ACE_TYPES = [
  "A", // access allowed
  "D", // access denied
  "OA", // object access allowed
  "OD", // object access denied
  "AU", // system audit
  "AL", // system alarm
  "OU", // object system audit
  "OL", // object system alarm
  "ML", // mandatory label
  "XA", // callback access allowed
  "XD", // callback access denied
  "XU", // callback system audit
  "ZA", // callback object access allowed
  "RA", // resource attribute
  "SP", // scoped policy id
] as const;

export type AceType = (typeof ACE_TYPES)[number];

export const ACE_FLAGS = [
  "CI", // container inherit
  "OI", // object inherit
  "NP", // no propagate
  "IO", // inherit only
  "ID", // inherited
  "SA", // successful access audit
  "FA", // failed access audit
  "TP", // trust protected filter
  "CR", // critical
] as const;

export type AceFlag = (typeof ACE_FLAGS)[number];

export const ACL_FLAGS = ["NO_ACCESS_CONTROL", "AI", "AR", "P"] as const;

export type AclFlag = (typeof ACL_FLAGS)[number];

export type Ace = {
  type: AceType;
  flags: AceFlag[];
  /** Access mask as an unsigned 32-bit integer. */
  rights: number;
  objectGuid: string;
  inheritObjectGuid: string;
  /** Either a two-letter alias (`BA`) or a string SID (`S-1-5-32-544`). */
  sid: string;
};

export type Acl = {
  flags: AclFlag[];
  aces: Ace[];
};

export type SecurityDescriptor = {
  owner?: string;
  group?: string;
  dacl?: Acl;
  sacl?: Acl;
};

export type AccessOptions = {
  /**
   * Apply to child containers too (`CI`). For a WMI namespace this is
   * "this namespace and subnamespaces".
   */
  inherit?: boolean;
};
