/**
 * WMI Namespace Security Manager
 *
 * Reads a namespace descriptor from a node, edits it with the SDDL editor
 * and writes it back. Nothing is written when the edit is a no-op.
 */

import { getLabLogger } from "../logging/index.js";
import {
  accountSidResultSchema,
  readWmiSecurity,
  resolveAccountSid,
  wmiSecurityResultSchema,
  writeWmiSecurity,
} from "../powershell/index.js";
import { runRecipe, type CommandRunner } from "../remote/index.js";
import {
  acesFor,
  effectiveAllowMask,
  explainSddl,
  formatSddl,
  grantAccess,
  parseSddl,
  resolveSidAlias,
  revokeAccess,
  sidToAlias,
  wmiPermissionsToMask,
  type ExplainedAce,
  type SecurityDescriptor,
} from "../sddl/index.js";
import type { WmiPermissionName } from "../config/schema.js";
import type { NodeTarget } from "../types.js";

export type WmiSecurityView = {
  node: string;
  namespace: string;
  sddl: string;
  aces: ExplainedAce[];
};

export type WmiEditResult = {
  node: string;
  namespace: string;
  principal: string;
  /** SID as written into the ACE (alias for well-known accounts). */
  sid: string;
  sddlBefore: string;
  sddlAfter: string;
  changed: boolean;
  /** Rights the principal holds after the edit. */
  effectiveMask: number;
};

export type WmiGrantOptions = {
  /** Apply to subnamespaces too (default true). */
  inherit?: boolean;
};

export class WmiSecurityManager {
  private log = getLabLogger("wmi");

  constructor(private runner: CommandRunner) {}

  /**
   * SID for `principal`: the alias table first, otherwise the node
   * translates the account name. Well-known SIDs come back as aliases.
   */
  async resolveSid(node: NodeTarget, principal: string): Promise<string> {
    const known = resolveSidAlias(principal);
    if (known) return sidToAlias(known);

    const result = await runRecipe(this.runner, node, resolveAccountSid(principal), accountSidResultSchema);
    this.log.debug(`Resolved ${principal} on ${node.name}`, { sid: result.sid });
    return sidToAlias(result.sid);
  }

  async show(node: NodeTarget, namespace: string): Promise<WmiSecurityView> {
    const sddl = await this.read(node, namespace);
    return { node: node.name, namespace, sddl, aces: explainSddl(parseSddl(sddl)) };
  }

  async grant(
    node: NodeTarget,
    namespace: string,
    principal: string,
    permissions: readonly WmiPermissionName[],
    options: WmiGrantOptions = {},
  ): Promise<WmiEditResult> {
    if (permissions.length === 0) {
      throw new RangeError("At least one WMI permission is required");
    }
    const sid = await this.resolveSid(node, principal);
    const mask = wmiPermissionsToMask(permissions);

    return this.edit(node, namespace, principal, sid, (sd) =>
      grantAccess(sd, sid, mask, { inherit: options.inherit ?? true }),
    );
  }

  /** Remove the explicit allow ACEs of `principal`. */
  async revoke(node: NodeTarget, namespace: string, principal: string): Promise<WmiEditResult> {
    const sid = await this.resolveSid(node, principal);
    return this.edit(node, namespace, principal, sid, (sd) => revokeAccess(sd, sid));
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async read(node: NodeTarget, namespace: string): Promise<string> {
    const result = await runRecipe(this.runner, node, readWmiSecurity(namespace), wmiSecurityResultSchema);
    return result.sddl;
  }

  private async edit(
    node: NodeTarget,
    namespace: string,
    principal: string,
    sid: string,
    change: (sd: SecurityDescriptor) => SecurityDescriptor,
  ): Promise<WmiEditResult> {
    const sddlBefore = await this.read(node, namespace);
    const before = parseSddl(sddlBefore);
    const edited = change(before);
    const wanted = formatSddl(edited);

    if (wanted === formatSddl(before)) {
      this.log.info(`${namespace} on ${node.name} already has the requested entry for ${principal}`);
      return {
        node: node.name,
        namespace,
        principal,
        sid,
        sddlBefore,
        sddlAfter: sddlBefore,
        changed: false,
        effectiveMask: effectiveAllowMask(before, sid),
      };
    }

    const written = await runRecipe(this.runner, node, writeWmiSecurity(namespace, wanted), wmiSecurityResultSchema);
    const after = parseSddl(written.sddl);
    this.log.info(`Updated ${namespace} on ${node.name} for ${principal}`, {
      aces: acesFor(after, sid).length,
    });

    return {
      node: node.name,
      namespace,
      principal,
      sid,
      sddlBefore,
      sddlAfter: written.sddl,
      changed: true,
      effectiveMask: effectiveAllowMask(after, sid),
    };
  }
}

export function createWmiSecurityManager(runner: CommandRunner): WmiSecurityManager {
  return new WmiSecurityManager(runner);
}
