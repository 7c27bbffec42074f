/**
 * WMI namespace security descriptors and account SID lookup.
 *
 * The descriptor travels as SDDL; editing happens on the client.
 */

import { z } from "zod";
import { psString } from "../quote.js";
import { createScript, ps, type PowerShellScript, type ScriptBuilder } from "../script.js";

export const wmiSecurityResultSchema = z.object({
  namespace: z.string(),
  sddl: z.string(),
});

export type WmiSecurityResult = z.infer<typeof wmiSecurityResultSchema>;

function openNamespace(builder: ScriptBuilder, namespace: string): ScriptBuilder {
  return builder
    .line(`$namespace = ${psString(namespace)}`)
    .line("$security = Get-WmiObject -Namespace $namespace -Class __SystemSecurity")
    .line("$converter = New-Object System.Management.ManagementClass Win32_SecurityDescriptorHelper");
}

function readSddl(builder: ScriptBuilder, variable: string): ScriptBuilder {
  return builder
    .line("$binarySD = @($null)")
    .line("$rc = $security.PsBase.InvokeMethod('GetSD', $binarySD)")
    .line('if ($rc -ne 0) { throw "GetSD on $namespace returned $rc" }')
    .line(`$${variable} = $converter.BinarySDToSDDL($binarySD[0]).SDDL`);
}

export function readWmiSecurity(namespace: string): PowerShellScript {
  const builder = openNamespace(createScript("read-wmi-security"), namespace);
  return readSddl(builder, "sddl").emitResult({ namespace: ps("$namespace"), sddl: ps("$sddl") }).build();
}

/**
 * Replace the namespace descriptor with `sddl` and read it back.
 */
export function writeWmiSecurity(namespace: string, sddl: string): PowerShellScript {
  const builder = openNamespace(createScript("write-wmi-security"), namespace)
    .line(`$binary = $converter.SDDLToBinarySD(${psString(sddl)}).BinarySD`)
    .line("$arguments = New-Object object[] 1")
    .line("$arguments[0] = $binary")
    .line("$rc = $security.PsBase.InvokeMethod('SetSD', $arguments)")
    .line('if ($rc -ne 0) { throw "SetSD on $namespace returned $rc" }');
  return readSddl(builder, "sddl").emitResult({ namespace: ps("$namespace"), sddl: ps("$sddl") }).build();
}

export const accountSidResultSchema = z.object({
  principal: z.string(),
  sid: z.string(),
});

/**
 * Translate `DOMAIN\user`, `user` or a local group name to its SID.
 */
export function resolveAccountSid(principal: string): PowerShellScript {
  return createScript("resolve-account-sid")
    .line(`$principal = ${psString(principal)}`)
    .line("$account = New-Object System.Security.Principal.NTAccount($principal)")
    .line("$sid = $account.Translate([System.Security.Principal.SecurityIdentifier]).Value")
    .emitResult({ principal: ps("$principal"), sid: ps("$sid") })
    .build();
}
