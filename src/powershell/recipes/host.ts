/**
 * Hyper-V host preparation: Windows features, nested switch + NAT,
 * firewall rules and S2D disk readiness.
 */

import { z } from "zod";
import { parseCidr } from "../../config/network.js";
import { psArray, psBool, psNumber, psString } from "../quote.js";
import { createScript, ps, type PowerShellScript } from "../script.js";

// =============================================================================
// Windows Features
// =============================================================================

export const DEFAULT_HOST_FEATURES = [
  "Hyper-V",
  "Hyper-V-PowerShell",
  "Failover-Clustering",
  "RSAT-Clustering-PowerShell",
  "FS-FileServer",
  "Data-Center-Bridging",
];

export const hostFeaturesResultSchema = z.object({
  changed: z.boolean(),
  installed: z.array(z.string()),
  restartRequired: z.boolean(),
});

export type HostFeaturesResult = z.infer<typeof hostFeaturesResultSchema>;

export function installHostFeatures(features: readonly string[] = DEFAULT_HOST_FEATURES): PowerShellScript {
  return createScript("install-host-features")
    .line(`$features = ${psArray([...features])}`)
    .line("$installed = @()", "$restart = $false")
    .block("foreach ($name in $features)", (b) =>
      b
        .line("$feature = Get-WindowsFeature -Name $name")
        .line("if ($null -eq $feature) { throw \"Unknown Windows feature $name\" }")
        .line("if ($feature.InstallState -eq 'InstallPending') { $restart = $true }")
        .block("if (-not $feature.Installed)", (inner) =>
          inner
            .line("$result = Install-WindowsFeature -Name $name -IncludeManagementTools")
            .line("$installed += $name")
            .line("if ($result.RestartNeeded -eq 'Yes') { $restart = $true }"),
        ),
    )
    .emitResult({
      changed: ps("($installed.Count -gt 0)"),
      installed: ps("$installed"),
      restartRequired: ps("$restart"),
    })
    .build();
}

// =============================================================================
// Nested Switch + NAT
// =============================================================================

export type NestedSwitchParams = {
  switchName: string;
  natName: string;
  natPrefix: string;
  gatewayAddress: string;
};

export const nestedSwitchResultSchema = z.object({
  changed: z.boolean(),
  created: z.array(z.string()),
});

export function createNestedSwitch(params: NestedSwitchParams): PowerShellScript {
  const prefix = parseCidr(params.natPrefix);
  if (!prefix) throw new RangeError(`Invalid NAT prefix ${params.natPrefix}`);

  return createScript("create-nested-switch")
    .line(`$switchName = ${psString(params.switchName)}`)
    .line(`$natName = ${psString(params.natName)}`)
    .line(`$natPrefix = ${psString(params.natPrefix)}`)
    .line(`$gateway = ${psString(params.gatewayAddress)}`)
    .line("$created = @()")
    .block("if (-not (Get-VMSwitch -Name $switchName -ErrorAction SilentlyContinue))", (b) =>
      b.line("New-VMSwitch -Name $switchName -SwitchType Internal | Out-Null", "$created += 'switch'"),
    )
    .line('$alias = "vEthernet ($switchName)"')
    .line(
      "$address = Get-NetIPAddress -InterfaceAlias $alias -AddressFamily IPv4 -ErrorAction SilentlyContinue | Where-Object { $_.IPAddress -eq $gateway }",
    )
    .block("if (-not $address)", (b) =>
      b.line(
        `New-NetIPAddress -IPAddress $gateway -PrefixLength ${psNumber(prefix.prefix)} -InterfaceAlias $alias | Out-Null`,
        "$created += 'gateway'",
      ),
    )
    .block("if (-not (Get-NetNat -Name $natName -ErrorAction SilentlyContinue))", (b) =>
      b.line("New-NetNat -Name $natName -InternalIPInterfaceAddressPrefix $natPrefix | Out-Null", "$created += 'nat'"),
    )
    .emitResult({ changed: ps("($created.Count -gt 0)"), created: ps("$created") })
    .build();
}

// =============================================================================
// Firewall
// =============================================================================

export type FirewallRule = {
  name: string;
  port: number;
  protocol: "TCP" | "UDP";
};

export const DEFAULT_FIREWALL_GROUPS = ["Windows Remote Management", "File and Printer Sharing", "Failover Clusters"];

export const PORT_NAMES: Readonly<Record<number, string>> = {
  445: "SMB",
  3389: "RDP",
  5985: "WinRM-HTTP",
  5986: "WinRM-HTTPS",
};

/** `S2DLab-<service>-<port>` rules for the configured ports. */
export function firewallRulesForPorts(ports: readonly number[]): FirewallRule[] {
  return ports.map((port) => ({
    name: `S2DLab-${PORT_NAMES[port] ?? "TCP"}-${port}`,
    port,
    protocol: "TCP",
  }));
}

export const firewallResultSchema = z.object({
  changed: z.boolean(),
  created: z.array(z.string()),
  enabledGroups: z.array(z.string()),
});

export function ensureFirewallRules(
  rules: readonly FirewallRule[],
  groups: readonly string[] = DEFAULT_FIREWALL_GROUPS,
): PowerShellScript {
  const builder = createScript("ensure-firewall-rules").line("$created = @()", "$enabledGroups = @()");

  for (const rule of rules) {
    builder.block(`if (-not (Get-NetFirewallRule -Name ${psString(rule.name)} -ErrorAction SilentlyContinue))`, (b) =>
      b.line(
        `New-NetFirewallRule -Name ${psString(rule.name)} -DisplayName ${psString(rule.name)} -Direction Inbound -Protocol ${rule.protocol} -LocalPort ${psNumber(rule.port)} -Action Allow -Profile Any | Out-Null`,
        `$created += ${psString(rule.name)}`,
      ),
    );
  }

  return builder
    .block(`foreach ($group in ${psArray([...groups])})`, (b) =>
      b
        .line("$disabled = @(Get-NetFirewallRule -DisplayGroup $group -ErrorAction SilentlyContinue | Where-Object { $_.Enabled -ne 'True' })")
        .block("if ($disabled.Count -gt 0)", (inner) =>
          inner.line("$disabled | Enable-NetFirewallRule", "$enabledGroups += $group"),
        ),
    )
    .emitResult({
      changed: ps("(($created.Count + $enabledGroups.Count) -gt 0)"),
      created: ps("$created"),
      enabledGroups: ps("$enabledGroups"),
    })
    .build();
}

// =============================================================================
// S2D Disks
// =============================================================================

export type PrepareDisksParams = {
  /** Data disks expected per node. */
  expected: number;
  /** Bring offline data disks online before counting. */
  bringOnline?: boolean;
};

export const prepareDisksResultSchema = z.object({
  changed: z.boolean(),
  poolable: z.number(),
  pooled: z.boolean(),
  onlined: z.number(),
});

export type PrepareDisksResult = z.infer<typeof prepareDisksResultSchema>;

/**
 * Check that the node has enough poolable data disks. The OS disk and the
 * Azure temporary disk are never touched.
 */
export function prepareS2dDisks(params: PrepareDisksParams): PowerShellScript {
  return createScript("prepare-s2d-disks")
    .line(`$expected = ${psNumber(params.expected)}`)
    .line("$onlined = 0")
    .line("$pooled = [bool](Get-StoragePool -IsPrimordial $false -ErrorAction SilentlyContinue | Where-Object { $_.FriendlyName -like 'S2D*' })")
    .block(`if (${psBool(params.bringOnline ?? true)} -and -not $pooled)`, (b) =>
      b.block("foreach ($disk in @(Get-Disk | Where-Object { $_.IsOffline -and -not $_.IsBoot -and -not $_.IsSystem }))", (inner) =>
        inner.line("Set-Disk -Number $disk.Number -IsOffline $false", "$onlined++"),
      ),
    )
    .line("$poolable = @(Get-PhysicalDisk -CanPool $true).Count")
    .block("if (-not $pooled -and $poolable -lt $expected)", (b) =>
      b.line('throw "Only $poolable poolable disk(s) found, expected $expected"'),
    )
    .emitResult({
      changed: ps("($onlined -gt 0)"),
      poolable: ps("$poolable"),
      pooled: ps("$pooled"),
      onlined: ps("$onlined"),
    })
    .build();
}
