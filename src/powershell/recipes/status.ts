/**
 * Read-only node status check. Every lookup is wrapped so a missing role
 * (no Hyper-V, no cluster) reports as absent instead of failing the script.
 */

import { z } from "zod";
import { psArray, psString } from "../quote.js";
import { createScript, ps, type PowerShellScript } from "../script.js";

export type NodeStatusParams = {
  switchName: string;
  natName: string;
  firewallRules: readonly string[];
  volumeName: string;
};

export const nodeStatusPayloadSchema = z.object({
  computerName: z.string(),
  features: z.record(z.string(), z.boolean()),
  vmSwitch: z.boolean(),
  nat: z.boolean(),
  winrmListeners: z.array(z.string()),
  credSspServer: z.boolean(),
  firewallRules: z.array(z.object({ name: z.string(), enabled: z.boolean() })),
  cluster: z
    .object({
      name: z.string(),
      nodes: z.array(z.object({ name: z.string(), state: z.string() })),
    })
    .nullable(),
  s2dState: z.string().nullable(),
  pools: z.array(z.object({ name: z.string(), health: z.string(), operational: z.string() })),
  volumes: z.array(z.object({ name: z.string(), health: z.string(), sizeGb: z.number() })),
});

export type NodeStatusPayload = z.infer<typeof nodeStatusPayloadSchema>;

export const STATUS_FEATURES = ["Hyper-V", "Failover-Clustering"];

export function collectNodeStatus(params: NodeStatusParams): PowerShellScript {
  return createScript("collect-node-status")
    .block("function Get-OrDefault([scriptblock]$Block, $Default)", (b) =>
      b.line("try { $value = & $Block; if ($null -eq $value) { $Default } else { $value } } catch { $Default }"),
    )
    .line("$features = @{}")
    .block(`foreach ($name in ${psArray(STATUS_FEATURES)})`, (b) =>
      b.line("$features[$name] = [bool](Get-OrDefault { (Get-WindowsFeature -Name $name).Installed } $false)"),
    )
    .line(`$vmSwitch = [bool](Get-OrDefault { Get-VMSwitch -Name ${psString(params.switchName)} } $null)`)
    .line(`$nat = [bool](Get-OrDefault { Get-NetNat -Name ${psString(params.natName)} } $null)`)
    .line(
      "$listeners = @(Get-OrDefault { Get-ChildItem -Path WSMan:\\localhost\\Listener | ForEach-Object { ($_.Keys | Where-Object { $_ -like 'Transport=*' }) -replace 'Transport=', '' } } @())",
    )
    .line("$credSsp = (Get-OrDefault { (Get-Item -Path WSMan:\\localhost\\Service\\Auth\\CredSSP).Value } 'false') -eq 'true'")
    .line("$rules = @()")
    .block(`foreach ($rule in ${psArray([...params.firewallRules])})`, (b) =>
      b
        .line("$found = Get-OrDefault { Get-NetFirewallRule -Name $rule } $null")
        .line("$rules += @{ name = $rule; enabled = [bool]($found -and $found.Enabled -eq 'True') }"),
    )
    .line("$cluster = $null")
    .line("$clusterInfo = Get-OrDefault { Get-Cluster } $null")
    .block("if ($clusterInfo)", (b) =>
      b
        .line("$members = @(Get-OrDefault { Get-ClusterNode | ForEach-Object { @{ name = [string]$_.Name; state = [string]$_.State } } } @())")
        .line("$cluster = @{ name = [string]$clusterInfo.Name; nodes = $members }"),
    )
    .line("$s2d = Get-OrDefault { [string](Get-ClusterStorageSpacesDirect).State } $null")
    .line(
      "$pools = @(Get-OrDefault { Get-StoragePool -IsPrimordial $false | ForEach-Object { @{ name = [string]$_.FriendlyName; health = [string]$_.HealthStatus; operational = [string]$_.OperationalStatus } } } @())",
    )
    .line(
      `$volumes = @(Get-OrDefault { Get-VirtualDisk -FriendlyName ${psString(params.volumeName)} | ForEach-Object { @{ name = [string]$_.FriendlyName; health = [string]$_.HealthStatus; sizeGb = [math]::Round($_.Size / 1GB) } } } @())`,
    )
    .emitResult({
      computerName: ps("$env:COMPUTERNAME"),
      features: ps("$features"),
      vmSwitch: ps("$vmSwitch"),
      nat: ps("$nat"),
      winrmListeners: ps("$listeners"),
      credSspServer: ps("$credSsp"),
      firewallRules: ps("$rules"),
      cluster: ps("$cluster"),
      s2dState: ps("$s2d"),
      pools: ps("$pools"),
      volumes: ps("$volumes"),
    })
    .build();
}
