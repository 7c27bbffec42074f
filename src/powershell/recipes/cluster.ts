/**
 * Failover cluster and Storage Spaces Direct recipes.
 */

import { z } from "zod";
import { psArray, psNumber, psString } from "../quote.js";
import { createScript, ps, type PowerShellScript } from "../script.js";

export const CLUSTER_VALIDATION_TESTS = [
  "Storage Spaces Direct",
  "Inventory",
  "Network",
  "System Configuration",
];

export type ValidateClusterParams = {
  nodes: readonly string[];
  reportDir: string;
};

export const validateClusterResultSchema = z.object({
  skipped: z.boolean(),
  reportPath: z.string().nullable(),
  passed: z.boolean(),
  warnings: z.array(z.string()),
});

export type ValidateClusterResult = z.infer<typeof validateClusterResultSchema>;

export function validateCluster(params: ValidateClusterParams): PowerShellScript {
  return createScript("validate-cluster")
    .line(`$nodes = ${psArray([...params.nodes])}`)
    .line(`$reportDir = ${psString(params.reportDir)}`)
    .ifElse(
      "Get-Cluster -ErrorAction SilentlyContinue",
      (b) => b.emitResult({ skipped: true, reportPath: null, passed: true, warnings: [] }),
      (b) =>
        b
          .line("New-Item -ItemType Directory -Path $reportDir -Force | Out-Null")
          .line("$reportName = Join-Path $reportDir (\"validation-\" + (Get-Date -Format 'yyyyMMdd-HHmmss'))")
          .line(
            `$report = Test-Cluster -Node $nodes -Include ${psArray(CLUSTER_VALIDATION_TESTS)} -ReportName $reportName -WarningVariable validationWarnings -WarningAction SilentlyContinue`,
          )
          .line("$warnings = @($validationWarnings | ForEach-Object { $_.Message })")
          .emitResult({
            skipped: false,
            reportPath: ps("[string]$report.FullName"),
            passed: ps("($warnings.Count -eq 0)"),
            warnings: ps("$warnings"),
          }),
    )
    .build();
}

export type CreateClusterParams = {
  name: string;
  nodes: readonly string[];
  staticAddress: string;
};

export const createClusterResultSchema = z.object({
  changed: z.boolean(),
  clusterName: z.string(),
  created: z.boolean(),
});

export function createCluster(params: CreateClusterParams): PowerShellScript {
  return createScript("create-cluster")
    .line(`$name = ${psString(params.name)}`)
    .line("$existing = Get-Cluster -ErrorAction SilentlyContinue")
    .ifElse(
      "$existing",
      (b) =>
        b
          .line('if ($existing.Name -ne $name) { throw "This node already belongs to cluster $($existing.Name)" }')
          .emitResult({ changed: false, clusterName: ps("$existing.Name"), created: false }),
      (b) =>
        b
          .line(
            `New-Cluster -Name $name -Node ${psArray([...params.nodes])} -StaticAddress ${psString(params.staticAddress)} -NoStorage -Force | Out-Null`,
          )
          .emitResult({ changed: true, clusterName: ps("$name"), created: true }),
    )
    .build();
}

export type EnableS2dParams = {
  /** Disable the cache when every disk has the same media type. */
  cacheState?: "Enabled" | "Disabled";
};

export const enableS2dResultSchema = z.object({
  changed: z.boolean(),
  poolName: z.string(),
  healthStatus: z.string().nullable(),
});

export function enableS2d(params: EnableS2dParams = {}): PowerShellScript {
  return createScript("enable-s2d")
    .line("$pool = Get-StoragePool -IsPrimordial $false -ErrorAction SilentlyContinue | Where-Object { $_.FriendlyName -like 'S2D*' } | Select-Object -First 1")
    .line("$changed = $false")
    .block("if (-not $pool)", (b) =>
      b
        .line(`Enable-ClusterStorageSpacesDirect -CacheState ${params.cacheState ?? "Disabled"} -Confirm:$false | Out-Null`)
        .line("$pool = Get-StoragePool -IsPrimordial $false | Where-Object { $_.FriendlyName -like 'S2D*' } | Select-Object -First 1")
        .line("if (-not $pool) { throw 'Storage Spaces Direct did not create a pool' }")
        .line("$changed = $true"),
    )
    .emitResult({ changed: ps("$changed"), poolName: ps("$pool.FriendlyName"), healthStatus: ps("[string]$pool.HealthStatus") })
    .build();
}

export type CreateVolumeParams = {
  friendlyName: string;
  fileSystem: "CSVFS_ReFS" | "CSVFS_NTFS";
  sizeGb: number;
  resiliency: "Mirror" | "Parity";
  poolName?: string;
};

export const createVolumeResultSchema = z.object({
  changed: z.boolean(),
  volumePath: z.string().nullable(),
});

export function createVolume(params: CreateVolumeParams): PowerShellScript {
  return createScript("create-volume")
    .line(`$name = ${psString(params.friendlyName)}`)
    .line("$changed = $false")
    .block("if (-not (Get-VirtualDisk -FriendlyName $name -ErrorAction SilentlyContinue))", (b) =>
      b
        .line(
          `New-Volume -StoragePoolFriendlyName ${psString(params.poolName ?? "S2D*")} -FriendlyName $name -FileSystem ${params.fileSystem} -Size (${psNumber(params.sizeGb)} * 1GB) -ResiliencySettingName ${params.resiliency} | Out-Null`,
        )
        .line("$changed = $true"),
    )
    .line("$csv = Get-ClusterSharedVolume | Where-Object { $_.Name -like \"*($name)\" } | Select-Object -First 1")
    .line("$path = if ($csv) { [string]$csv.SharedVolumeInfo.FriendlyVolumeName } else { $null }")
    .emitResult({ changed: ps("$changed"), volumePath: ps("$path") })
    .build();
}
