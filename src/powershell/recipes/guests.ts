/**
 * Nested AlmaLinux guests on a Hyper-V node: ISO download, VM creation
 * with a Kickstart OEMDRV disk, host SSH key and guest shell execution.
 */

import { z } from "zod";
import { psBase64, psNumber, psString } from "../quote.js";
import { createScript, ps, type PowerShellScript } from "../script.js";

// =============================================================================
// Download
// =============================================================================

export type DownloadParams = {
  url: string;
  destination: string;
};

export const downloadResultSchema = z.object({
  changed: z.boolean(),
  path: z.string(),
  bytes: z.number(),
});

export type DownloadResult = z.infer<typeof downloadResultSchema>;

/**
 * One download attempt. A file already present with a non-zero size is
 * kept; a zero-byte result is an error. Retries happen on the client.
 */
export function downloadFile(params: DownloadParams): PowerShellScript {
  return createScript("download-file")
    .line(`$url = ${psString(params.url)}`)
    .line(`$destination = ${psString(params.destination)}`)
    .line("$existing = Get-Item -Path $destination -ErrorAction SilentlyContinue")
    .ifElse(
      "$existing -and $existing.Length -gt 0",
      (b) => b.emitResult({ changed: false, path: ps("$destination"), bytes: ps("$existing.Length") }),
      (b) =>
        b
          .line("New-Item -ItemType Directory -Path (Split-Path -Parent $destination) -Force | Out-Null")
          .line("[Net.ServicePointManager]::SecurityProtocol = [Net.SecurityProtocolType]::Tls12")
          .line('$partial = "$destination.partial"')
          .line("Invoke-WebRequest -Uri $url -OutFile $partial -UseBasicParsing")
          .line("$size = (Get-Item -Path $partial).Length")
          .block("if ($size -eq 0)", (inner) =>
            inner.line("Remove-Item -Path $partial -Force", 'throw "Downloaded file $url is empty"'),
          )
          .line("Move-Item -Path $partial -Destination $destination -Force")
          .emitResult({ changed: true, path: ps("$destination"), bytes: ps("$size") }),
    )
    .build();
}

// =============================================================================
// Nested Guest VM
// =============================================================================

export type NestedGuestParams = {
  name: string;
  memoryMb: number;
  cpuCount: number;
  diskGb: number;
  vmPath: string;
  isoPath: string;
  switchName: string;
  /** Rendered Kickstart file, written as `ks.cfg` on an OEMDRV-labelled disk. */
  kickstart: string;
};

export const nestedGuestResultSchema = z.object({
  changed: z.boolean(),
  vmName: z.string(),
  created: z.boolean(),
  state: z.string(),
});

export type NestedGuestResult = z.infer<typeof nestedGuestResultSchema>;

export function createNestedGuest(params: NestedGuestParams): PowerShellScript {
  return createScript("create-nested-guest")
    .line(`$name = ${psString(params.name)}`)
    .line("$vm = Get-VM -Name $name -ErrorAction SilentlyContinue")
    .ifElse(
      "$vm",
      (b) => b.emitResult({ changed: false, vmName: ps("$name"), created: false, state: ps("[string]$vm.State") }),
      (b) =>
        b
          .line(`$vmPath = ${psString(params.vmPath)}`)
          .line(`$iso = ${psString(params.isoPath)}`)
          .line("if (-not (Test-Path -Path $iso)) { throw \"Installation ISO $iso not found\" }")
          .line("$vmDir = Join-Path $vmPath $name")
          .line("New-Item -ItemType Directory -Path $vmDir -Force | Out-Null")
          .line('$osDisk = Join-Path $vmDir "$name.vhdx"')
          .line(
            `New-VM -Name $name -Generation 2 -MemoryStartupBytes (${psNumber(params.memoryMb)} * 1MB) -NewVHDPath $osDisk -NewVHDSizeBytes (${psNumber(params.diskGb)} * 1GB) -SwitchName ${psString(params.switchName)} -Path $vmPath | Out-Null`,
          )
          .line(`Set-VMProcessor -VMName $name -Count ${psNumber(params.cpuCount)} -ExposeVirtualizationExtensions $true`)
          .line("Set-VMMemory -VMName $name -DynamicMemoryEnabled $false")
          .line("Set-VMFirmware -VMName $name -EnableSecureBoot On -SecureBootTemplate 'MicrosoftUEFICertificateAuthority'")
          .line("$dvd = Add-VMDvdDrive -VMName $name -Path $iso -Passthru")
          .comment("Anaconda reads ks.cfg from any volume labelled OEMDRV")
          .line("$ksDisk = Join-Path $vmDir 'oemdrv.vhdx'")
          .line("$disk = New-VHD -Path $ksDisk -SizeBytes 64MB -Dynamic | Mount-VHD -Passthru | Initialize-Disk -PartitionStyle MBR -PassThru")
          .line("$partition = New-Partition -DiskNumber $disk.Number -UseMaximumSize -AssignDriveLetter")
          .line("Format-Volume -Partition $partition -FileSystem FAT32 -NewFileSystemLabel 'OEMDRV' -Confirm:$false | Out-Null")
          .line(`$kickstart = [Text.Encoding]::UTF8.GetString([Convert]::FromBase64String(${psString(psBase64(params.kickstart))}))`)
          .line('[IO.File]::WriteAllText("$($partition.DriveLetter):\\ks.cfg", $kickstart, (New-Object System.Text.UTF8Encoding $false))')
          .line("Dismount-VHD -Path $ksDisk")
          .line("Add-VMHardDiskDrive -VMName $name -Path $ksDisk")
          .line("Set-VMFirmware -VMName $name -FirstBootDevice $dvd")
          .line("Start-VM -Name $name")
          .emitResult({ changed: true, vmName: ps("$name"), created: true, state: ps("[string](Get-VM -Name $name).State") }),
    )
    .build();
}

// =============================================================================
// SSH
// =============================================================================

export const DEFAULT_HOST_KEY_PATH = "C:\\Lab\\ssh\\id_ed25519";

export const hostSshKeyResultSchema = z.object({
  changed: z.boolean(),
  keyPath: z.string(),
  publicKey: z.string(),
});

/**
 * Make sure the Windows OpenSSH client is present and a host key pair exists.
 */
export function ensureHostSshKey(keyPath: string = DEFAULT_HOST_KEY_PATH): PowerShellScript {
  return createScript("ensure-host-ssh-key")
    .line(`$key = ${psString(keyPath)}`)
    .line("$changed = $false")
    .line("$client = Get-WindowsCapability -Online -Name 'OpenSSH.Client*' | Select-Object -First 1")
    .block("if ($client -and $client.State -ne 'Installed')", (b) =>
      b.line("Add-WindowsCapability -Online -Name $client.Name | Out-Null", "$changed = $true"),
    )
    .block("if (-not (Test-Path -Path $key))", (b) =>
      b
        .line("New-Item -ItemType Directory -Path (Split-Path -Parent $key) -Force | Out-Null")
        .line("& ssh-keygen.exe -t ed25519 -N '\"\"' -C \"s2dlab@$env:COMPUTERNAME\" -f $key -q")
        .line('if ($LASTEXITCODE -ne 0) { throw "ssh-keygen exited with $LASTEXITCODE" }')
        .line("$changed = $true"),
    )
    .line('$publicKey = (Get-Content -Path "$key.pub" -Raw).Trim()')
    .emitResult({ changed: ps("$changed"), keyPath: ps("$key"), publicKey: ps("$publicKey") })
    .build();
}

export type GuestShellParams = {
  /** Label for logs, e.g. `postinstall`. */
  name: string;
  address: string;
  user: string;
  keyPath?: string;
  /** Bash script body. */
  script: string;
  /** Lines of output kept in the payload (Run Command truncates stdout). */
  tailLines?: number;
  /** UTF-8 bytes of JSON-encoded output kept in the payload. */
  maxOutputBytes?: number;
};

/**
 * Output budget of a guest shell payload. Run Command returns only the last
 * 4096 bytes of stdout, and the result line has to fit in them whole.
 */
export const GUEST_OUTPUT_BUDGET_BYTES = 2_500;

/** Longer output lines are cut to this many characters. */
export const GUEST_OUTPUT_LINE_CHARS = 500;

/** A non-zero exit code is data here, not a recipe failure. */
export const guestShellResultSchema = z.object({
  exitCode: z.number(),
  output: z.array(z.string()),
});

export type GuestShellResult = z.infer<typeof guestShellResultSchema>;

/**
 * Run a bash script on a nested guest over the host's OpenSSH client. The
 * script is passed base64-encoded so Windows line endings never reach bash.
 */
export function runGuestShell(params: GuestShellParams): PowerShellScript {
  const encoded = psBase64(params.script.replace(/\r\n/g, "\n"));
  const remote = `echo ${encoded} | base64 -d | bash -s`;

  return createScript(`guest-shell:${params.name}`)
    .line(`$key = ${psString(params.keyPath ?? DEFAULT_HOST_KEY_PATH)}`)
    .line(`$target = ${psString(`${params.user}@${params.address}`)}`)
    .comment("native stderr must not become a terminating error")
    .line("$ErrorActionPreference = 'Continue'")
    .line(
      `$output = @(& ssh.exe -i $key -o StrictHostKeyChecking=no -o UserKnownHostsFile=NUL -o BatchMode=yes -o ConnectTimeout=15 $target ${psString(remote)} 2>&1 | ForEach-Object { [string]$_ })`,
    )
    .line("$code = $LASTEXITCODE")
    .line("$ErrorActionPreference = 'Stop'")
    .line(`$tail = @($output | Select-Object -Last ${psNumber(params.tailLines ?? 40)})`)
    .comment("newest lines first, until the encoded size reaches the budget")
    .line(`$budget = ${psNumber(params.maxOutputBytes ?? GUEST_OUTPUT_BUDGET_BYTES)}`)
    .line("$kept = New-Object 'System.Collections.Generic.List[string]'")
    .block("for ($i = $tail.Count - 1; $i -ge 0; $i--)", (b) =>
      b
        .line("$text = $tail[$i]")
        .line(
          `if ($text.Length -gt ${GUEST_OUTPUT_LINE_CHARS}) { $text = $text.Substring(0, ${GUEST_OUTPUT_LINE_CHARS}) + '...' }`,
        )
        .line("$budget -= [Text.Encoding]::UTF8.GetByteCount((ConvertTo-Json -InputObject $text -Compress)) + 1")
        .line("if ($budget -lt 0) { break }")
        .line("$kept.Insert(0, $text)"),
    )
    .emitResult({ exitCode: ps("$code"), output: ps("@($kept)") })
    .build();
}
