/**
 * WinRM listeners, TrustedHosts and CredSSP delegation.
 */

import { z } from "zod";
import { psArray, psBool, psString } from "../quote.js";
import { createScript, ps, type PowerShellScript } from "../script.js";

export type WinRmParams = {
  httpsListener: boolean;
  trustedHosts: readonly string[];
};

export const winRmResultSchema = z.object({
  changed: z.boolean(),
  updated: z.array(z.string()),
  listeners: z.array(z.string()),
});

export function configureWinRm(params: WinRmParams): PowerShellScript {
  return createScript("configure-winrm")
    .line("$updated = @()")
    .line("$service = Get-Service -Name WinRM")
    .block("if ($service.Status -ne 'Running' -or $service.StartType -ne 'Automatic')", (b) =>
      b.line("Set-Service -Name WinRM -StartupType Automatic", "Start-Service -Name WinRM", "$updated += 'service'"),
    )
    .line("$listeners = @(Get-ChildItem -Path WSMan:\\localhost\\Listener)")
    .block("if (-not ($listeners | Where-Object { $_.Keys -contains 'Transport=HTTP' }))", (b) =>
      b.line(
        "New-Item -Path WSMan:\\localhost\\Listener -Transport HTTP -Address * -Force | Out-Null",
        "$updated += 'http-listener'",
      ),
    )
    .block(
      `if (${psBool(params.httpsListener)} -and -not ($listeners | Where-Object { $_.Keys -contains 'Transport=HTTPS' }))`,
      (b) =>
        b
          .line("$cert = New-SelfSignedCertificate -DnsName $env:COMPUTERNAME -CertStoreLocation Cert:\\LocalMachine\\My")
          .line(
            "New-Item -Path WSMan:\\localhost\\Listener -Transport HTTPS -Address * -CertificateThumbPrint $cert.Thumbprint -Force | Out-Null",
          )
          .line("$updated += 'https-listener'"),
    )
    .line(`$wanted = ${psString(params.trustedHosts.join(","))}`)
    .line("$current = (Get-Item -Path WSMan:\\localhost\\Client\\TrustedHosts).Value")
    .block("if ($wanted -and $current -ne $wanted)", (b) =>
      b.line("Set-Item -Path WSMan:\\localhost\\Client\\TrustedHosts -Value $wanted -Force", "$updated += 'trusted-hosts'"),
    )
    .line(
      "$transports = @(Get-ChildItem -Path WSMan:\\localhost\\Listener | ForEach-Object { ($_.Keys | Where-Object { $_ -like 'Transport=*' }) -replace 'Transport=', '' })",
    )
    .emitResult({ changed: ps("($updated.Count -gt 0)"), updated: ps("$updated"), listeners: ps("$transports") })
    .build();
}

export type CredSspParams = {
  /** Computers this node may delegate fresh credentials to (`WSMAN/<name>`). */
  delegateTo: readonly string[];
  /**
   * Also allow delegation when only NTLM is available (workgroup nodes).
   */
  ntlmOnly?: boolean;
};

export const credSspResultSchema = z.object({
  changed: z.boolean(),
  updated: z.array(z.string()),
});

const DELEGATION_POLICY_KEY = "HKLM:\\SOFTWARE\\Policies\\Microsoft\\Windows\\CredentialsDelegation";

export function configureCredSsp(params: CredSspParams): PowerShellScript {
  const spns = params.delegateTo.map((name) => `WSMAN/${name}`);

  const builder = createScript("configure-credssp")
    .line("$updated = @()")
    .block("if ((Get-Item -Path WSMan:\\localhost\\Service\\Auth\\CredSSP).Value -ne 'true')", (b) =>
      b.line("Enable-WSManCredSSP -Role Server -Force | Out-Null", "$updated += 'server'"),
    )
    .line(`$delegates = ${psArray([...params.delegateTo])}`)
    .block("if ($delegates.Count -gt 0 -and (Get-Item -Path WSMan:\\localhost\\Client\\Auth\\CredSSP).Value -ne 'true')", (b) =>
      b.line("Enable-WSManCredSSP -Role Client -DelegateComputer $delegates -Force | Out-Null", "$updated += 'client'"),
    );

  if (params.ntlmOnly && spns.length > 0) {
    builder
      .line(`$policy = ${psString(DELEGATION_POLICY_KEY)}`)
      .line("$list = Join-Path $policy 'AllowFreshCredentialsWhenNTLMOnly'")
      .block("if (-not (Test-Path $list))", (b) =>
        b
          .line("New-Item -Path $list -Force | Out-Null")
          .line("Set-ItemProperty -Path $policy -Name AllowFreshCredentialsWhenNTLMOnly -Value 1 -Type DWord")
          .line("Set-ItemProperty -Path $policy -Name ConcatenateDefaults_AllowFreshNTLMOnly -Value 1 -Type DWord"),
      )
      .line("$present = @((Get-Item -Path $list).Property | ForEach-Object { (Get-ItemProperty -Path $list).$_ })")
      .line("$index = $present.Count")
      .block(`foreach ($spn in ${psArray(spns)})`, (b) =>
        b.block("if ($present -notcontains $spn)", (inner) =>
          inner
            .line("$index++")
            .line("New-ItemProperty -Path $list -Name \"$index\" -Value $spn -PropertyType String -Force | Out-Null")
            .line("$updated += \"ntlm:$spn\""),
        ),
      );
  }

  return builder.emitResult({ changed: ps("($updated.Count -gt 0)"), updated: ps("$updated") }).build();
}
