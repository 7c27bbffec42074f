import { describe, it, expect } from "vitest";
import {
  configureCredSsp,
  configureWinRm,
  createCluster,
  createNestedGuest,
  createNestedSwitch,
  createVolume,
  downloadFile,
  ensureFirewallRules,
  firewallRulesForPorts,
  installHostFeatures,
  prepareS2dDisks,
  resolveAccountSid,
  runGuestShell,
  writeWmiSecurity,
} from "./index.js";
import { psBase64 } from "../quote.js";

function body(lines: string[]): string[] {
  return lines.map((line) => line.trim());
}

describe("host recipes", () => {
  it("installs the requested features", () => {
    const script = installHostFeatures(["Hyper-V"]);
    expect(script.name).toBe("install-host-features");
    expect(body(script.lines)).toContain("$features = @('Hyper-V')");
  });

  it("creates the NAT gateway with the prefix length of the NAT range", () => {
    const script = createNestedSwitch({
      switchName: "NestedSwitch",
      natName: "NestedNAT",
      natPrefix: "192.168.100.0/24",
      gatewayAddress: "192.168.100.1",
    });
    const lines = body(script.lines);
    expect(lines).toContain("$switchName = 'NestedSwitch'");
    expect(lines).toContain("New-NetIPAddress -IPAddress $gateway -PrefixLength 24 -InterfaceAlias $alias | Out-Null");
    expect(lines).toContain("New-NetNat -Name $natName -InternalIPInterfaceAddressPrefix $natPrefix | Out-Null");
  });

  it("rejects a NAT prefix that is not a CIDR", () => {
    expect(() =>
      createNestedSwitch({ switchName: "s", natName: "n", natPrefix: "192.168.100.0", gatewayAddress: "192.168.100.1" }),
    ).toThrow("Invalid NAT prefix 192.168.100.0");
  });

  it("names firewall rules after the service on the port", () => {
    expect(firewallRulesForPorts([5985, 445, 8080])).toEqual([
      { name: "S2DLab-WinRM-HTTP-5985", port: 5985, protocol: "TCP" },
      { name: "S2DLab-SMB-445", port: 445, protocol: "TCP" },
      { name: "S2DLab-TCP-8080", port: 8080, protocol: "TCP" },
    ]);
  });

  it("creates each missing firewall rule and enables rule groups", () => {
    const script = ensureFirewallRules(firewallRulesForPorts([5986]), ["Failover Clusters"]);
    const lines = body(script.lines);
    expect(lines).toContain(
      "New-NetFirewallRule -Name 'S2DLab-WinRM-HTTPS-5986' -DisplayName 'S2DLab-WinRM-HTTPS-5986' -Direction Inbound -Protocol TCP -LocalPort 5986 -Action Allow -Profile Any | Out-Null",
    );
    expect(lines).toContain("foreach ($group in @('Failover Clusters')) {");
  });

  it("checks the poolable disk count", () => {
    const lines = body(prepareS2dDisks({ expected: 4, bringOnline: false }).lines);
    expect(lines).toContain("$expected = 4");
    expect(lines).toContain("if ($false -and -not $pooled) {");
    expect(lines).toContain('throw "Only $poolable poolable disk(s) found, expected $expected"');
  });
});

describe("remoting recipes", () => {
  it("joins trusted hosts into a single value", () => {
    const lines = body(configureWinRm({ httpsListener: true, trustedHosts: ["lab-node1", "lab-node2"] }).lines);
    expect(lines).toContain("$wanted = 'lab-node1,lab-node2'");
    expect(lines).toContain(
      "if ($true -and -not ($listeners | Where-Object { $_.Keys -contains 'Transport=HTTPS' })) {",
    );
  });

  it("adds NTLM-only delegation entries only when asked", () => {
    const plain = body(configureCredSsp({ delegateTo: ["lab-node2"] }).lines);
    expect(plain.some((line) => line.includes("AllowFreshCredentialsWhenNTLMOnly"))).toBe(false);

    const ntlm = body(configureCredSsp({ delegateTo: ["lab-node2"], ntlmOnly: true }).lines);
    expect(ntlm).toContain("$delegates = @('lab-node2')");
    expect(ntlm).toContain("foreach ($spn in @('WSMAN/lab-node2')) {");
  });
});

describe("wmi recipes", () => {
  it("writes the descriptor and reads it back", () => {
    const lines = body(writeWmiSecurity("root/cimv2", "O:BAG:BAD:(A;CI;CCDCWP;;;RM)").lines);
    expect(lines).toContain("$namespace = 'root/cimv2'");
    expect(lines).toContain("$binary = $converter.SDDLToBinarySD('O:BAG:BAD:(A;CI;CCDCWP;;;RM)').BinarySD");
    expect(lines.indexOf("$rc = $security.PsBase.InvokeMethod('SetSD', $arguments)")).toBeLessThan(
      lines.indexOf("$rc = $security.PsBase.InvokeMethod('GetSD', $binarySD)"),
    );
  });

  it("quotes the principal to translate", () => {
    expect(body(resolveAccountSid("LAB\\o'brien").lines)).toContain("$principal = 'LAB\\o''brien'");
  });
});

describe("cluster recipes", () => {
  it("creates the cluster without storage", () => {
    const lines = body(
      createCluster({ name: "s2dlab-clu", nodes: ["s2dlab-node1", "s2dlab-node2"], staticAddress: "10.10.1.50" }).lines,
    );
    expect(lines).toContain(
      "New-Cluster -Name $name -Node @('s2dlab-node1', 's2dlab-node2') -StaticAddress '10.10.1.50' -NoStorage -Force | Out-Null",
    );
  });

  it("sizes the volume in gigabytes", () => {
    const lines = body(
      createVolume({ friendlyName: "LabVolume", fileSystem: "CSVFS_ReFS", sizeGb: 200, resiliency: "Mirror" }).lines,
    );
    expect(lines).toContain(
      "New-Volume -StoragePoolFriendlyName 'S2D*' -FriendlyName $name -FileSystem CSVFS_ReFS -Size (200 * 1GB) -ResiliencySettingName Mirror | Out-Null",
    );
  });
});

describe("guest recipes", () => {
  it("downloads through a partial file", () => {
    const lines = body(downloadFile({ url: "https://example.test/alma.iso", destination: "C:\\Lab\\ISO\\alma.iso" }).lines);
    expect(lines).toContain("$url = 'https://example.test/alma.iso'");
    expect(lines).toContain("Move-Item -Path $partial -Destination $destination -Force");
  });

  it("embeds the kickstart file as base64", () => {
    const lines = body(
      createNestedGuest({
        name: "alma1",
        memoryMb: 2048,
        cpuCount: 2,
        diskGb: 40,
        vmPath: "C:\\Lab\\VMs",
        isoPath: "C:\\Lab\\ISO\\alma.iso",
        switchName: "NestedSwitch",
        kickstart: "text\nreboot\n",
      }).lines,
    );
    expect(lines).toContain(
      `$kickstart = [Text.Encoding]::UTF8.GetString([Convert]::FromBase64String('${psBase64("text\nreboot\n")}'))`,
    );
    expect(lines).toContain("Set-VMProcessor -VMName $name -Count 2 -ExposeVirtualizationExtensions $true");
  });

  it("sends guest scripts with unix line endings", () => {
    const script = runGuestShell({ name: "diagnose", address: "192.168.100.10", user: "labuser", script: "uname -a\r\nid\r\n" });
    expect(script.name).toBe("guest-shell:diagnose");
    const encoded = psBase64("uname -a\nid\n");
    expect(body(script.lines).find((line) => line.startsWith("$output = "))).toContain(
      `$target 'echo ${encoded} | base64 -d | bash -s' 2>&1`,
    );
    expect(body(script.lines)).toContain("$tail = @($output | Select-Object -Last 40)");
  });

  it("keeps guest output inside the run command output window", () => {
    const lines = body(runGuestShell({ name: "noisy", address: "192.168.100.10", user: "labuser", script: "yes | head -n 5000" }).lines);

    expect(lines).toContain("$budget = 2500");
    expect(lines).toContain("for ($i = $tail.Count - 1; $i -ge 0; $i--) {");
    expect(lines).toContain("if ($text.Length -gt 500) { $text = $text.Substring(0, 500) + '...' }");
    expect(lines).toContain("if ($budget -lt 0) { break }");
    expect(lines).toContain("$kept.Insert(0, $text)");
    expect(lines).toContain(
      "Write-Output ('##S2DLAB## ' + (@{ ok = $true; exitCode = $code; output = @($kept) } | ConvertTo-Json -Compress -Depth 6))",
    );
  });

  it("takes a smaller output budget", () => {
    const lines = body(
      runGuestShell({ name: "short", address: "192.168.100.10", user: "labuser", script: "id", maxOutputBytes: 800 }).lines,
    );
    expect(lines).toContain("$budget = 800");
  });
});
