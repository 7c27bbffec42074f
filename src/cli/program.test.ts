import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createProgram } from "./program.js";
import { theme } from "./theme.js";
import type { CliContext } from "./context.js";
import { parseParam } from "./program/register.configure.js";
import { LabManager, LAB_STATE_FILE, type TerraformOps } from "../lab/manager.js";
import { LabLoggerImpl, MemoryTransport, setGlobalLabLogger } from "../logging/index.js";
import { RecordingRunner } from "../remote/index.js";
import type { NodeStatusPayload } from "../powershell/index.js";

const OUTPUTS = {
  resourceGroup: "rg-s2d-lab",
  nodes: [
    { name: "s2dlab-node1", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.10" },
    { name: "s2dlab-node2", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.11" },
  ],
};

function healthyPayload(name: string): NodeStatusPayload {
  return {
    computerName: name.toUpperCase(),
    features: { "Hyper-V": true, "Failover-Clustering": true },
    vmSwitch: true,
    nat: true,
    winrmListeners: ["HTTP"],
    credSspServer: true,
    firewallRules: [
      { name: "S2DLab-WinRM-HTTP-5985", enabled: true },
      { name: "S2DLab-WinRM-HTTPS-5986", enabled: true },
      { name: "S2DLab-SMB-445", enabled: true },
    ],
    cluster: {
      name: "s2dlab-clu",
      nodes: [
        { name: "s2dlab-node1", state: "Up" },
        { name: "s2dlab-node2", state: "Up" },
      ],
    },
    s2dState: "Enabled",
    pools: [{ name: "S2D on s2dlab-clu", health: "Healthy", operational: "OK" }],
    volumes: [{ name: "LabVolume", health: "Healthy", sizeGb: 200 }],
  };
}

describe("s2dlab CLI", () => {
  let dir: string;
  let configPath: string;
  let runner: RecordingRunner;
  let lines: string[];
  let errors: string[];
  let exitCode: number;
  let confirm: Mock<(question: string) => Promise<boolean>>;
  let terraform: Partial<TerraformOps>;

  function writeConfig(raw: Record<string, unknown>): void {
    writeFileSync(configPath, JSON.stringify({ terraform: { workingDir: dir }, ...raw }));
  }

  function writeState(): void {
    writeFileSync(join(dir, LAB_STATE_FILE), JSON.stringify({ savedAt: "2026-01-01T00:00:00.000Z", outputs: OUTPUTS }));
  }

  async function run(...args: string[]): Promise<void> {
    const ctx: CliContext = {
      out: { log: (line) => lines.push(line), error: (line) => errors.push(line) },
      env: {},
      confirm,
      createManager: (config, c) =>
        new LabManager(config, { runner, terraform, vms: { restartVM: vi.fn() }, confirm: c.confirm, progress: c.progress }),
      setupLogging: () => null,
      setExitCode: (code) => {
        exitCode = code;
      },
      progress: { silent: true },
    };
    await createProgram(ctx).exitOverride().parseAsync(["--config", configPath, ...args], { from: "user" });
  }

  beforeEach(() => {
    setGlobalLabLogger(new LabLoggerImpl({ subsystem: "s2dlab", transports: [new MemoryTransport()] }));
    dir = mkdtempSync(join(tmpdir(), "s2dlab-cli-"));
    configPath = join(dir, "s2dlab.config.json");
    runner = new RecordingRunner();
    lines = [];
    errors = [];
    exitCode = 0;
    confirm = vi.fn<(question: string) => Promise<boolean>>(async () => false);
    terraform = {};
    writeConfig({ nodes: { adminPassword: "test-password-123" } });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe("config", () => {
    it("reports a valid file", async () => {
      await run("config", "validate");
      expect(lines).toEqual([theme.success(`Configuration is valid (${configPath})`)]);
      expect(exitCode).toBe(0);
    });

    it("lists the problems of an invalid file", async () => {
      writeConfig({ nodes: { count: "two" } });
      await run("config", "validate");

      expect(errors).toEqual([
        theme.error("Configuration has 1 problem(s):"),
        "  - nodes.count: Expected number, received string",
      ]);
      expect(exitCode).toBe(1);
    });

    it("shows the configuration without secrets", async () => {
      await run("config", "show");
      const shown = JSON.parse(lines[0]);
      expect(shown.nodes.adminPassword).toBe("********");
      expect(shown.azure.resourceGroup).toBe("rg-s2d-lab");
    });

    it("writes a default file and refuses to overwrite it", async () => {
      configPath = join(dir, "new.config.json");
      await run("config", "init");
      expect(existsSync(configPath)).toBe(true);
      expect(lines[0]).toBe(theme.success(`Wrote ${configPath}`));

      await run("config", "init");
      expect(errors).toEqual([
        theme.error(`Failed to write configuration: [CONFIG_EXISTS] ${configPath} already exists (use --force to overwrite)`),
      ]);
      expect(exitCode).toBe(1);
    });
  });

  describe("sddl", () => {
    it("grants WMI permissions offline", async () => {
      await run("sddl", "grant", "D:(A;;CC;;;BA)", "--principal", "RM", "--permissions", "Enable,MethodExecute,RemoteAccess", "--inherit");
      expect(lines).toEqual(["D:(A;;CC;;;BA)(A;CI;CCDCWP;;;RM)"]);
    });

    it("keeps a domain-relative alias as written", async () => {
      await run("sddl", "grant", "D:(A;;CC;;;BA)", "--principal", "da", "--permissions", "Enable");
      expect(lines).toEqual(["D:(A;;CC;;;BA)(A;;CC;;;DA)"]);
    });

    it("rejects a principal that is neither a SID nor an alias", async () => {
      await run("sddl", "revoke", "D:(A;;CC;;;BA)", "--principal", "toString");
      expect(errors).toEqual([
        theme.error(
          'Failed to edit SDDL: [UNKNOWN_PRINCIPAL] toString is not a SID or a well-known alias; resolve accounts with "wmi grant"',
        ),
      ]);
    });

    it("revokes explicit entries and keeps inherited ones", async () => {
      await run("sddl", "revoke", "D:(A;CI;CC;;;AU)(A;;WP;;;AU)(A;ID;CC;;;AU)(A;;CC;;;BA)", "--principal", "AU");
      expect(lines).toEqual(["D:(A;ID;CC;;;AU)(A;;CC;;;BA)"]);
    });

    it("explains each entry", async () => {
      await run("sddl", "explain", "D:(A;CI;CCDCWP;;;RM)");
      expect(lines).toEqual([
        "allow  Remote Management Users (S-1-5-32-580): Enable, MethodExecute, RemoteAccess (0x23) [CI]",
      ]);
    });

    it("rejects an unknown permission", async () => {
      await run("sddl", "grant", "D:(A;;CC;;;BA)", "--principal", "RM", "--permissions", "Fly");
      expect(errors).toEqual([theme.error("Failed to edit SDDL: [INVALID_PERMISSIONS] Unknown WMI permission Fly")]);
      expect(exitCode).toBe(1);
    });
  });

  describe("configure", () => {
    it("walks a blueprint in dry-run mode", async () => {
      await run("configure", "--blueprint", "diagnostics", "--node", "s2dlab-node1", "--dry-run");

      expect(lines[0]).toBe(`${theme.info("DRY RUN")}: Diagnostics (1 steps)\n`);
      expect(lines.some((l) => l.startsWith(`\nStatus: ${theme.success("succeeded")}`))).toBe(true);
      expect(runner.calls).toEqual([]);
      expect(exitCode).toBe(0);
    });

    it("fails on an unknown blueprint", async () => {
      await run("configure", "--blueprint", "nope");
      expect(errors).toEqual([theme.error('Configure failed: [UNKNOWN_BLUEPRINT] Unknown blueprint "nope"')]);
      expect(exitCode).toBe(1);
    });

    it("reads blueprint parameters as JSON where they parse", () => {
      expect(parseParam("includeGuests=false")).toEqual({ includeGuests: false });
      expect(parseParam("guests=[\"alma1\"]", { a: 1 })).toEqual({ a: 1, guests: ["alma1"] });
      expect(parseParam("name=alma1")).toEqual({ name: "alma1" });
      expect(() => parseParam("=x")).toThrow('Expected key=value, got "=x"');
    });
  });

  describe("status", () => {
    it("prints every check and the summary", async () => {
      writeState();
      runner.on("collect-node-status", (node) => ({ payload: healthyPayload(node.name) }));

      await run("status");

      expect(lines[0]).toBe(`\ns2dlab-node1 (S2DLAB-NODE1): ${theme.success("pass")}`);
      expect(lines[1]).toBe(`  ${theme.success("✓")} hyperv-feature: Hyper-V installed`);
      expect(lines.at(-1)).toBe(`\nStatus: ${theme.success("pass")} (22 pass, 0 warn, 0 fail)`);
      expect(exitCode).toBe(0);
    });

    it("exits non-zero when a check fails", async () => {
      writeState();
      runner.on("collect-node-status", (node) => ({
        payload: { ...healthyPayload(node.name), features: { "Hyper-V": false, "Failover-Clustering": true } },
      }));

      await run("status", "--json", "--node", "s2dlab-node1");

      const parsed = JSON.parse(lines[0]);
      expect(parsed.summary.status).toBe("fail");
      expect(parsed.reports).toHaveLength(1);
      expect(exitCode).toBe(1);
    });
  });

  describe("tf", () => {
    it("keeps the lab when teardown is not confirmed", async () => {
      await run("tf", "destroy");
      expect(confirm).toHaveBeenCalledWith("Destroy resource group rg-s2d-lab and every lab VM?");
      expect(lines).toEqual([theme.warn("Teardown cancelled")]);
    });

    it("lists terraform validate errors and exits non-zero", async () => {
      terraform = {
        installed: async () => ({ installed: true, version: "1.9.5" }),
        init: async () => ({ success: true, stdout: "", stderr: "", exitCode: 0 }),
        validate: async () => ({
          success: false,
          stdout: "",
          stderr: "",
          exitCode: 1,
          json: {
            valid: false,
            diagnostics: [
              { severity: "warning", summary: "Deprecated attribute" },
              { severity: "error", summary: "Missing required argument", range: { filename: "main.tf", start: { line: 7 } } },
            ],
          },
        }),
      };

      await run("tf", "validate");

      expect(lines).toEqual([theme.warn("  ! Deprecated attribute")]);
      expect(errors).toEqual([
        theme.error("Terraform configuration has 1 error(s):"),
        "  - main.tf:7: Missing required argument",
      ]);
      expect(exitCode).toBe(1);
    });

    it("prints the saved outputs as JSON", async () => {
      writeState();
      await run("tf", "output", "--json");
      expect(JSON.parse(lines[0])).toEqual(OUTPUTS);
    });
  });

  describe("wmi", () => {
    it("grants on the configured namespace of a node", async () => {
      writeState();
      const before = "O:BAG:BAD:(A;CI;CCDCLCSWRPWPRCWD;;;BA)";
      const after = `${before}(A;CI;CCDCWP;;;RM)`;
      runner
        .on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: before } })
        .on("write-wmi-security", { payload: { namespace: "root/cimv2", sddl: after } });

      await run("wmi", "grant", "--node", "s2dlab-node2", "--principal", "RM", "--permissions", "Enable,MethodExecute,RemoteAccess");

      expect(lines.slice(0, 2)).toEqual([
        theme.success("Granted RM on root/cimv2 (s2dlab-node2)"),
        "  Effective: Enable, MethodExecute, RemoteAccess",
      ]);
      expect(runner.calls.map((c) => c.node)).toEqual(["s2dlab-node2", "s2dlab-node2"]);
    });
  });

  describe("blueprints", () => {
    it("lists the built-in blueprints with their parameters", async () => {
      await run("blueprints");
      expect(lines).toContain(`\n  ${theme.info("nested-s2d-lab")}  Nested S2D Lab`);
      expect(lines.some((l) => l.startsWith("    --param includeGuests=<boolean>"))).toBe(true);
    });
  });
});
