import { beforeEach, describe, expect, it } from "vitest";
import { WmiSecurityManager } from "./manager.js";
import { RecordingRunner } from "../remote/index.js";
import { LabLoggerImpl, MemoryTransport, setGlobalLabLogger } from "../logging/index.js";
import { RemoteCommandError } from "../errors.js";
import type { NodeTarget } from "../types.js";

const node: NodeTarget = { name: "s2dlab-node1", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.10" };

const CIMV2 = "O:BAG:BAD:(A;CI;CCDCLCSWRPWPRCWD;;;BA)(A;CI;CCDCRP;;;NS)";
const WITH_RM = "O:BAG:BAD:(A;CI;CCDCLCSWRPWPRCWD;;;BA)(A;CI;CCDCRP;;;NS)(A;CI;CCDCWP;;;RM)";

function writtenSddl(runner: RecordingRunner): string | undefined {
  const call = runner.calls.find((c) => c.script.name === "write-wmi-security");
  const line = call?.script.lines.find((l) => l.includes("SDDLToBinarySD"));
  return line ? /SDDLToBinarySD\('([^']*)'\)/.exec(line)?.[1] : undefined;
}

describe("WmiSecurityManager", () => {
  let runner: RecordingRunner;
  let manager: WmiSecurityManager;

  beforeEach(() => {
    setGlobalLabLogger(new LabLoggerImpl({ subsystem: "s2dlab", transports: [new MemoryTransport()] }));
    runner = new RecordingRunner();
    manager = new WmiSecurityManager(runner);
  });

  describe("resolveSid", () => {
    it("uses the alias table for well-known accounts", async () => {
      expect(await manager.resolveSid(node, "RM")).toBe("RM");
      expect(await manager.resolveSid(node, "S-1-5-32-544")).toBe("BA");
      expect(runner.calls).toHaveLength(0);
    });

    it("asks the node for other accounts", async () => {
      runner.on("resolve-account-sid", { payload: { principal: "LAB\\svc-monitor", sid: "S-1-5-21-1-2-3-1105" } });

      expect(await manager.resolveSid(node, "LAB\\svc-monitor")).toBe("S-1-5-21-1-2-3-1105");
      expect(runner.scriptsRun()).toEqual(["resolve-account-sid"]);
    });
  });

  describe("grant", () => {
    it("adds an allow ACE and writes the new descriptor", async () => {
      runner
        .on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: CIMV2 } })
        .on("write-wmi-security", { payload: { namespace: "root/cimv2", sddl: WITH_RM } });

      const result = await manager.grant(node, "root/cimv2", "RM", ["Enable", "MethodExecute", "RemoteAccess"]);

      expect(writtenSddl(runner)).toBe(WITH_RM);
      expect(result).toEqual({
        node: "s2dlab-node1",
        namespace: "root/cimv2",
        principal: "RM",
        sid: "RM",
        sddlBefore: CIMV2,
        sddlAfter: WITH_RM,
        changed: true,
        effectiveMask: 0x23,
      });
    });

    it("does not write when the rights are already held", async () => {
      runner.on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: WITH_RM } });

      const result = await manager.grant(node, "root/cimv2", "RM", ["Enable", "RemoteAccess"]);

      expect(result.changed).toBe(false);
      expect(result.sddlAfter).toBe(WITH_RM);
      expect(runner.scriptsRun()).toEqual(["read-wmi-security"]);
    });

    it("writes a non-inheriting ACE when asked", async () => {
      runner
        .on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: CIMV2 } })
        .on("write-wmi-security", { payload: { namespace: "root/cimv2", sddl: CIMV2 } });

      await manager.grant(node, "root/cimv2", "RM", ["Enable"], { inherit: false });

      expect(writtenSddl(runner)).toBe(`${CIMV2}(A;;CC;;;RM)`);
    });

    it("rejects an empty permission list", async () => {
      await expect(manager.grant(node, "root/cimv2", "RM", [])).rejects.toThrow(RangeError);
      expect(runner.calls).toHaveLength(0);
    });

    it("surfaces a failed read", async () => {
      runner.on("read-wmi-security", RecordingRunner.failure("Access denied"));

      await expect(manager.grant(node, "root/cimv2", "RM", ["Enable"])).rejects.toBeInstanceOf(RemoteCommandError);
    });
  });

  describe("revoke", () => {
    it("removes the explicit allow ACE", async () => {
      runner
        .on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: WITH_RM } })
        .on("write-wmi-security", { payload: { namespace: "root/cimv2", sddl: CIMV2 } });

      const result = await manager.revoke(node, "root/cimv2", "RM");

      expect(writtenSddl(runner)).toBe(CIMV2);
      expect(result.changed).toBe(true);
      expect(result.effectiveMask).toBe(0);
    });

    it("is a no-op when the principal has no entry", async () => {
      runner.on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: CIMV2 } });

      const result = await manager.revoke(node, "root/cimv2", "RM");

      expect(result.changed).toBe(false);
      expect(runner.scriptsRun()).toEqual(["read-wmi-security"]);
    });
  });

  describe("show", () => {
    it("decodes the ACEs with WMI permission names", async () => {
      runner.on("read-wmi-security", { payload: { namespace: "root/cimv2", sddl: WITH_RM } });

      const view = await manager.show(node, "root/cimv2");

      expect(view.sddl).toBe(WITH_RM);
      expect(view.aces).toHaveLength(3);
      expect(view.aces[2]).toMatchObject({
        type: "allow",
        sid: "S-1-5-32-580",
        principal: "Remote Management Users",
        wmiPermissions: ["Enable", "MethodExecute", "RemoteAccess"],
        inherited: false,
      });
    });
  });
});
