import { describe, expect, it } from "vitest";
import {
  buildNodeStatusReport,
  collectNodeReport,
  reportExpectations,
  summarizeReports,
  worstStatus,
  type ReportExpectations,
} from "./report.js";
import { parseLabConfig } from "../config/loader.js";
import { RecordingRunner } from "../remote/index.js";
import type { NodeStatusPayload } from "../powershell/index.js";
import type { NodeTarget } from "../types.js";

const expected: ReportExpectations = {
  switchName: "NestedSwitch",
  natName: "NestedNAT",
  firewallRules: ["S2DLab-WinRM-HTTP-5985", "S2DLab-SMB-445"],
  clusterName: "s2dlab-clu",
  clusterNodes: 2,
  volumeName: "LabVolume",
};

function healthyPayload(): NodeStatusPayload {
  return {
    computerName: "S2DLAB-NODE1",
    features: { "Hyper-V": true, "Failover-Clustering": true },
    vmSwitch: true,
    nat: true,
    winrmListeners: ["HTTP"],
    credSspServer: true,
    firewallRules: [
      { name: "S2DLab-WinRM-HTTP-5985", enabled: true },
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

const at = new Date("2026-01-02T03:04:05.000Z");

describe("buildNodeStatusReport", () => {
  it("passes every check on a finished node", () => {
    const report = buildNodeStatusReport("s2dlab-node1", healthyPayload(), expected, at);

    expect(report.status).toBe("pass");
    expect(report.collectedAt).toBe("2026-01-02T03:04:05.000Z");
    expect(report.checks.map((c) => c.id)).toEqual([
      "hyperv-feature",
      "clustering-feature",
      "vm-switch",
      "nat",
      "winrm-listener",
      "credssp-server",
      "firewall-rules",
      "cluster",
      "s2d",
      "pool-health",
      "volume",
    ]);
    expect(report.checks.find((c) => c.id === "cluster")?.message).toBe("cluster s2dlab-clu, 2/2 nodes up");
    expect(report.checks.find((c) => c.id === "volume")?.message).toBe("LabVolume healthy, 200 GB");
  });

  it("warns before the cluster exists", () => {
    const payload = { ...healthyPayload(), cluster: null, s2dState: null, pools: [], volumes: [] };
    const report = buildNodeStatusReport("s2dlab-node1", payload, expected, at);

    expect(report.status).toBe("warn");
    expect(report.checks.filter((c) => c.status === "warn").map((c) => c.message)).toEqual([
      "node is not a cluster member",
      "Storage Spaces Direct not enabled",
      "no storage pool",
      "volume LabVolume not found",
    ]);
  });

  it("fails on a missing feature and an unhealthy pool", () => {
    const payload = {
      ...healthyPayload(),
      features: { "Hyper-V": false, "Failover-Clustering": true },
      pools: [{ name: "S2D on s2dlab-clu", health: "Warning", operational: "Degraded" }],
    };
    const report = buildNodeStatusReport("s2dlab-node1", payload, expected, at);

    expect(report.status).toBe("fail");
    expect(report.checks[0]).toEqual({ id: "hyperv-feature", status: "fail", message: "Hyper-V is not installed" });
    expect(report.checks.find((c) => c.id === "pool-health")?.message).toBe(
      "S2D on s2dlab-clu is Warning (Degraded)",
    );
  });

  it("lists disabled firewall rules and down cluster nodes", () => {
    const payload = {
      ...healthyPayload(),
      firewallRules: [
        { name: "S2DLab-WinRM-HTTP-5985", enabled: true },
        { name: "S2DLab-SMB-445", enabled: false },
      ],
      cluster: {
        name: "s2dlab-clu",
        nodes: [
          { name: "s2dlab-node1", state: "Up" },
          { name: "s2dlab-node2", state: "Down" },
        ],
      },
    };
    const report = buildNodeStatusReport("s2dlab-node1", payload, expected, at);

    expect(report.checks.find((c) => c.id === "firewall-rules")).toEqual({
      id: "firewall-rules",
      status: "warn",
      message: "missing or disabled: S2DLab-SMB-445",
    });
    expect(report.checks.find((c) => c.id === "cluster")?.message).toBe(
      "cluster s2dlab-clu, 1/2 nodes up (s2dlab-node2 Down)",
    );
  });

  it("fails when the node belongs to another cluster", () => {
    const payload = { ...healthyPayload(), cluster: { name: "other", nodes: [] } };
    const report = buildNodeStatusReport("s2dlab-node1", payload, expected, at);

    expect(report.checks.find((c) => c.id === "cluster")).toEqual({
      id: "cluster",
      status: "fail",
      message: "member of other, expected s2dlab-clu",
    });
  });
});

describe("summarizeReports", () => {
  it("counts checks and collects failures per node", () => {
    const good = buildNodeStatusReport("s2dlab-node1", healthyPayload(), expected, at);
    const bad = buildNodeStatusReport("s2dlab-node2", { ...healthyPayload(), nat: false }, expected, at);

    const summary = summarizeReports([good, bad]);

    expect(summary.status).toBe("fail");
    expect(summary.counts).toEqual({ pass: 21, warn: 0, fail: 1 });
    expect(summary.nodes).toEqual([
      { node: "s2dlab-node1", status: "pass" },
      { node: "s2dlab-node2", status: "fail" },
    ]);
    expect(summary.failures).toEqual(["s2dlab-node2: nat: NAT NestedNAT missing"]);
  });

  it("passes an empty list", () => {
    expect(summarizeReports([]).status).toBe("pass");
    expect(worstStatus(["pass", "warn", "pass"])).toBe("warn");
  });
});

describe("collectNodeReport", () => {
  it("runs the status check and evaluates it", async () => {
    const node: NodeTarget = { name: "s2dlab-node1", resourceGroup: "rg-s2d-lab", privateIp: "10.10.1.10" };
    const runner = new RecordingRunner().on("collect-node-status", { payload: healthyPayload() });
    const config = parseLabConfig({});

    const report = await collectNodeReport(runner, node, reportExpectations(config));

    expect(report.status).toBe("warn");
    expect(report.checks.find((c) => c.id === "firewall-rules")?.message).toBe(
      "missing or disabled: S2DLab-WinRM-HTTPS-5986",
    );
    expect(runner.scriptsRun()).toEqual(["collect-node-status"]);
  });

  it("derives expectations from the configuration", () => {
    const config = parseLabConfig({});
    expect(reportExpectations(config)).toEqual({
      switchName: "NestedSwitch",
      natName: "NestedNAT",
      firewallRules: ["S2DLab-WinRM-HTTP-5985", "S2DLab-WinRM-HTTPS-5986", "S2DLab-SMB-445"],
      clusterName: "s2dlab-clu",
      clusterNodes: 2,
      volumeName: "LabVolume",
    });
  });
});
