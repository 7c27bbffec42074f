/**
 * Node Status Report
 *
 * Turns the raw `collect-node-status` payload into pass / warn / fail checks.
 * A missing optional role (no cluster yet, no volume yet) is a warning; a
 * broken one is a failure.
 */

import type { LabConfig } from "../config/schema.js";
import {
  collectNodeStatus,
  firewallRulesForPorts,
  nodeStatusPayloadSchema,
  type NodeStatusPayload,
} from "../powershell/index.js";
import { runRecipe, type CommandRunner } from "../remote/index.js";
import type { NodeTarget } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CheckStatus = "pass" | "warn" | "fail";

export type StatusCheckId =
  | "hyperv-feature"
  | "clustering-feature"
  | "vm-switch"
  | "nat"
  | "winrm-listener"
  | "credssp-server"
  | "firewall-rules"
  | "cluster"
  | "s2d"
  | "pool-health"
  | "volume";

export type StatusCheck = {
  id: StatusCheckId;
  status: CheckStatus;
  message: string;
};

export type NodeStatusReport = {
  node: string;
  computerName: string;
  collectedAt: string;
  /** Worst status across all checks. */
  status: CheckStatus;
  checks: StatusCheck[];
};

export type ReportExpectations = {
  switchName: string;
  natName: string;
  firewallRules: readonly string[];
  clusterName: string;
  clusterNodes: number;
  volumeName: string;
};

export type StatusSummary = {
  status: CheckStatus;
  counts: Record<CheckStatus, number>;
  nodes: Array<{ node: string; status: CheckStatus }>;
  /** `node: check: message` for every failed check. */
  failures: string[];
  warnings: string[];
};

// =============================================================================
// Checks
// =============================================================================

const SEVERITY: Record<CheckStatus, number> = { pass: 0, warn: 1, fail: 2 };

export function worstStatus(statuses: readonly CheckStatus[]): CheckStatus {
  let worst: CheckStatus = "pass";
  for (const status of statuses) {
    if (SEVERITY[status] > SEVERITY[worst]) worst = status;
  }
  return worst;
}

function check(id: StatusCheckId, status: CheckStatus, message: string): StatusCheck {
  return { id, status, message };
}

function featureCheck(id: StatusCheckId, payload: NodeStatusPayload, feature: string): StatusCheck {
  return payload.features[feature]
    ? check(id, "pass", `${feature} installed`)
    : check(id, "fail", `${feature} is not installed`);
}

function clusterCheck(payload: NodeStatusPayload, expected: ReportExpectations): StatusCheck {
  const cluster = payload.cluster;
  if (!cluster) return check("cluster", "warn", "node is not a cluster member");
  if (cluster.name.toLowerCase() !== expected.clusterName.toLowerCase()) {
    return check("cluster", "fail", `member of ${cluster.name}, expected ${expected.clusterName}`);
  }

  const up = cluster.nodes.filter((n) => n.state === "Up").length;
  const summary = `cluster ${cluster.name}, ${up}/${expected.clusterNodes} nodes up`;
  if (up < expected.clusterNodes) {
    const down = cluster.nodes.filter((n) => n.state !== "Up").map((n) => `${n.name} ${n.state}`);
    return check("cluster", "warn", down.length > 0 ? `${summary} (${down.join(", ")})` : summary);
  }
  return check("cluster", "pass", summary);
}

function poolCheck(payload: NodeStatusPayload): StatusCheck {
  if (payload.pools.length === 0) return check("pool-health", "warn", "no storage pool");
  const unhealthy = payload.pools.filter((p) => p.health !== "Healthy");
  if (unhealthy.length > 0) {
    return check(
      "pool-health",
      "fail",
      unhealthy.map((p) => `${p.name} is ${p.health} (${p.operational})`).join(", "),
    );
  }
  return check("pool-health", "pass", payload.pools.map((p) => `${p.name} healthy`).join(", "));
}

function volumeCheck(payload: NodeStatusPayload, expected: ReportExpectations): StatusCheck {
  const volume = payload.volumes.find((v) => v.name === expected.volumeName);
  if (!volume) return check("volume", "warn", `volume ${expected.volumeName} not found`);
  if (volume.health !== "Healthy") return check("volume", "fail", `${volume.name} is ${volume.health}`);
  return check("volume", "pass", `${volume.name} healthy, ${volume.sizeGb} GB`);
}

/**
 * Evaluate a status payload against what the lab configuration expects.
 */
export function buildNodeStatusReport(
  node: string,
  payload: NodeStatusPayload,
  expected: ReportExpectations,
  now: Date = new Date(),
): NodeStatusReport {
  const rules = new Map(payload.firewallRules.map((r) => [r.name, r.enabled]));
  const missingRules = expected.firewallRules.filter((name) => rules.get(name) !== true);

  const checks: StatusCheck[] = [
    featureCheck("hyperv-feature", payload, "Hyper-V"),
    featureCheck("clustering-feature", payload, "Failover-Clustering"),
    payload.vmSwitch
      ? check("vm-switch", "pass", `switch ${expected.switchName} present`)
      : check("vm-switch", "fail", `switch ${expected.switchName} missing`),
    payload.nat
      ? check("nat", "pass", `NAT ${expected.natName} present`)
      : check("nat", "fail", `NAT ${expected.natName} missing`),
    payload.winrmListeners.length > 0
      ? check("winrm-listener", "pass", `listeners: ${payload.winrmListeners.join(", ")}`)
      : check("winrm-listener", "fail", "no WinRM listener"),
    payload.credSspServer
      ? check("credssp-server", "pass", "CredSSP server role enabled")
      : check("credssp-server", "warn", "CredSSP server role disabled"),
    missingRules.length === 0
      ? check("firewall-rules", "pass", `${expected.firewallRules.length} rule(s) enabled`)
      : check("firewall-rules", "warn", `missing or disabled: ${missingRules.join(", ")}`),
    clusterCheck(payload, expected),
    payload.s2dState === null
      ? check("s2d", "warn", "Storage Spaces Direct not enabled")
      : payload.s2dState === "Enabled"
        ? check("s2d", "pass", "Storage Spaces Direct enabled")
        : check("s2d", "warn", `Storage Spaces Direct is ${payload.s2dState}`),
    poolCheck(payload),
    volumeCheck(payload, expected),
  ];

  return {
    node,
    computerName: payload.computerName,
    collectedAt: now.toISOString(),
    status: worstStatus(checks.map((c) => c.status)),
    checks,
  };
}

export function summarizeReports(reports: readonly NodeStatusReport[]): StatusSummary {
  const counts: Record<CheckStatus, number> = { pass: 0, warn: 0, fail: 0 };
  const failures: string[] = [];
  const warnings: string[] = [];

  for (const report of reports) {
    for (const c of report.checks) {
      counts[c.status]++;
      if (c.status === "fail") failures.push(`${report.node}: ${c.id}: ${c.message}`);
      else if (c.status === "warn") warnings.push(`${report.node}: ${c.id}: ${c.message}`);
    }
  }

  return {
    status: worstStatus(reports.map((r) => r.status)),
    counts,
    nodes: reports.map((r) => ({ node: r.node, status: r.status })),
    failures,
    warnings,
  };
}

// =============================================================================
// Collection
// =============================================================================

export function reportExpectations(config: LabConfig): ReportExpectations {
  return {
    switchName: config.nested.switchName,
    natName: config.nested.natName,
    firewallRules: firewallRulesForPorts(config.remoting.firewallPorts).map((r) => r.name),
    clusterName: config.cluster.name,
    clusterNodes: config.nodes.count,
    volumeName: config.cluster.volume.friendlyName,
  };
}

/**
 * Run the status check on `node` and evaluate it.
 */
export async function collectNodeReport(
  runner: CommandRunner,
  node: NodeTarget,
  expected: ReportExpectations,
): Promise<NodeStatusReport> {
  const payload = await runRecipe(
    runner,
    node,
    collectNodeStatus({
      switchName: expected.switchName,
      natName: expected.natName,
      firewallRules: expected.firewallRules,
      volumeName: expected.volumeName,
    }),
    nodeStatusPayloadSchema,
  );
  return buildNodeStatusReport(node.name, payload, expected);
}
