/**
 * Lab Orchestration — Built-in Blueprints
 *
 * Templates that turn the lab configuration into execution plans.
 */

import { z } from "zod";
import { formatIssue } from "../config/loader.js";
import { LabError } from "../errors.js";
import type { NodeTarget } from "../types.js";
import type { Blueprint, BlueprintContext, BlueprintParameter, ExecutionPlan, PlanStep } from "./types.js";

// =============================================================================
// Helpers
// =============================================================================

function bp(
  name: string,
  type: BlueprintParameter["type"],
  description: string,
  required = true,
  defaultVal?: unknown,
): BlueprintParameter {
  return { name, type, description, required, default: defaultVal };
}

let planCounter = 0;
function nextPlanId(prefix: string): string {
  return `${prefix}-${Date.now()}-${++planCounter}`;
}

function step(
  id: string,
  type: string,
  params: Record<string, unknown>,
  dependsOn: string[] = [],
  stepName?: string,
  extra: Pick<PlanStep, "condition" | "timeoutMs" | "maxRetries"> = {},
): PlanStep {
  return { id, type, name: stepName ?? id, params, dependsOn, ...extra };
}

function readBlueprintParams<T>(blueprintId: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new LabError(
      `Invalid parameters for blueprint "${blueprintId}": ${parsed.error.issues.map(formatIssue).join("; ")}`,
      "INVALID_BLUEPRINT_PARAMS",
    );
  }
  return parsed.data;
}

/** Nodes named in `names`, or every node when no names are given. */
function selectNodes(context: BlueprintContext, names?: readonly string[]): NodeTarget[] {
  if (!names || names.length === 0) return context.nodes;
  return names.map((name) => {
    const node = context.nodes.find((n) => n.name.toLowerCase() === name.toLowerCase());
    if (!node) {
      throw new LabError(`Unknown node ${name} (lab nodes: ${context.nodes.map((n) => n.name).join(", ")})`, "UNKNOWN_NODE");
    }
    return node;
  });
}

/** Step ID prefix for a node, e.g. `node2` for `s2dlab-node2`. */
function nodeKey(context: BlueprintContext, node: NodeTarget): string {
  return `node${context.nodes.indexOf(node) + 1}`;
}

function guestKey(name: string): string {
  return `guest-${name.toLowerCase()}`;
}

function basePlan(
  blueprint: Pick<Blueprint, "id" | "name" | "description">,
  context: BlueprintContext,
  steps: PlanStep[],
): ExecutionPlan {
  return {
    id: nextPlanId(blueprint.id),
    name: blueprint.name,
    description: blueprint.description,
    blueprintId: blueprint.id,
    steps,
    globalParams: {
      prefix: context.config.azure.prefix,
      resourceGroup: context.config.azure.resourceGroup,
      clusterName: context.config.cluster.name,
    },
    createdAt: new Date().toISOString(),
  };
}

// =============================================================================
// Step Groups
// =============================================================================

/**
 * Firewall, WinRM, CredSSP and WMI grants for one node, chained after
 * `after`. Returns the ID of the last step.
 */
function remotingSteps(context: BlueprintContext, node: NodeTarget, after: string[], steps: PlanStep[]): string {
  const key = nodeKey(context, node);
  const { remoting, wmi } = context.config;

  steps.push(step(`${key}-firewall`, "firewall-rules", { node: node.name }, after, `Open firewall ports on ${node.name}`));
  steps.push(step(`${key}-winrm`, "winrm", { node: node.name }, [`${key}-firewall`], `Configure WinRM on ${node.name}`));
  let last = `${key}-winrm`;

  if (remoting.credSsp) {
    steps.push(step(`${key}-credssp`, "credssp", { node: node.name }, [last], `Configure CredSSP on ${node.name}`));
    last = `${key}-credssp`;
  }

  wmi.grants.forEach((grant, i) => {
    const id = `${key}-wmi-${i + 1}`;
    steps.push(
      step(
        id,
        "wmi-grant",
        {
          node: node.name,
          namespace: wmi.namespace,
          principal: grant.principal,
          permissions: grant.permissions,
          inherit: grant.inherit,
        },
        [last],
        `Grant ${grant.principal} on ${wmi.namespace} (${node.name})`,
      ),
    );
    last = id;
  });

  return last;
}

/**
 * ISO download, host key, then creation and post-install of each guest on
 * the Hyper-V host. Returns the IDs of the final steps.
 */
function guestSteps(context: BlueprintContext, guestNames: readonly string[], after: string[], steps: PlanStep[]): string[] {
  const { guests } = context.config;
  const host = context.nodes[guests.hostNode - 1];
  if (!host) throw new LabError(`Guest host node ${guests.hostNode} does not exist`, "UNKNOWN_NODE");

  const vms =
    guestNames.length === 0
      ? guests.vms
      : guestNames.map((name) => {
          const vm = guests.vms.find((v) => v.name.toLowerCase() === name.toLowerCase());
          if (!vm) throw new LabError(`Unknown guest ${name}`, "UNKNOWN_GUEST");
          return vm;
        });
  if (vms.length === 0) return after;

  // Both guest steps retry internally; an engine retry would multiply the attempts.
  steps.push(step("iso", "download-iso", { node: host.name }, after, `Download guest ISO on ${host.name}`, { maxRetries: 0 }));
  steps.push(step("ssh-key", "guest-ssh-key", { node: host.name }, ["iso"], `Host SSH key on ${host.name}`));

  const finals: string[] = [];
  for (const vm of vms) {
    const key = guestKey(vm.name);
    steps.push(
      step(
        `${key}-create`,
        "guest-create",
        { node: host.name, guest: vm.name, publicKey: "ssh-key.outputs.publicKey" },
        ["ssh-key"],
        `Create guest ${vm.name}`,
      ),
    );
    steps.push(
      step(
        `${key}-postinstall`,
        "guest-postinstall",
        { node: host.name, guest: vm.name, keyPath: "ssh-key.outputs.keyPath" },
        [`${key}-create`],
        `Post-install ${vm.name}`,
        { timeoutMs: 3_600_000, maxRetries: 0 },
      ),
    );
    finals.push(`${key}-postinstall`);
  }
  return finals;
}

function statusSteps(context: BlueprintContext, nodes: readonly NodeTarget[], after: string[], steps: PlanStep[]): void {
  for (const node of nodes) {
    const key = nodeKey(context, node);
    steps.push(step(`${key}-status`, "node-status", { node: node.name }, after, `Status of ${node.name}`));
  }
}

// =============================================================================
// Nested S2D Lab
// =============================================================================

const labParamsSchema = z.object({ includeGuests: z.boolean().default(true) });

export const nestedS2dLabBlueprint: Blueprint = {
  id: "nested-s2d-lab",
  name: "Nested S2D Lab",
  description: "Configure every node, build the cluster with Storage Spaces Direct and a volume, then the nested guests",
  category: "lab",
  parameters: [bp("includeGuests", "boolean", "Create the nested guests from guests.vms", false, true)],

  generate(context, params) {
    const p = readBlueprintParams(nestedS2dLabBlueprint.id, labParamsSchema, params);
    const { config } = context;
    const steps: PlanStep[] = [];
    const nodeTails: string[] = [];

    // 1. Per-node host preparation
    for (const node of context.nodes) {
      const key = nodeKey(context, node);
      steps.push(step(`${key}-features`, "host-features", { node: node.name }, [], `Install features on ${node.name}`));
      steps.push(
        step(`${key}-restart`, "restart-node", { node: node.name }, [`${key}-features`], `Restart ${node.name}`, {
          condition: { stepId: `${key}-features`, check: "output-truthy", outputName: "restartRequired" },
        }),
      );
      steps.push(
        step(`${key}-switch`, "nested-switch", { node: node.name }, [`${key}-features`, `${key}-restart`], `Nested switch on ${node.name}`),
      );
      const remotingTail = remotingSteps(context, node, [`${key}-switch`], steps);
      steps.push(step(`${key}-disks`, "prepare-disks", { node: node.name }, [remotingTail], `Prepare disks on ${node.name}`));
      nodeTails.push(`${key}-disks`);
    }

    // 2. Cluster, S2D, volume
    const first = context.nodes[0];
    if (!first) throw new LabError("The lab has no nodes", "NO_NODES");
    let clusterDeps = nodeTails;
    if (config.cluster.validate) {
      steps.push(step("cluster-validate", "cluster-validate", { node: first.name }, nodeTails, "Validate cluster"));
      clusterDeps = ["cluster-validate"];
    }
    steps.push(step("cluster", "cluster-create", { node: first.name }, clusterDeps, `Create cluster ${config.cluster.name}`));
    steps.push(step("s2d", "s2d-enable", { node: first.name }, ["cluster"], "Enable Storage Spaces Direct"));
    steps.push(
      step(
        "volume",
        "volume-create",
        { node: first.name, poolName: "s2d.outputs.poolName" },
        ["s2d"],
        `Create volume ${config.cluster.volume.friendlyName}`,
      ),
    );

    // 3. Guests
    const tails = p.includeGuests ? guestSteps(context, [], ["volume"], steps) : ["volume"];

    // 4. Final status
    statusSteps(context, context.nodes, tails, steps);

    return basePlan(nestedS2dLabBlueprint, context, steps);
  },
};

// =============================================================================
// Remoting
// =============================================================================

const nodesParamsSchema = z.object({ nodes: z.array(z.string().min(1)).default([]) });

export const remotingBlueprint: Blueprint = {
  id: "remoting",
  name: "Remoting",
  description: "Firewall rules, WinRM, CredSSP and WMI namespace permissions on the selected nodes",
  category: "remoting",
  parameters: [bp("nodes", "array", "Node names (default: all nodes)", false, [])],

  generate(context, params) {
    const p = readBlueprintParams(remotingBlueprint.id, nodesParamsSchema, params);
    const steps: PlanStep[] = [];
    for (const node of selectNodes(context, p.nodes)) {
      remotingSteps(context, node, [], steps);
    }
    return basePlan(remotingBlueprint, context, steps);
  },
};

// =============================================================================
// Diagnostics
// =============================================================================

export const diagnosticsBlueprint: Blueprint = {
  id: "diagnostics",
  name: "Diagnostics",
  description: "Collect and evaluate the status of the selected nodes",
  category: "diagnostics",
  parameters: [bp("nodes", "array", "Node names (default: all nodes)", false, [])],

  generate(context, params) {
    const p = readBlueprintParams(diagnosticsBlueprint.id, nodesParamsSchema, params);
    const steps: PlanStep[] = [];
    statusSteps(context, selectNodes(context, p.nodes), [], steps);
    return basePlan(diagnosticsBlueprint, context, steps);
  },
};

// =============================================================================
// Guests
// =============================================================================

const guestsParamsSchema = z.object({ guests: z.array(z.string().min(1)).default([]) });

export const guestsBlueprint: Blueprint = {
  id: "guests",
  name: "Nested Guests",
  description: "Download the ISO, create the host SSH key, then create and post-install the nested guests",
  category: "guests",
  parameters: [bp("guests", "array", "Guest names (default: all of guests.vms)", false, [])],

  generate(context, params) {
    const p = readBlueprintParams(guestsBlueprint.id, guestsParamsSchema, params);
    if (context.config.guests.vms.length === 0) {
      throw new LabError("No guests are configured under guests.vms", "NO_GUESTS");
    }
    const steps: PlanStep[] = [];
    guestSteps(context, p.guests, [], steps);
    return basePlan(guestsBlueprint, context, steps);
  },
};

// =============================================================================
// Blueprint Registry
// =============================================================================

export const BUILTIN_BLUEPRINTS: Blueprint[] = [nestedS2dLabBlueprint, remotingBlueprint, diagnosticsBlueprint, guestsBlueprint];

const blueprintMap = new Map<string, Blueprint>(BUILTIN_BLUEPRINTS.map((b) => [b.id, b]));

export function getBlueprint(id: string): Blueprint | undefined {
  return blueprintMap.get(id);
}

/** Available blueprints, custom ones included. */
export function listBlueprints(): Array<{ id: string; name: string; description: string; category: string }> {
  return [...blueprintMap.values()].map((b) => ({
    id: b.id,
    name: b.name,
    description: b.description,
    category: b.category,
  }));
}

/** Register a custom blueprint at runtime. */
export function registerBlueprint(blueprint: Blueprint): void {
  blueprintMap.set(blueprint.id, blueprint);
}
