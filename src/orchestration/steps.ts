/**
 * Lab Orchestration — Built-in Step Definitions
 *
 * Registers the lab step types. Each step runs one recipe (or a short
 * sequence of them) against a single node.
 */

import { z, type ZodType, type ZodTypeDef } from "zod";
import type { LabConfig } from "../config/schema.js";
import { formatIssue } from "../config/loader.js";
import { WMI_PERMISSION_NAMES } from "../config/schema.js";
import { collectNodeReport, reportExpectations } from "../diagnostics/report.js";
import { LabError, StepExecutionError } from "../errors.js";
import { findGuest, renderKickstart } from "../guests/kickstart.js";
import { parsePostInstallProgress, POSTINSTALL_COMPLETE, renderPostInstall } from "../guests/postinstall.js";
import {
  DEFAULT_HOST_FEATURES,
  DEFAULT_HOST_KEY_PATH,
  configureCredSsp,
  configureWinRm,
  createCluster,
  createClusterResultSchema,
  createNestedGuest,
  createNestedSwitch,
  createVolume,
  createVolumeResultSchema,
  credSspResultSchema,
  downloadFile,
  downloadResultSchema,
  enableS2d,
  enableS2dResultSchema,
  ensureFirewallRules,
  ensureHostSshKey,
  firewallResultSchema,
  firewallRulesForPorts,
  guestShellResultSchema,
  hostFeaturesResultSchema,
  hostSshKeyResultSchema,
  installHostFeatures,
  nestedGuestResultSchema,
  nestedSwitchResultSchema,
  prepareDisksResultSchema,
  prepareS2dDisks,
  runGuestShell,
  validateCluster,
  validateClusterResultSchema,
  winRmResultSchema,
} from "../powershell/index.js";
import { runRecipe } from "../remote/payload.js";
import type { CommandRunner } from "../remote/types.js";
import { formatErrorMessage, retryFixed } from "../retry.js";
import type { NodeTarget } from "../types.js";
import type { LabVMManager } from "../vms/manager.js";
import type { WmiSecurityManager } from "../wmi/manager.js";
import { registerStepType } from "./registry.js";
import type { StepContext, StepHandler, StepOutputDef, StepParameterDef, StepTypeDefinition, StepValueType } from "./types.js";

// =============================================================================
// Services
// =============================================================================

/** What the lab steps need at run time, resolved lazily per call. */
export type LabStepServices = {
  config: LabConfig;
  nodes: NodeTarget[];
  runner: CommandRunner;
  vms: Pick<LabVMManager, "restartVM">;
  wmi: WmiSecurityManager;
};

type ServicesAccessor = () => LabStepServices;

// =============================================================================
// Helpers
// =============================================================================

function p(name: string, type: StepValueType, description: string, required = true, defaultVal?: unknown): StepParameterDef {
  return { name, type, description, required, default: defaultVal };
}

function o(name: string, type: StepValueType, description: string): StepOutputDef {
  return { name, type, description };
}

/** Validate resolved params against a step's schema. */
function readParams<T>(ctx: StepContext, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const parsed = schema.safeParse(ctx.params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StepExecutionError(ctx.stepId, `invalid params: ${issue ? formatIssue(issue) : "unknown issue"}`);
  }
  return parsed.data;
}

function findNode(services: LabStepServices, name: string): NodeTarget {
  const node = services.nodes.find((n) => n.name.toLowerCase() === name.toLowerCase());
  if (!node) {
    const known = services.nodes.map((n) => n.name).join(", ") || "none";
    throw new LabError(`Unknown node ${name} (lab nodes: ${known})`, "UNKNOWN_NODE");
  }
  return node;
}

function otherNodes(services: LabStepServices, node: NodeTarget): NodeTarget[] {
  return services.nodes.filter((n) => n.name !== node.name);
}

const nodeParams = z.object({ node: z.string().min(1) });

/** A handler whose params are just `node`, running one recipe. */
function recipeHandler<T extends Record<string, unknown>>(
  getServices: ServicesAccessor,
  run: (services: LabStepServices, node: NodeTarget, ctx: StepContext) => Promise<T>,
): StepHandler {
  return {
    async execute(ctx) {
      const services = getServices();
      const { node } = readParams(ctx, nodeParams);
      return run(services, findNode(services, node), ctx);
    },
  };
}

/** Outputs for handlers registered without services. */
function dryRunHandler(outputs: Record<string, unknown>): StepHandler {
  return {
    execute: async () => ({ ...outputs }),
  };
}

// =============================================================================
// Host Steps
// =============================================================================

const hostFeaturesDef: StepTypeDefinition = {
  id: "host-features",
  label: "Install Host Features",
  description: "Install Hyper-V, Failover Clustering and their management tools",
  category: "host",
  parameters: [
    p("node", "string", "Lab node name"),
    p("features", "array", "Windows feature names", false, DEFAULT_HOST_FEATURES),
  ],
  outputs: [
    o("installed", "array", "Features installed by this run"),
    o("restartRequired", "boolean", "Whether the node must restart to finish"),
    o("changed", "boolean", "Whether anything was installed"),
  ],
  estimatedDurationMs: 600_000,
};

function hostFeaturesHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), features: z.array(z.string().min(1)).min(1) });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const result = await runRecipe(services.runner, node, installHostFeatures(params.features), hostFeaturesResultSchema);
      if (result.installed.length > 0) ctx.log.info(`Installed ${result.installed.join(", ")}`);
      return { ...result };
    },
  };
}

const restartNodeDef: StepTypeDefinition = {
  id: "restart-node",
  label: "Restart Node",
  description: "Restart the Azure VM and wait until it is running again",
  category: "host",
  parameters: [
    p("node", "string", "Lab node name"),
    p("timeoutMs", "number", "How long to wait for the VM to come back", false, 600_000),
  ],
  outputs: [o("restarted", "boolean", "Always true on success")],
  estimatedDurationMs: 180_000,
};

function restartNodeHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), timeoutMs: z.number().int().positive() });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const result = await services.vms.restartVM(node.resourceGroup, node.name, { timeoutMs: params.timeoutMs });
      if (!result.success) {
        throw new StepExecutionError(ctx.stepId, result.error ?? `restart of ${node.name} failed`);
      }
      return { restarted: true };
    },
  };
}

// =============================================================================
// Network Steps
// =============================================================================

const nestedSwitchDef: StepTypeDefinition = {
  id: "nested-switch",
  label: "Create Nested Switch",
  description: "Create the internal VM switch, its gateway address and the NAT for nested guests",
  category: "network",
  parameters: [p("node", "string", "Lab node name")],
  outputs: [
    o("created", "array", "Objects created by this run"),
    o("changed", "boolean", "Whether anything was created"),
  ],
  estimatedDurationMs: 30_000,
};

function nestedSwitchHandler(getServices: ServicesAccessor): StepHandler {
  return recipeHandler(getServices, async (services, node) => {
    const { nested } = services.config;
    const result = await runRecipe(
      services.runner,
      node,
      createNestedSwitch({
        switchName: nested.switchName,
        natName: nested.natName,
        natPrefix: nested.natPrefix,
        gatewayAddress: nested.gatewayAddress,
      }),
      nestedSwitchResultSchema,
    );
    return { ...result };
  });
}

const firewallRulesDef: StepTypeDefinition = {
  id: "firewall-rules",
  label: "Open Firewall Ports",
  description: "Create inbound allow rules for the lab ports and enable the remoting rule groups",
  category: "network",
  parameters: [
    p("node", "string", "Lab node name"),
    p("ports", "array", "TCP ports to open (defaults to remoting.firewallPorts)", false),
  ],
  outputs: [
    o("created", "array", "Rules created by this run"),
    o("enabledGroups", "array", "Rule groups that had disabled rules"),
    o("changed", "boolean", "Whether anything changed"),
  ],
  estimatedDurationMs: 20_000,
};

function firewallRulesHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({
    node: z.string().min(1),
    ports: z.array(z.number().int().min(1).max(65535)).optional(),
  });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const rules = firewallRulesForPorts(params.ports ?? services.config.remoting.firewallPorts);
      const result = await runRecipe(services.runner, node, ensureFirewallRules(rules), firewallResultSchema);
      return { ...result };
    },
  };
}

// =============================================================================
// Remoting Steps
// =============================================================================

const winrmDef: StepTypeDefinition = {
  id: "winrm",
  label: "Configure WinRM",
  description: "Start WinRM, create listeners and set TrustedHosts",
  category: "remoting",
  parameters: [p("node", "string", "Lab node name")],
  outputs: [
    o("listeners", "array", "Listener transports after the run"),
    o("updated", "array", "Settings changed by this run"),
    o("changed", "boolean", "Whether anything changed"),
  ],
  estimatedDurationMs: 20_000,
};

function winrmHandler(getServices: ServicesAccessor): StepHandler {
  return recipeHandler(getServices, async (services, node) => {
    const { remoting } = services.config;
    const trustedHosts =
      remoting.trustedHosts.length > 0 ? remoting.trustedHosts : otherNodes(services, node).flatMap((n) => [n.name, n.privateIp]);
    const result = await runRecipe(
      services.runner,
      node,
      configureWinRm({ httpsListener: remoting.httpsListener, trustedHosts }),
      winRmResultSchema,
    );
    return { ...result };
  });
}

const credsspDef: StepTypeDefinition = {
  id: "credssp",
  label: "Configure CredSSP",
  description: "Enable the CredSSP server role and delegation to the other lab nodes",
  category: "remoting",
  parameters: [
    p("node", "string", "Lab node name"),
    p("ntlmOnly", "boolean", "Also allow delegation with NTLM only (workgroup nodes)", false, true),
  ],
  outputs: [
    o("updated", "array", "Settings changed by this run"),
    o("changed", "boolean", "Whether anything changed"),
  ],
  estimatedDurationMs: 20_000,
};

function credsspHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), ntlmOnly: z.boolean() });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const delegateTo = otherNodes(services, node).map((n) => n.name);
      const result = await runRecipe(
        services.runner,
        node,
        configureCredSsp({ delegateTo, ntlmOnly: params.ntlmOnly }),
        credSspResultSchema,
      );
      return { ...result };
    },
  };
}

// =============================================================================
// Security Steps
// =============================================================================

const wmiGrantDef: StepTypeDefinition = {
  id: "wmi-grant",
  label: "Grant WMI Namespace Access",
  description: "Add or widen an allow entry on a WMI namespace security descriptor",
  category: "security",
  parameters: [
    p("node", "string", "Lab node name"),
    p("namespace", "string", "WMI namespace (defaults to wmi.namespace)", false),
    p("principal", "string", "Account, group or SID alias"),
    p("permissions", "array", "WMI permission names"),
    p("inherit", "boolean", "Apply to subnamespaces", false, true),
  ],
  outputs: [
    o("sid", "string", "SID written into the descriptor"),
    o("sddlBefore", "string", "Descriptor before the edit"),
    o("sddlAfter", "string", "Descriptor after the edit"),
    o("effectiveMask", "number", "Allowed access mask of the principal after the edit"),
    o("changed", "boolean", "Whether the descriptor was rewritten"),
  ],
  estimatedDurationMs: 15_000,
};

function wmiGrantHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({
    node: z.string().min(1),
    namespace: z.string().min(1).optional(),
    principal: z.string().min(1),
    permissions: z.array(z.enum(WMI_PERMISSION_NAMES)).min(1),
    inherit: z.boolean(),
  });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const result = await services.wmi.grant(
        node,
        params.namespace ?? services.config.wmi.namespace,
        params.principal,
        params.permissions,
        { inherit: params.inherit },
      );
      return {
        sid: result.sid,
        sddlBefore: result.sddlBefore,
        sddlAfter: result.sddlAfter,
        effectiveMask: result.effectiveMask,
        changed: result.changed,
      };
    },
  };
}

// =============================================================================
// Storage Steps
// =============================================================================

const prepareDisksDef: StepTypeDefinition = {
  id: "prepare-disks",
  label: "Prepare S2D Disks",
  description: "Bring data disks online and check that enough of them can be pooled",
  category: "storage",
  parameters: [
    p("node", "string", "Lab node name"),
    p("expected", "number", "Poolable disks required (defaults to nodes.dataDisks.count)", false),
  ],
  outputs: [
    o("poolable", "number", "Disks that can join a pool"),
    o("pooled", "boolean", "Whether an S2D pool already exists"),
    o("onlined", "number", "Disks brought online"),
    o("changed", "boolean", "Whether any disk was brought online"),
  ],
  estimatedDurationMs: 20_000,
};

function prepareDisksHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), expected: z.number().int().min(1).optional() });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const expected = params.expected ?? services.config.nodes.dataDisks.count;
      const result = await runRecipe(services.runner, node, prepareS2dDisks({ expected }), prepareDisksResultSchema);
      return { ...result };
    },
  };
}

const downloadIsoDef: StepTypeDefinition = {
  id: "download-iso",
  label: "Download Guest ISO",
  description: "Download the nested guest installation ISO onto the Hyper-V host, with retries",
  category: "storage",
  parameters: [
    p("node", "string", "Lab node name"),
    p("url", "string", "ISO URL (defaults to guests.isoUrl)", false),
    p("destination", "string", "Path on the node (defaults to guests.isoPath)", false),
  ],
  outputs: [
    o("path", "string", "Path of the ISO on the node"),
    o("bytes", "number", "File size"),
    o("attempts", "number", "Attempts used"),
    o("changed", "boolean", "Whether the file was downloaded by this run"),
  ],
  estimatedDurationMs: 300_000,
};

function downloadIsoHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({
    node: z.string().min(1),
    url: z.string().url().optional(),
    destination: z.string().min(1).optional(),
  });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const { guests } = services.config;
      const script = downloadFile({ url: params.url ?? guests.isoUrl, destination: params.destination ?? guests.isoPath });

      let tries = 0;
      try {
        const { value, attempts } = await retryFixed(
          (attempt) => {
            tries = attempt;
            return runRecipe(services.runner, node, script, downloadResultSchema);
          },
          {
            attempts: guests.download.attempts,
            delayMs: guests.download.delayMs,
            onRetry: (attempt, error) =>
              ctx.log.info(`Download attempt ${attempt}/${guests.download.attempts} failed: ${formatErrorMessage(error)}`),
            signal: ctx.signal,
          },
        );
        return { ...value, attempts };
      } catch (error) {
        throw new StepExecutionError(ctx.stepId, `download failed after ${tries} attempt(s): ${formatErrorMessage(error)}`, error);
      }
    },
  };
}

// =============================================================================
// Cluster Steps
// =============================================================================

const clusterValidateDef: StepTypeDefinition = {
  id: "cluster-validate",
  label: "Validate Cluster",
  description: "Run Test-Cluster across the lab nodes (skipped once a cluster exists)",
  category: "cluster",
  parameters: [
    p("node", "string", "Node that runs the validation"),
    p("reportDir", "string", "Directory for the validation report on the node", false, "C:\\Lab\\Reports"),
  ],
  outputs: [
    o("reportPath", "string", "Validation report path, or null when skipped"),
    o("passed", "boolean", "Whether validation finished without warnings"),
    o("skipped", "boolean", "Whether the node already belongs to a cluster"),
  ],
  estimatedDurationMs: 300_000,
};

function clusterValidateHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), reportDir: z.string().min(1) });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const result = await runRecipe(
        services.runner,
        node,
        validateCluster({ nodes: services.nodes.map((n) => n.name), reportDir: params.reportDir }),
        validateClusterResultSchema,
      );
      for (const warning of result.warnings) ctx.log.warn(warning);
      return { reportPath: result.reportPath, passed: result.passed, skipped: result.skipped };
    },
  };
}

const clusterCreateDef: StepTypeDefinition = {
  id: "cluster-create",
  label: "Create Cluster",
  description: "Create the failover cluster with its static address and no storage",
  category: "cluster",
  parameters: [p("node", "string", "Node that creates the cluster")],
  outputs: [
    o("clusterName", "string", "Cluster name"),
    o("created", "boolean", "Whether this run created the cluster"),
    o("changed", "boolean", "Whether anything changed"),
  ],
  estimatedDurationMs: 180_000,
};

function clusterCreateHandler(getServices: ServicesAccessor): StepHandler {
  return recipeHandler(getServices, async (services, node) => {
    const { cluster } = services.config;
    const result = await runRecipe(
      services.runner,
      node,
      createCluster({ name: cluster.name, nodes: services.nodes.map((n) => n.name), staticAddress: cluster.staticAddress }),
      createClusterResultSchema,
    );
    return { ...result };
  });
}

const s2dEnableDef: StepTypeDefinition = {
  id: "s2d-enable",
  label: "Enable Storage Spaces Direct",
  description: "Enable S2D on the cluster and claim the pooled disks",
  category: "cluster",
  parameters: [p("node", "string", "Cluster node that runs the command")],
  outputs: [
    o("poolName", "string", "S2D storage pool name"),
    o("healthStatus", "string", "Pool health"),
    o("changed", "boolean", "Whether S2D was enabled by this run"),
  ],
  estimatedDurationMs: 600_000,
};

function s2dEnableHandler(getServices: ServicesAccessor): StepHandler {
  return recipeHandler(getServices, async (services, node, ctx) => {
    const result = await runRecipe(services.runner, node, enableS2d(), enableS2dResultSchema);
    if (result.healthStatus && result.healthStatus !== "Healthy") {
      ctx.log.warn(`Pool ${result.poolName} is ${result.healthStatus}`);
    }
    return { ...result };
  });
}

const volumeCreateDef: StepTypeDefinition = {
  id: "volume-create",
  label: "Create Volume",
  description: "Create the cluster shared volume on the S2D pool",
  category: "cluster",
  parameters: [
    p("node", "string", "Cluster node that runs the command"),
    p("poolName", "string", "Storage pool (defaults to the S2D pool)", false),
  ],
  outputs: [
    o("volumePath", "string", "CSV mount path"),
    o("changed", "boolean", "Whether the volume was created by this run"),
  ],
  estimatedDurationMs: 120_000,
};

function volumeCreateHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), poolName: z.string().min(1).optional() });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const { volume } = services.config.cluster;
      const result = await runRecipe(
        services.runner,
        node,
        createVolume({
          friendlyName: volume.friendlyName,
          fileSystem: volume.fileSystem,
          sizeGb: volume.sizeGb,
          resiliency: volume.resiliency,
          poolName: params.poolName,
        }),
        createVolumeResultSchema,
      );
      if (result.volumePath === null) ctx.log.warn(`Volume ${volume.friendlyName} has no cluster shared volume path`);
      return { ...result };
    },
  };
}

// =============================================================================
// Guest Steps
// =============================================================================

const guestSshKeyDef: StepTypeDefinition = {
  id: "guest-ssh-key",
  label: "Host SSH Key",
  description: "Install the OpenSSH client on the Hyper-V host and create its key pair",
  category: "guests",
  parameters: [
    p("node", "string", "Hyper-V host node"),
    p("keyPath", "string", "Private key path on the node", false, DEFAULT_HOST_KEY_PATH),
  ],
  outputs: [
    o("keyPath", "string", "Private key path"),
    o("publicKey", "string", "OpenSSH public key"),
    o("changed", "boolean", "Whether the client or the key was created"),
  ],
  estimatedDurationMs: 60_000,
};

function guestSshKeyHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), keyPath: z.string().min(1) });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const result = await runRecipe(services.runner, node, ensureHostSshKey(params.keyPath), hostSshKeyResultSchema);
      return { ...result };
    },
  };
}

const guestCreateDef: StepTypeDefinition = {
  id: "guest-create",
  label: "Create Nested Guest",
  description: "Create an AlmaLinux guest VM that installs itself from a Kickstart file",
  category: "guests",
  parameters: [
    p("node", "string", "Hyper-V host node"),
    p("guest", "string", "Guest name from guests.vms"),
    p("publicKey", "string", "SSH public key authorised for root and the lab user"),
  ],
  outputs: [
    o("vmName", "string", "Guest VM name"),
    o("created", "boolean", "Whether this run created the VM"),
    o("state", "string", "Hyper-V VM state"),
    o("changed", "boolean", "Whether the VM was created by this run"),
  ],
  estimatedDurationMs: 120_000,
};

function guestCreateHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({ node: z.string().min(1), guest: z.string().min(1), publicKey: z.string().min(1) });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const vm = findGuest(services.config, params.guest);
      const kickstart = await renderKickstart(services.config, vm, params.publicKey);
      const result = await runRecipe(
        services.runner,
        node,
        createNestedGuest({
          name: vm.name,
          memoryMb: vm.memoryMb,
          cpuCount: vm.cpuCount,
          diskGb: vm.diskGb,
          vmPath: services.config.guests.vmPath,
          isoPath: services.config.guests.isoPath,
          switchName: services.config.nested.switchName,
          kickstart,
        }),
        nestedGuestResultSchema,
      );
      return { ...result };
    },
  };
}

const guestPostinstallDef: StepTypeDefinition = {
  id: "guest-postinstall",
  label: "Guest Post-Install",
  description: "Run the post-install script on a nested guest over SSH, waiting for the guest to answer",
  category: "guests",
  parameters: [
    p("node", "string", "Hyper-V host node"),
    p("guest", "string", "Guest name from guests.vms"),
    p("keyPath", "string", "Private key path on the host", false, DEFAULT_HOST_KEY_PATH),
    p("ports", "array", "Guest firewall ports such as 8080/tcp", false),
    p("waitAttempts", "number", "Connection attempts while the guest installs", false, 20),
    p("waitDelayMs", "number", "Pause between connection attempts", false, 60_000),
  ],
  outputs: [
    o("exitCode", "number", "Exit code of the script"),
    o("completed", "boolean", "Whether the script printed its completion marker"),
  ],
  estimatedDurationMs: 900_000,
};

/** ssh.exe exit code for connection and authentication failures. */
const SSH_CONNECT_FAILED = 255;

function guestPostinstallHandler(getServices: ServicesAccessor): StepHandler {
  const schema = z.object({
    node: z.string().min(1),
    guest: z.string().min(1),
    keyPath: z.string().min(1),
    ports: z.array(z.string().regex(/^\d+\/(tcp|udp)$/)).optional(),
    waitAttempts: z.number().int().min(1),
    waitDelayMs: z.number().int().min(0),
  });
  return {
    async execute(ctx) {
      const services = getServices();
      const params = readParams(ctx, schema);
      const node = findNode(services, params.node);
      const vm = findGuest(services.config, params.guest);
      const script = runGuestShell({
        name: `postinstall-${vm.name}`,
        address: vm.ipAddress,
        user: "root",
        keyPath: params.keyPath,
        script: await renderPostInstall(services.config, { ports: params.ports }),
      });

      const { value: result } = await retryFixed(
        async () => {
          const shell = await runRecipe(services.runner, node, script, guestShellResultSchema);
          if (shell.exitCode === SSH_CONNECT_FAILED) {
            throw new LabError(`${vm.name} (${vm.ipAddress}) is not reachable over SSH yet`, "GUEST_UNREACHABLE");
          }
          return shell;
        },
        {
          attempts: params.waitAttempts,
          delayMs: params.waitDelayMs,
          onRetry: (attempt) => ctx.log.debug(`Waiting for ${vm.name} (attempt ${attempt}/${params.waitAttempts})`),
          signal: ctx.signal,
        },
      );

      const progress = parsePostInstallProgress(result.output);
      if (progress.stages.length > 0) ctx.log.debug(`post-install stages on ${vm.name}: ${progress.stages.join(", ")}`);
      if (result.exitCode !== 0) {
        const tail = progress.messages.slice(-3).join(" | ");
        const where = progress.failedStage ? ` in stage ${progress.failedStage}` : "";
        throw new StepExecutionError(ctx.stepId, `post-install on ${vm.name} exited with ${result.exitCode}${where}: ${tail}`);
      }
      const completed = progress.completed;
      if (!completed) ctx.log.warn(`post-install on ${vm.name} did not print ${POSTINSTALL_COMPLETE}`);
      return { exitCode: result.exitCode, completed };
    },
  };
}

// =============================================================================
// Diagnostics Steps
// =============================================================================

const nodeStatusDef: StepTypeDefinition = {
  id: "node-status",
  label: "Node Status",
  description: "Collect and evaluate the node's lab status",
  category: "diagnostics",
  parameters: [p("node", "string", "Lab node name")],
  outputs: [
    o("status", "string", "Worst check status: pass, warn or fail"),
    o("report", "object", "Full node status report"),
  ],
  estimatedDurationMs: 30_000,
};

function nodeStatusHandler(getServices: ServicesAccessor): StepHandler {
  return recipeHandler(getServices, async (services, node, ctx) => {
    const report = await collectNodeReport(services.runner, node, reportExpectations(services.config));
    for (const check of report.checks) {
      if (check.status === "fail") ctx.log.warn(`${check.id}: ${check.message}`);
    }
    return { status: report.status, report };
  });
}

// =============================================================================
// Registration
// =============================================================================

export const LAB_STEP_DEFINITIONS: StepTypeDefinition[] = [
  hostFeaturesDef,
  restartNodeDef,
  nestedSwitchDef,
  firewallRulesDef,
  winrmDef,
  credsspDef,
  wmiGrantDef,
  prepareDisksDef,
  downloadIsoDef,
  clusterValidateDef,
  clusterCreateDef,
  s2dEnableDef,
  volumeCreateDef,
  guestSshKeyDef,
  guestCreateDef,
  guestPostinstallDef,
  nodeStatusDef,
];

const HANDLER_FACTORIES: Record<string, (getServices: ServicesAccessor) => StepHandler> = {
  "host-features": hostFeaturesHandler,
  "restart-node": restartNodeHandler,
  "nested-switch": nestedSwitchHandler,
  "firewall-rules": firewallRulesHandler,
  winrm: winrmHandler,
  credssp: credsspHandler,
  "wmi-grant": wmiGrantHandler,
  "prepare-disks": prepareDisksHandler,
  "download-iso": downloadIsoHandler,
  "cluster-validate": clusterValidateHandler,
  "cluster-create": clusterCreateHandler,
  "s2d-enable": s2dEnableHandler,
  "volume-create": volumeCreateHandler,
  "guest-ssh-key": guestSshKeyHandler,
  "guest-create": guestCreateHandler,
  "guest-postinstall": guestPostinstallHandler,
  "node-status": nodeStatusHandler,
};

/**
 * Register every lab step. Services are looked up on each call, so the
 * same registration serves a real runner and a recording one. Calling it
 * again replaces the previous handlers.
 */
export function registerLabSteps(getServices: ServicesAccessor): void {
  for (const def of LAB_STEP_DEFINITIONS) {
    const factory = HANDLER_FACTORIES[def.id];
    if (!factory) throw new LabError(`No handler for step type "${def.id}"`, "MISSING_STEP_HANDLER");
    registerStepType(def, factory(getServices), { replace: true });
  }
}

/**
 * Register the lab steps with handlers that return placeholder outputs
 * without touching any node (plan validation and tests).
 */
export function registerLabStepsDryRun(): void {
  for (const def of LAB_STEP_DEFINITIONS) {
    const mockOutputs: Record<string, unknown> = {};
    for (const out of def.outputs) {
      mockOutputs[out.name] =
        out.type === "string" ? `mock-${out.name}` : out.type === "number" ? 0 : out.type === "boolean" ? true : out.type === "array" ? [] : {};
    }
    registerStepType(def, dryRunHandler(mockOutputs), { replace: true });
  }
}
