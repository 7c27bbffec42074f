/**
 * Lab Configuration Schema
 *
 * Zod schema for `s2dlab.config.json`. Every field has a default except the
 * admin password, which normally arrives through `S2DLAB_ADMIN_PASSWORD`.
 */

import { z } from "zod";
import {
  addressAt,
  broadcastAddress,
  cidrContainsAddress,
  cidrContainsCidr,
  formatIpv4,
  hostOffset,
  isCidr,
  isIpv4,
  parseCidr,
  parseIpv4,
} from "./network.js";

// =============================================================================
// Primitives
// =============================================================================

const cidrSchema = z.string().refine(isCidr, { message: "Expected an IPv4 CIDR such as 10.0.0.0/16" });
const ipv4Schema = z.string().refine(isIpv4, { message: "Expected an IPv4 address" });

/** NetBIOS names are limited to 15 characters. */
const computerNameSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9-]{0,14}$/, "Expected 1-15 letters, digits or dashes, starting with a letter");

export const WMI_PERMISSION_NAMES = [
  "Enable",
  "MethodExecute",
  "FullWrite",
  "PartialWrite",
  "ProviderWrite",
  "RemoteAccess",
  "ReadSecurity",
  "EditSecurity",
] as const;

export const LOG_LEVEL_NAMES = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

// =============================================================================
// Sections
// =============================================================================

export const azureSectionSchema = z
  .object({
    subscriptionId: z.string().min(1).optional(),
    tenantId: z.string().min(1).optional(),
    location: z.string().min(1).default("eastus"),
    resourceGroup: z.string().min(1).max(90).default("rg-s2d-lab"),
    // "<prefix>-node<N>" must stay a valid computer name.
    prefix: z
      .string()
      .regex(/^[a-z][a-z0-9]{0,8}$/, "Expected 1-9 lowercase letters or digits, starting with a letter")
      .default("s2dlab"),
    credentialMethod: z.enum(["default", "cli", "service-principal", "managed-identity"]).default("default"),
    tags: z.record(z.string(), z.string()).default({}),
  })
  .strict();

export const networkSectionSchema = z
  .object({
    vnetCidr: cidrSchema.default("10.10.0.0/16"),
    subnetCidr: cidrSchema.default("10.10.1.0/24"),
    allowedSourceCidr: cidrSchema.default("0.0.0.0/0"),
    firstNodeHostOctet: z.number().int().min(4).max(250).default(10),
  })
  .strict();

export const nodesSectionSchema = z
  .object({
    count: z.number().int().min(2).max(4).default(2),
    vmSize: z.string().min(1).default("Standard_D8s_v5"),
    image: z
      .object({
        publisher: z.string().default("MicrosoftWindowsServer"),
        offer: z.string().default("WindowsServer"),
        sku: z.string().default("2022-datacenter-azure-edition"),
        version: z.string().default("latest"),
      })
      .strict()
      .default({}),
    adminUsername: z.string().min(1).max(20).default("labadmin"),
    adminPassword: z.string().min(12, "Azure requires at least 12 characters").max(123).optional(),
    osDiskSizeGb: z.number().int().min(127).default(128),
    dataDisks: z
      .object({
        count: z.number().int().min(2, "Storage Spaces Direct needs at least 2 data disks per node").max(16).default(4),
        sizeGb: z.number().int().min(32).default(256),
        storageAccountType: z.enum(["Standard_LRS", "StandardSSD_LRS", "Premium_LRS"]).default("Premium_LRS"),
      })
      .strict()
      .default({}),
  })
  .strict();

export const clusterSectionSchema = z
  .object({
    name: computerNameSchema.default("s2dlab-clu"),
    staticAddress: ipv4Schema.default("10.10.1.50"),
    validate: z.boolean().default(true),
    volume: z
      .object({
        friendlyName: z.string().min(1).default("LabVolume"),
        fileSystem: z.enum(["CSVFS_ReFS", "CSVFS_NTFS"]).default("CSVFS_ReFS"),
        sizeGb: z.number().int().min(1).default(200),
        resiliency: z.enum(["Mirror", "Parity"]).default("Mirror"),
      })
      .strict()
      .default({}),
  })
  .strict();

export const nestedSectionSchema = z
  .object({
    switchName: z.string().min(1).default("NestedSwitch"),
    natName: z.string().min(1).default("NestedNAT"),
    natPrefix: cidrSchema.default("192.168.100.0/24"),
    gatewayAddress: ipv4Schema.default("192.168.100.1"),
  })
  .strict();

export const remotingSectionSchema = z
  .object({
    /** Empty means "the other lab nodes". */
    trustedHosts: z.array(z.string().min(1)).default([]),
    httpsListener: z.boolean().default(false),
    credSsp: z.boolean().default(true),
    firewallPorts: z.array(z.number().int().min(1).max(65535)).default([5985, 5986, 445]),
  })
  .strict();

export const wmiGrantSchema = z
  .object({
    principal: z.string().min(1),
    permissions: z.array(z.enum(WMI_PERMISSION_NAMES)).min(1),
    inherit: z.boolean().default(true),
  })
  .strict();

export const wmiSectionSchema = z
  .object({
    namespace: z.string().min(1).default("root/cimv2"),
    grants: z
      .array(wmiGrantSchema)
      .default([{ principal: "RM", permissions: ["Enable", "MethodExecute", "RemoteAccess"], inherit: true }]),
  })
  .strict();

export const guestVmSchema = z
  .object({
    name: computerNameSchema,
    memoryMb: z.number().int().min(1024).default(2048),
    cpuCount: z.number().int().min(1).max(16).default(2),
    diskGb: z.number().int().min(20).default(40),
    kickstart: z.enum(["minimal", "lab"]).default("minimal"),
    ipAddress: ipv4Schema,
  })
  .strict();

export const guestsSectionSchema = z
  .object({
    isoUrl: z.string().url().default("https://repo.almalinux.org/almalinux/9/isos/x86_64/AlmaLinux-9-latest-x86_64-minimal.iso"),
    isoPath: z.string().min(1).default("C:\\Lab\\ISO\\AlmaLinux-minimal.iso"),
    vmPath: z.string().min(1).default("C:\\Lab\\VMs"),
    /** 1-based index of the node that hosts the nested guests. */
    hostNode: z.number().int().min(1).default(1),
    download: z
      .object({
        attempts: z.number().int().min(1).max(20).default(3),
        delayMs: z.number().int().min(0).default(10_000),
      })
      .strict()
      .default({}),
    vms: z.array(guestVmSchema).default([]),
    rootPassword: z.string().min(8).optional(),
    labUser: z.string().regex(/^[a-z_][a-z0-9_-]{0,31}$/).default("labuser"),
    dnsServers: z.array(ipv4Schema).min(1).default(["1.1.1.1", "8.8.8.8"]),
  })
  .strict();

export const terraformSectionSchema = z
  .object({
    workingDir: z.string().min(1).default("./terraform"),
    bin: z.string().min(1).default("terraform"),
  })
  .strict();

export const orchestrationSectionSchema = z
  .object({
    stepTimeoutMs: z.number().int().positive().default(1_800_000),
    maxRetries: z.number().int().min(0).max(10).default(1),
    retryDelayMs: z.number().int().min(0).default(15_000),
  })
  .strict();

export const loggingSectionSchema = z
  .object({
    level: z.enum(LOG_LEVEL_NAMES).default("info"),
    file: z.string().min(1).optional(),
  })
  .strict();

export const retrySectionSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(10).default(3),
    minDelayMs: z.number().int().min(0).default(1_000),
    maxDelayMs: z.number().int().min(0).default(30_000),
  })
  .strict();

// =============================================================================
// Full Config
// =============================================================================

const labConfigObjectSchema = z
  .object({
    azure: azureSectionSchema.default({}),
    network: networkSectionSchema.default({}),
    nodes: nodesSectionSchema.default({}),
    cluster: clusterSectionSchema.default({}),
    nested: nestedSectionSchema.default({}),
    remoting: remotingSectionSchema.default({}),
    wmi: wmiSectionSchema.default({}),
    guests: guestsSectionSchema.default({}),
    terraform: terraformSectionSchema.default({}),
    orchestration: orchestrationSectionSchema.default({}),
    logging: loggingSectionSchema.default({}),
    retry: retrySectionSchema.default({}),
  })
  .strict();

type LabConfigShape = z.output<typeof labConfigObjectSchema>;

export const labConfigSchema = labConfigObjectSchema.superRefine((config, ctx) => {
  for (const issue of checkTopology(config)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: issue.path, message: issue.message });
  }
});

export type LabConfig = z.output<typeof labConfigSchema>;
export type LabConfigInput = z.input<typeof labConfigSchema>;
export type WmiPermissionName = (typeof WMI_PERMISSION_NAMES)[number];
export type WmiGrant = z.output<typeof wmiGrantSchema>;
export type GuestVmConfig = z.output<typeof guestVmSchema>;

// =============================================================================
// Derived Values
// =============================================================================

export type DerivedNode = {
  /** 1-based node number. */
  index: number;
  name: string;
  privateIp: string;
};

export function nodeName(prefix: string, index: number): string {
  return `${prefix}-node${index}`;
}

/**
 * Node names and static private IPs, in node order.
 */
export function deriveNodes(config: Pick<LabConfigShape, "azure" | "network" | "nodes">): DerivedNode[] {
  const subnet = parseCidr(config.network.subnetCidr);
  if (!subnet) return [];

  const nodes: DerivedNode[] = [];
  for (let index = 1; index <= config.nodes.count; index++) {
    nodes.push({
      index,
      name: nodeName(config.azure.prefix, index),
      privateIp: formatIpv4(addressAt(subnet, config.network.firstNodeHostOctet + index - 1)),
    });
  }
  return nodes;
}

type TopologyIssue = { path: (string | number)[]; message: string };

function checkTopology(config: LabConfigShape): TopologyIssue[] {
  const issues: TopologyIssue[] = [];
  const vnet = parseCidr(config.network.vnetCidr);
  const subnet = parseCidr(config.network.subnetCidr);
  if (!vnet || !subnet) return issues;

  if (!cidrContainsCidr(vnet, subnet)) {
    issues.push({ path: ["network", "subnetCidr"], message: `${config.network.subnetCidr} is not inside ${config.network.vnetCidr}` });
  }

  // Azure reserves the first four addresses and the last one of every subnet.
  const lastUsable = broadcastAddress(subnet) - 1;
  const nodes = deriveNodes(config);
  const nodeIps = new Set(nodes.map((n) => n.privateIp));
  const lastNode = nodes[nodes.length - 1];
  const lastNodeIp = lastNode ? parseIpv4(lastNode.privateIp) : null;
  if (lastNodeIp !== null && lastNodeIp > lastUsable) {
    issues.push({
      path: ["network", "firstNodeHostOctet"],
      message: `node addresses run past the end of ${config.network.subnetCidr}`,
    });
  }

  const clusterIp = parseIpv4(config.cluster.staticAddress);
  if (clusterIp !== null) {
    if (!cidrContainsAddress(subnet, clusterIp)) {
      issues.push({
        path: ["cluster", "staticAddress"],
        message: `${config.cluster.staticAddress} is not inside subnet ${config.network.subnetCidr}`,
      });
    } else if (hostOffset(subnet, clusterIp) < 4 || clusterIp > lastUsable) {
      issues.push({
        path: ["cluster", "staticAddress"],
        message: `${config.cluster.staticAddress} is an Azure reserved address`,
      });
    } else if (nodeIps.has(config.cluster.staticAddress)) {
      issues.push({
        path: ["cluster", "staticAddress"],
        message: `${config.cluster.staticAddress} is already assigned to a node`,
      });
    }
  }

  if (nodes.some((n) => n.name.toLowerCase() === config.cluster.name.toLowerCase())) {
    issues.push({ path: ["cluster", "name"], message: `${config.cluster.name} collides with a node name` });
  }

  const natPrefix = parseCidr(config.nested.natPrefix);
  const gateway = parseIpv4(config.nested.gatewayAddress);
  if (natPrefix && gateway !== null && !cidrContainsAddress(natPrefix, gateway)) {
    issues.push({
      path: ["nested", "gatewayAddress"],
      message: `${config.nested.gatewayAddress} is not inside ${config.nested.natPrefix}`,
    });
  }

  if (config.guests.hostNode > config.nodes.count) {
    issues.push({ path: ["guests", "hostNode"], message: `node ${config.guests.hostNode} does not exist` });
  }

  const seenNames = new Set<string>();
  const seenIps = new Set<string>();
  config.guests.vms.forEach((vm, i) => {
    const key = vm.name.toLowerCase();
    if (seenNames.has(key)) issues.push({ path: ["guests", "vms", i, "name"], message: `duplicate guest name ${vm.name}` });
    seenNames.add(key);

    if (seenIps.has(vm.ipAddress)) {
      issues.push({ path: ["guests", "vms", i, "ipAddress"], message: `duplicate guest address ${vm.ipAddress}` });
    }
    seenIps.add(vm.ipAddress);

    const ip = parseIpv4(vm.ipAddress);
    if (natPrefix && ip !== null) {
      if (!cidrContainsAddress(natPrefix, ip)) {
        issues.push({
          path: ["guests", "vms", i, "ipAddress"],
          message: `${vm.ipAddress} is not inside ${config.nested.natPrefix}`,
        });
      } else if (vm.ipAddress === config.nested.gatewayAddress) {
        issues.push({ path: ["guests", "vms", i, "ipAddress"], message: `${vm.ipAddress} is the NAT gateway` });
      }
    }
  });

  return issues;
}
