/**
 * Terraform configuration for the Azure side of the lab.
 *
 * Data disk attachments are chained with `depends_on`, and each node's NIC
 * waits for the previous node's VM: the azurerm provider races when it
 * attaches many disks or creates NICs in one subnet at once.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { deriveNodes, type LabConfig } from "../config/schema.js";
import { LAB_TAG } from "../vms/types.js";
import { hclRef, renderFile, type HclBlock, type HclExpr } from "./hcl.js";

export const TEMPLATE_FILES = ["providers.tf", "variables.tf", "main.tf", "outputs.tf"] as const;

export type TemplateFileName = (typeof TEMPLATE_FILES)[number];

export type LabTemplate = Record<TemplateFileName, string>;

export const AZURERM_PROVIDER_VERSION = "~> 3.110";

const HEADER = "Generated by s2dlab. Edit s2dlab.config.json and re-render instead.";

const RG = "azurerm_resource_group.lab";

function resource(type: string, name: string, body: Omit<HclBlock, "type" | "labels">): HclBlock {
  return { type: "resource", labels: [type, name], ...body };
}

function inGroup(): Record<string, HclExpr> {
  return {
    resource_group_name: hclRef(`${RG}.name`),
    location: hclRef(`${RG}.location`),
  };
}

function providersFile(): HclBlock[] {
  return [
    {
      type: "terraform",
      attributes: { required_version: ">= 1.5.0" },
      blocks: [
        {
          type: "required_providers",
          attributes: { azurerm: { source: "hashicorp/azurerm", version: AZURERM_PROVIDER_VERSION } },
        },
      ],
    },
    { type: "provider", labels: ["azurerm"], blocks: [{ type: "features" }] },
  ];
}

function variablesFile(config: LabConfig): HclBlock[] {
  return [
    {
      type: "variable",
      labels: ["location"],
      attributes: { type: hclRef("string"), default: config.azure.location },
    },
    {
      type: "variable",
      labels: ["resource_group_name"],
      attributes: { type: hclRef("string"), default: config.azure.resourceGroup },
    },
    {
      type: "variable",
      labels: ["admin_username"],
      attributes: { type: hclRef("string"), default: config.nodes.adminUsername },
    },
    {
      type: "variable",
      labels: ["admin_password"],
      attributes: {
        type: hclRef("string"),
        sensitive: true,
        description: "Local administrator password, passed as TF_VAR_admin_password",
      },
    },
  ];
}

function networkBlocks(config: LabConfig): HclBlock[] {
  const { prefix } = config.azure;
  const { vnetCidr, subnetCidr, allowedSourceCidr } = config.network;

  const rule = (
    name: string,
    priority: number,
    protocol: string,
    ports: string[],
    source: string,
    destination: string,
  ): HclBlock => ({
    type: "security_rule",
    attributes: {
      name,
      priority,
      direction: "Inbound",
      access: "Allow",
      protocol,
      source_port_range: "*",
      ...(ports.length === 1 ? { destination_port_range: ports[0] } : { destination_port_ranges: ports }),
      source_address_prefix: source,
      destination_address_prefix: destination,
    },
  });

  return [
    resource("azurerm_resource_group", "lab", {
      attributes: { name: hclRef("var.resource_group_name"), location: hclRef("var.location"), tags: hclRef("local.tags") },
    }),
    resource("azurerm_virtual_network", "lab", {
      attributes: { name: `${prefix}-vnet`, ...inGroup(), address_space: [vnetCidr], tags: hclRef("local.tags") },
    }),
    resource("azurerm_subnet", "lab", {
      attributes: {
        name: `${prefix}-subnet`,
        resource_group_name: hclRef(`${RG}.name`),
        virtual_network_name: hclRef("azurerm_virtual_network.lab.name"),
        address_prefixes: [subnetCidr],
      },
    }),
    resource("azurerm_network_security_group", "lab", {
      attributes: { name: `${prefix}-nsg`, ...inGroup(), tags: hclRef("local.tags") },
      blocks: [
        rule("allow-vnet", 100, "*", ["*"], vnetCidr, vnetCidr),
        rule("allow-rdp", 110, "Tcp", ["3389"], allowedSourceCidr, "*"),
        rule("allow-winrm", 120, "Tcp", ["5985", "5986"], allowedSourceCidr, "*"),
      ],
    }),
    resource("azurerm_subnet_network_security_group_association", "lab", {
      attributes: {
        subnet_id: hclRef("azurerm_subnet.lab.id"),
        network_security_group_id: hclRef("azurerm_network_security_group.lab.id"),
      },
    }),
  ];
}

function nodeBlocks(config: LabConfig): HclBlock[] {
  const blocks: HclBlock[] = [];
  const { image, dataDisks } = config.nodes;

  for (const node of deriveNodes(config)) {
    const id = `node${node.index}`;
    const vm = `azurerm_windows_virtual_machine.${id}`;

    blocks.push(
      resource("azurerm_public_ip", id, {
        attributes: { name: `${node.name}-pip`, ...inGroup(), allocation_method: "Static", sku: "Standard", tags: hclRef("local.tags") },
      }),
      resource("azurerm_network_interface", id, {
        attributes: { name: `${node.name}-nic`, ...inGroup(), tags: hclRef("local.tags") },
        blocks: [
          {
            type: "ip_configuration",
            attributes: {
              name: "ipconfig1",
              subnet_id: hclRef("azurerm_subnet.lab.id"),
              private_ip_address_allocation: "Static",
              private_ip_address: node.privateIp,
              public_ip_address_id: hclRef(`azurerm_public_ip.${id}.id`),
            },
          },
        ],
        dependsOn:
          node.index === 1
            ? [hclRef("azurerm_subnet_network_security_group_association.lab")]
            : [hclRef(`azurerm_windows_virtual_machine.node${node.index - 1}`)],
      }),
      resource("azurerm_windows_virtual_machine", id, {
        attributes: {
          name: node.name,
          computer_name: node.name,
          ...inGroup(),
          size: config.nodes.vmSize,
          admin_username: hclRef("var.admin_username"),
          admin_password: hclRef("var.admin_password"),
          network_interface_ids: [hclRef(`azurerm_network_interface.${id}.id`)],
          patch_mode: "Manual",
          enable_automatic_updates: false,
          tags: hclRef("local.tags"),
        },
        blocks: [
          {
            type: "os_disk",
            attributes: {
              caching: "ReadWrite",
              storage_account_type: "Premium_LRS",
              disk_size_gb: config.nodes.osDiskSizeGb,
            },
          },
          {
            type: "source_image_reference",
            attributes: { publisher: image.publisher, offer: image.offer, sku: image.sku, version: image.version },
          },
        ],
      }),
    );

    for (let lun = 0; lun < dataDisks.count; lun++) {
      const disk = `${id}_data${lun}`;
      blocks.push(
        resource("azurerm_managed_disk", disk, {
          attributes: {
            name: `${node.name}-data${lun}`,
            ...inGroup(),
            storage_account_type: dataDisks.storageAccountType,
            create_option: "Empty",
            disk_size_gb: dataDisks.sizeGb,
            tags: hclRef("local.tags"),
          },
        }),
        resource("azurerm_virtual_machine_data_disk_attachment", disk, {
          attributes: {
            managed_disk_id: hclRef(`azurerm_managed_disk.${disk}.id`),
            virtual_machine_id: hclRef(`${vm}.id`),
            lun,
            caching: "None",
          },
          dependsOn: lun > 0 ? [hclRef(`azurerm_virtual_machine_data_disk_attachment.${id}_data${lun - 1}`)] : undefined,
        }),
      );
    }
  }

  return blocks;
}

function outputsFile(config: LabConfig): HclBlock[] {
  const ids = deriveNodes(config).map((n) => `node${n.index}`);
  const output = (name: string, value: HclBlock["attributes"]): HclBlock => ({ type: "output", labels: [name], attributes: value });
  return [
    output("resource_group_name", { value: hclRef(`${RG}.name`) }),
    output("node_names", { value: ids.map((id) => hclRef(`azurerm_windows_virtual_machine.${id}.name`)) }),
    output("node_private_ips", { value: ids.map((id) => hclRef(`azurerm_network_interface.${id}.private_ip_address`)) }),
    output("node_public_ips", { value: ids.map((id) => hclRef(`azurerm_public_ip.${id}.ip_address`)) }),
  ];
}

export function labTags(config: LabConfig): Record<string, string> {
  return { ...config.azure.tags, [LAB_TAG]: config.azure.prefix };
}

/**
 * Render the four Terraform files for a lab configuration.
 */
export function buildLabTemplate(config: LabConfig): LabTemplate {
  const locals: HclBlock = { type: "locals", attributes: { tags: labTags(config) } };
  return {
    "providers.tf": renderFile(providersFile(), HEADER),
    "variables.tf": renderFile(variablesFile(config), HEADER),
    "main.tf": renderFile([locals, ...networkBlocks(config), ...nodeBlocks(config)], HEADER),
    "outputs.tf": renderFile(outputsFile(config), HEADER),
  };
}

/**
 * Write the rendered files into `dir`, creating it if needed.
 */
export async function writeLabTemplate(config: LabConfig, dir: string): Promise<string[]> {
  const template = buildLabTemplate(config);
  await mkdir(dir, { recursive: true });
  const written: string[] = [];
  for (const name of TEMPLATE_FILES) {
    const path = join(dir, name);
    await writeFile(path, template[name], "utf8");
    written.push(path);
  }
  return written;
}
