import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { buildLabTemplate, writeLabTemplate } from "./lab-template.js";
import { parseLabConfig } from "../config/loader.js";

const config = parseLabConfig({ azure: { tags: { owner: "lab-team" } } });

function count(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

describe("buildLabTemplate", () => {
  const template = buildLabTemplate(config);

  it("pins the azurerm provider", () => {
    expect(template["providers.tf"]).toBe(
      [
        "# Generated by s2dlab. Edit s2dlab.config.json and re-render instead.",
        "",
        "terraform {",
        '  required_version = ">= 1.5.0"',
        "",
        "  required_providers {",
        "    azurerm = {",
        '      source  = "hashicorp/azurerm"',
        '      version = "~> 3.110"',
        "    }",
        "  }",
        "}",
        "",
        'provider "azurerm" {',
        "  features {}",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("declares the admin password as a sensitive variable without a default", () => {
    const variables = template["variables.tf"];
    expect(variables).toContain(
      [
        'variable "admin_password" {',
        "  type        = string",
        "  sensitive   = true",
        '  description = "Local administrator password, passed as TF_VAR_admin_password"',
        "}",
      ].join("\n"),
    );
    expect(variables).toContain('  default = "labadmin"');
  });

  it("tags everything with the lab prefix", () => {
    expect(template["main.tf"]).toContain('locals {\n  tags = {\n    owner        = "lab-team"\n    "s2dlab-lab" = "s2dlab"\n  }\n}');
  });

  it("creates one VM, NIC and public IP per node with static addresses", () => {
    const main = template["main.tf"];
    expect(count(main, 'resource "azurerm_windows_virtual_machine"')).toBe(2);
    expect(count(main, 'resource "azurerm_public_ip"')).toBe(2);
    expect(main).toMatch(/private_ip_address\s+= "10\.10\.1\.10"/);
    expect(main).toMatch(/private_ip_address\s+= "10\.10\.1\.11"/);
    expect(main).toMatch(/patch_mode\s+= "Manual"/);
  });

  it("chains the second node's NIC behind the first VM", () => {
    const main = template["main.tf"];
    expect(main).toContain("  depends_on = [azurerm_subnet_network_security_group_association.lab]");
    expect(main).toContain("  depends_on = [azurerm_windows_virtual_machine.node1]");
  });

  it("attaches data disks one after another with LUN = index", () => {
    const main = template["main.tf"];
    expect(count(main, 'resource "azurerm_managed_disk"')).toBe(8);
    expect(count(main, 'resource "azurerm_virtual_machine_data_disk_attachment"')).toBe(8);
    expect(main).toContain(
      [
        'resource "azurerm_virtual_machine_data_disk_attachment" "node2_data3" {',
        "  managed_disk_id    = azurerm_managed_disk.node2_data3.id",
        "  virtual_machine_id = azurerm_windows_virtual_machine.node2.id",
        "  lun                = 3",
        '  caching            = "None"',
        "",
        "  depends_on = [azurerm_virtual_machine_data_disk_attachment.node2_data2]",
        "}",
      ].join("\n"),
    );
    expect(main).toContain(
      [
        'resource "azurerm_virtual_machine_data_disk_attachment" "node1_data0" {',
        "  managed_disk_id    = azurerm_managed_disk.node1_data0.id",
        "  virtual_machine_id = azurerm_windows_virtual_machine.node1.id",
        "  lun                = 0",
        '  caching            = "None"',
        "}",
      ].join("\n"),
    );
  });

  it("opens RDP and WinRM only to the allowed source range", () => {
    const restricted = buildLabTemplate(parseLabConfig({ network: { allowedSourceCidr: "203.0.113.0/24" } }))["main.tf"];
    expect(restricted).toMatch(/destination_port_ranges\s+= \["5985", "5986"\]/);
    expect(count(restricted, '"203.0.113.0/24"')).toBe(2);
  });

  it("outputs node names and addresses in node order", () => {
    expect(template["outputs.tf"]).toContain(
      'output "node_names" {\n  value = [azurerm_windows_virtual_machine.node1.name, azurerm_windows_virtual_machine.node2.name]\n}',
    );
  });

  it("never contains the admin password", () => {
    const withPassword = parseLabConfig({ nodes: { adminPassword: "test-secret-123" } });
    const files = Object.values(buildLabTemplate(withPassword)).join("\n");
    expect(files).not.toContain("test-secret-123");
  });
});

describe("writeLabTemplate", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("writes the four files into a new directory", async () => {
    dir = await mkdtemp(join(tmpdir(), "s2dlab-tf-"));
    const target = join(dir, "terraform");
    const written = await writeLabTemplate(config, target);
    expect(written).toEqual(["providers.tf", "variables.tf", "main.tf", "outputs.tf"].map((f) => join(target, f)));
    expect(await readFile(join(target, "main.tf"), "utf8")).toBe(buildLabTemplate(config)["main.tf"]);
  });
});
