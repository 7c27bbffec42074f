/**
 * Kickstart rendering for nested AlmaLinux guests.
 */

import type { GuestVmConfig, LabConfig } from "../config/schema.js";
import { netmaskFor, parseCidr } from "../config/network.js";
import { LabError } from "../errors.js";
import { KICKSTART_TEMPLATES, readTemplate, renderTemplate } from "./templates.js";

export type KickstartValues = {
  hostname: string;
  ip: string;
  netmask: string;
  gateway: string;
  dns: string;
  rootpw: string;
  sshPublicKey: string;
  labUser: string;
};

// SHA-512 and yescrypt hashes as written by `openssl passwd -6` / mkpasswd.
const CRYPT_HASH = /^\$(6|y)\$/;

/** The `rootpw` directive: hashed, plaintext, or a locked account. */
export function rootPasswordDirective(password: string | undefined): string {
  if (password === undefined) return "rootpw --lock";
  if (/\s/.test(password)) {
    throw new LabError("guests.rootPassword must not contain whitespace", "INVALID_GUEST_PASSWORD");
  }
  return CRYPT_HASH.test(password) ? `rootpw --iscrypted ${password}` : `rootpw --plaintext ${password}`;
}

function checkPublicKey(key: string): string {
  const trimmed = key.trim();
  if (!/^(ssh-ed25519|ssh-rsa|ecdsa-sha2-nistp\d+) [A-Za-z0-9+/=]+( [^"\r\n]*)?$/.test(trimmed)) {
    throw new LabError("SSH public key is not in OpenSSH format", "INVALID_SSH_KEY");
  }
  return trimmed;
}

export function kickstartValues(config: LabConfig, vm: GuestVmConfig, sshPublicKey: string): KickstartValues {
  const nat = parseCidr(config.nested.natPrefix);
  if (!nat) throw new LabError(`Invalid NAT prefix ${config.nested.natPrefix}`, "INVALID_CONFIG");

  return {
    hostname: vm.name.toLowerCase(),
    ip: vm.ipAddress,
    netmask: netmaskFor(nat.prefix),
    gateway: config.nested.gatewayAddress,
    dns: config.guests.dnsServers.join(","),
    rootpw: rootPasswordDirective(config.guests.rootPassword),
    sshPublicKey: checkPublicKey(sshPublicKey),
    labUser: config.guests.labUser,
  };
}

export function findGuest(config: LabConfig, name: string): GuestVmConfig {
  const vm = config.guests.vms.find((v) => v.name.toLowerCase() === name.toLowerCase());
  if (!vm) {
    const known = config.guests.vms.map((v) => v.name).join(", ") || "none";
    throw new LabError(`Unknown guest ${name} (configured: ${known})`, "UNKNOWN_GUEST");
  }
  return vm;
}

/**
 * Render the Kickstart file selected by `vm.kickstart`.
 */
export async function renderKickstart(
  config: LabConfig,
  vm: GuestVmConfig,
  sshPublicKey: string,
  templateRoot?: string,
): Promise<string> {
  const file = KICKSTART_TEMPLATES[vm.kickstart];
  const template = await readTemplate(file, templateRoot);
  return renderTemplate(template, kickstartValues(config, vm, sshPublicKey), file);
}
