import { describe, expect, it } from "vitest";
import { findGuest, kickstartValues, renderKickstart, rootPasswordDirective } from "./kickstart.js";
import { parseLabConfig } from "../config/loader.js";

const PUBLIC_KEY = "ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKeyOnly s2dlab@NODE1";

const config = parseLabConfig({
  guests: {
    rootPassword: "test-secret",
    vms: [
      { name: "Alma1", ipAddress: "192.168.100.11" },
      { name: "alma2", ipAddress: "192.168.100.12", kickstart: "lab" },
    ],
  },
});

describe("rootPasswordDirective", () => {
  it("locks root without a password", () => {
    expect(rootPasswordDirective(undefined)).toBe("rootpw --lock");
  });

  it("passes crypt hashes through as encrypted", () => {
    expect(rootPasswordDirective("$6$salt$hash")).toBe("rootpw --iscrypted $6$salt$hash");
    expect(rootPasswordDirective("test-secret")).toBe("rootpw --plaintext test-secret");
  });

  it("rejects whitespace", () => {
    expect(() => rootPasswordDirective("two words")).toThrow("must not contain whitespace");
  });
});

describe("kickstartValues", () => {
  it("derives network settings from the NAT section", () => {
    expect(kickstartValues(config, findGuest(config, "alma1"), `  ${PUBLIC_KEY}\n`)).toEqual({
      hostname: "alma1",
      ip: "192.168.100.11",
      netmask: "255.255.255.0",
      gateway: "192.168.100.1",
      dns: "1.1.1.1,8.8.8.8",
      rootpw: "rootpw --plaintext test-secret",
      sshPublicKey: PUBLIC_KEY,
      labUser: "labuser",
    });
  });

  it("rejects a key that would break the sshkey line", () => {
    expect(() => kickstartValues(config, findGuest(config, "alma1"), 'ssh-ed25519 AAAA "quoted"')).toThrow(
      "SSH public key is not in OpenSSH format",
    );
  });
});

describe("findGuest", () => {
  it("names the configured guests when one is unknown", () => {
    expect(() => findGuest(config, "alma9")).toThrow("Unknown guest alma9 (configured: Alma1, alma2)");
  });
});

describe("renderKickstart", () => {
  it("renders the minimal template", async () => {
    const text = await renderKickstart(config, findGuest(config, "alma1"), PUBLIC_KEY);
    const lines = text.split("\n");

    expect(lines).toContain(
      "network --bootproto=static --device=link --ip=192.168.100.11 --netmask=255.255.255.0 --gateway=192.168.100.1 --nameserver=1.1.1.1,8.8.8.8 --hostname=alma1 --activate",
    );
    expect(lines).toContain("rootpw --plaintext test-secret");
    expect(lines).toContain(`sshkey --username=labuser "${PUBLIC_KEY}"`);
    expect(text).not.toContain("{{");
  });

  it("renders the lab template when selected", async () => {
    const text = await renderKickstart(config, findGuest(config, "alma2"), PUBLIC_KEY);

    expect(text.split("\n")[0]).toBe("# AlmaLinux lab install for alma2: minimal plus admin tooling");
    expect(text.split("\n")).toContain("vim-enhanced");
  });
});
