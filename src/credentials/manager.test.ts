/**
 * Credentials Manager Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import * as identity from "@azure/identity";
import { LabCredentialsManager, createCredentialsManager, createCredentialsManagerFromConfig } from "./manager.js";
import { parseLabConfig } from "../config/loader.js";
import { LabError } from "../errors.js";

vi.mock("@azure/identity", () => {
  const mockGetToken = vi.fn().mockResolvedValue({
    token: "mock-token",
    expiresOnTimestamp: Date.now() + 3600000,
  });

  return {
    DefaultAzureCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    AzureCliCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ClientSecretCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
    ManagedIdentityCredential: vi.fn().mockImplementation(function () { return { getToken: mockGetToken }; }),
  };
});

describe("LabCredentialsManager", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("uses the default chain unless told otherwise", async () => {
    const mgr = createCredentialsManager({ env: {} });
    const result = await mgr.getCredential();
    expect(result.method).toBe("default");
    expect(identity.DefaultAzureCredential).toHaveBeenCalledTimes(1);
  });

  it("passes the tenant to the CLI credential", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "cli", tenantId: "tenant-1", env: {} });
    await mgr.getCredential();
    expect(identity.AzureCliCredential).toHaveBeenCalledWith({ tenantId: "tenant-1" });
  });

  it("caches credentials per method", async () => {
    const mgr = createCredentialsManager({ env: {} });
    const first = await mgr.getCredential();
    const second = await mgr.getCredential();
    expect(first.credential).toBe(second.credential);
    expect(identity.DefaultAzureCredential).toHaveBeenCalledTimes(1);

    mgr.clearCache();
    await mgr.getCredential();
    expect(identity.DefaultAzureCredential).toHaveBeenCalledTimes(2);
  });

  it("builds a service principal credential from the environment", async () => {
    const mgr = createCredentialsManager({
      credentialMethod: "service-principal",
      env: { AZURE_TENANT_ID: "tenant-1", AZURE_CLIENT_ID: "client-1", AZURE_CLIENT_SECRET: "test-secret" },
    });
    await mgr.getCredential();
    expect(identity.ClientSecretCredential).toHaveBeenCalledWith("tenant-1", "client-1", "test-secret");
  });

  it("rejects a service principal without a secret", async () => {
    const mgr = createCredentialsManager({
      credentialMethod: "service-principal",
      env: { AZURE_TENANT_ID: "tenant-1", AZURE_CLIENT_ID: "client-1" },
    });
    await expect(mgr.getCredential()).rejects.toMatchObject({ code: "MISSING_CREDENTIALS" });
  });

  it("selects a user-assigned managed identity when a client id is set", async () => {
    const mgr = createCredentialsManager({ credentialMethod: "managed-identity", env: { AZURE_CLIENT_ID: "client-9" } });
    await mgr.getCredential();
    expect(identity.ManagedIdentityCredential).toHaveBeenCalledWith({ clientId: "client-9" });
  });

  it("falls back to AZURE_SUBSCRIPTION_ID", () => {
    const mgr = new LabCredentialsManager({ env: { AZURE_SUBSCRIPTION_ID: "sub-env" } });
    expect(mgr.getSubscriptionId()).toBe("sub-env");
    expect(mgr.requireSubscriptionId()).toBe("sub-env");
  });

  it("raises NO_SUBSCRIPTION when no subscription is known", () => {
    const mgr = new LabCredentialsManager({ env: {} });
    let caught: unknown;
    try {
      mgr.requireSubscriptionId();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(LabError);
    expect(caught).toMatchObject({ code: "NO_SUBSCRIPTION" });
  });

  it("reads subscription, tenant and method from the lab config", () => {
    const config = parseLabConfig({
      azure: { subscriptionId: "sub-cfg", tenantId: "tenant-cfg", credentialMethod: "cli" },
    });
    const mgr = createCredentialsManagerFromConfig(config, {});
    expect(mgr.getSubscriptionId()).toBe("sub-cfg");
    expect(mgr.getTenantId()).toBe("tenant-cfg");
    expect(mgr.getMethod()).toBe("cli");
  });
});
