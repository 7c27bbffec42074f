/**
 * Credentials Manager
 *
 * Azure authentication for the lab through @azure/identity. The credential
 * chain is picked by `azure.credentialMethod`; subscription and tenant come
 * from the config or the environment.
 */

import type { TokenCredential } from "@azure/identity";
import type { LabConfig } from "../config/schema.js";
import { LabError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type LabCredentialMethod = "default" | "cli" | "service-principal" | "managed-identity";

export type CredentialsManagerOptions = {
  subscriptionId?: string;
  tenantId?: string;
  credentialMethod?: LabCredentialMethod;
  /** Cache lifetime for a resolved credential. */
  ttlMs?: number;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: LabCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();

  constructor(private ttlMs = 3_600_000) {}

  get(key: string): TokenCredential | null {
    const entry = this.cache.get(key);
    if (!entry) return null;
    if (Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.cache.set(key, { credential, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.cache.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class LabCredentialsManager {
  private method: LabCredentialMethod;
  private subscriptionId?: string;
  private tenantId?: string;
  private env: NodeJS.ProcessEnv;
  private cache: CredentialCache;

  constructor(options: CredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.method = options.credentialMethod ?? "default";
    this.subscriptionId = options.subscriptionId ?? this.env.AZURE_SUBSCRIPTION_ID;
    this.tenantId = options.tenantId ?? this.env.AZURE_TENANT_ID;
    this.cache = new CredentialCache(options.ttlMs);
  }

  /**
   * Get a TokenCredential for the configured method.
   */
  async getCredential(method?: LabCredentialMethod): Promise<CredentialResolutionResult> {
    const resolvedMethod = method ?? this.method;
    const cacheKey = `${resolvedMethod}:${this.tenantId ?? ""}`;

    let credential = this.cache.get(cacheKey);
    if (!credential) {
      credential = await this.createCredential(resolvedMethod);
      this.cache.set(cacheKey, credential);
    }

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.subscriptionId,
      tenantId: this.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.subscriptionId;
  }

  /**
   * Subscription every ARM call needs; an error when neither the config nor
   * `AZURE_SUBSCRIPTION_ID` provides one.
   */
  requireSubscriptionId(): string {
    if (!this.subscriptionId) {
      throw new LabError(
        "No Azure subscription configured. Set azure.subscriptionId or AZURE_SUBSCRIPTION_ID.",
        "NO_SUBSCRIPTION",
      );
    }
    return this.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  getMethod(): LabCredentialMethod {
    return this.method;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * @azure/identity is imported lazily so commands that never reach Azure
   * (render, sddl, config) start without it.
   */
  private async createCredential(method: LabCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : {});

      case "service-principal": {
        const clientId = this.env.AZURE_CLIENT_ID;
        const clientSecret = this.env.AZURE_CLIENT_SECRET;
        if (!this.tenantId || !clientId || !clientSecret) {
          throw new LabError(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET",
            "MISSING_CREDENTIALS",
          );
        }
        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.env.AZURE_CLIENT_ID;
        return clientId ? new identity.ManagedIdentityCredential({ clientId }) : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): LabCredentialsManager {
  return new LabCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(
  config: LabConfig,
  env: NodeJS.ProcessEnv = process.env,
): LabCredentialsManager {
  return new LabCredentialsManager({
    subscriptionId: config.azure.subscriptionId,
    tenantId: config.azure.tenantId,
    credentialMethod: config.azure.credentialMethod,
    env,
  });
}
