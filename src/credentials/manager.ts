/**
 * Azure Agent — Credentials Manager
 *
 * Resolves Azure authentication using @azure/identity. Supports a service
 * principal (the default for the agent), the DefaultAzureCredential chain,
 * the Azure CLI login and Managed Identity.
 */

import type { TokenCredential } from "@azure/identity";
import type { AgentConfig } from "../config.js";
import type { AzureCredentialMethod } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  credentialMethod?: AzureCredentialMethod;
  tenantId?: string;
  clientId?: string;
  clientSecret?: string;
  subscriptionId?: string;
  /** How long a resolved credential is reused. Default: one hour. */
  cacheTtlMs?: number;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  subscriptionId?: string;
  tenantId?: string;
};

/** What the service managers need from a credentials manager. */
export type CredentialProvider = {
  getCredential(): Promise<CredentialResolutionResult>;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private cache = new Map<string, { credential: TokenCredential; expiresAt: number }>();

  constructor(private readonly ttlMs: number) {}

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

export class AzureCredentialsManager implements CredentialProvider {
  private readonly options: CredentialsManagerOptions;
  private readonly cache: CredentialCache;

  constructor(options: CredentialsManagerOptions = {}) {
    this.options = {
      ...options,
      credentialMethod: options.credentialMethod ?? "service-principal",
    };
    this.cache = new CredentialCache(options.cacheTtlMs ?? 3_600_000);
  }

  /**
   * Get an Azure TokenCredential, using the configured method.
   */
  async getCredential(): Promise<CredentialResolutionResult> {
    const resolvedMethod = this.options.credentialMethod ?? "service-principal";
    const cacheKey = `${resolvedMethod}:${this.options.tenantId ?? ""}`;

    const credential = this.cache.get(cacheKey) ?? (await this.createCredential(resolvedMethod));
    this.cache.set(cacheKey, credential);

    return {
      credential,
      method: resolvedMethod,
      subscriptionId: this.options.subscriptionId,
      tenantId: this.options.tenantId,
    };
  }

  getSubscriptionId(): string | undefined {
    return this.options.subscriptionId;
  }

  getTenantId(): string | undefined {
    return this.options.tenantId;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential();

      case "managed-identity":
        return this.options.clientId
          ? new identity.ManagedIdentityCredential({ clientId: this.options.clientId })
          : new identity.ManagedIdentityCredential();

      case "default":
        return new identity.DefaultAzureCredential();

      case "service-principal": {
        const { tenantId, clientId, clientSecret } = this.options;
        if (!tenantId || !clientId || !clientSecret) {
          throw new Error(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}

export function createCredentialsManagerFromConfig(config: AgentConfig): AzureCredentialsManager {
  return new AzureCredentialsManager({
    credentialMethod: config.credentialMethod,
    tenantId: config.tenantId,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
    subscriptionId: config.subscriptionId,
  });
}
