/**
 * Credentials Manager
 *
 * Resolves an @azure/identity TokenCredential for SDK calls. CI runners sign in
 * either through the az CLI session, a service principal in the environment,
 * or a managed identity; the default chain tries all of them.
 */

import type { TokenCredential } from "@azure/identity";
import type { AppConfig } from "../config.js";
import { ConfigError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type AzureCredentialMethod = AppConfig["credentialMethod"];

export type CredentialsManagerOptions = {
  credentialMethod?: AzureCredentialMethod;
  tenantId?: string;
  /** Environment the service principal and managed identity settings are read from. */
  env?: NodeJS.ProcessEnv;
  /** How long a resolved credential is reused, in ms. */
  cacheTtlMs?: number;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: AzureCredentialMethod;
  tenantId?: string;
};

// =============================================================================
// Credential Cache
// =============================================================================

class CredentialCache {
  private entries = new Map<string, { credential: TokenCredential; expiresAt: number }>();
  private ttlMs: number;

  constructor(ttlMs: number) {
    this.ttlMs = ttlMs;
  }

  get(key: string): TokenCredential | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (Date.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.credential;
  }

  set(key: string, credential: TokenCredential): void {
    this.entries.set(key, { credential, expiresAt: Date.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }
}

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private method: AzureCredentialMethod;
  private env: NodeJS.ProcessEnv;
  private tenantId: string | undefined;
  private cache: CredentialCache;

  constructor(options: CredentialsManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.method = options.credentialMethod ?? "default";
    this.tenantId = options.tenantId ?? this.env.AZURE_TENANT_ID;
    this.cache = new CredentialCache(options.cacheTtlMs ?? 3_600_000);
  }

  /**
   * Get a TokenCredential for the configured method (or the one given).
   */
  async getCredential(method?: AzureCredentialMethod): Promise<CredentialResolutionResult> {
    const resolved = method ?? this.method;
    const cacheKey = `${resolved}:${this.tenantId ?? ""}`;

    let credential = this.cache.get(cacheKey);
    if (!credential) {
      credential = await this.createCredential(resolved);
      this.cache.set(cacheKey, credential);
    }

    return { credential, method: resolved, tenantId: this.tenantId };
  }

  getTenantId(): string | undefined {
    return this.tenantId;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async createCredential(method: AzureCredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential(this.tenantId ? { tenantId: this.tenantId } : undefined);

      case "service-principal": {
        const clientId = this.env.AZURE_CLIENT_ID;
        const clientSecret = this.env.AZURE_CLIENT_SECRET;
        if (!this.tenantId || !clientId || !clientSecret) {
          throw new ConfigError(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }
        return new identity.ClientSecretCredential(this.tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = this.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(options?: CredentialsManagerOptions): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
