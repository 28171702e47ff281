/**
 * Azure Key Vault Manager
 *
 * Sets, reads and verifies secrets through @azure/keyvault-secrets. Every SDK
 * call goes through withAzureRetry, so throttling and transient 5xx responses
 * are retried with the same backoff as az CLI commands.
 */

import type { KeyVaultSecret as SdkSecret } from "@azure/keyvault-secrets";
import type { AzureCredentialsManager } from "../credentials/manager.js";
import { requireArgs } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { formatErrorMessage, readErrorCode, withAzureRetry, type FunctionRetryOptions } from "../retry.js";
import type { KeyVaultSecret, SecretVerification } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialProvider = Pick<AzureCredentialsManager, "getCredential">;

export type KeyVaultManagerOptions = {
  retry?: Omit<FunctionRetryOptions, "logger">;
  logger?: Logger;
};

export function vaultUrlFor(vaultName: string): string {
  return `https://${vaultName}.vault.azure.net`;
}

function toSecret(s: SdkSecret): KeyVaultSecret {
  return {
    id: s.properties.id ?? "",
    name: s.name,
    value: s.value,
    contentType: s.properties.contentType,
    enabled: s.properties.enabled,
    createdOn: s.properties.createdOn?.toISOString(),
    updatedOn: s.properties.updatedOn?.toISOString(),
  };
}

// =============================================================================
// AzureKeyVaultManager
// =============================================================================

export class AzureKeyVaultManager {
  private credentials: CredentialProvider;
  private retryOptions: FunctionRetryOptions;
  private logger: Logger;

  constructor(credentials: CredentialProvider, options?: KeyVaultManagerOptions) {
    this.credentials = credentials;
    this.logger = options?.logger ?? silentLogger;
    this.retryOptions = { ...options?.retry, logger: this.logger };
  }

  private async getSecretClient(vaultName: string) {
    const { credential } = await this.credentials.getCredential();
    const { SecretClient } = await import("@azure/keyvault-secrets");
    return new SecretClient(vaultUrlFor(vaultName), credential);
  }

  /**
   * Create a secret or add a new version of an existing one.
   */
  async setSecret(vaultName: string, secretName: string, value: string, contentType?: string): Promise<KeyVaultSecret> {
    requireArgs({ vaultName, secretName, value });

    const client = await this.getSecretClient(vaultName);
    return withAzureRetry(async () => toSecret(await client.setSecret(secretName, value, { contentType })), this.retryOptions);
  }

  /**
   * Latest version of a secret, or null if the vault has no secret by that name.
   */
  async getSecret(vaultName: string, secretName: string): Promise<KeyVaultSecret | null> {
    requireArgs({ vaultName, secretName });

    const client = await this.getSecretClient(vaultName);
    return withAzureRetry(async () => {
      try {
        return toSecret(await client.getSecret(secretName));
      } catch (error) {
        if (readErrorCode(error) === "SecretNotFound") return null;
        throw error;
      }
    }, this.retryOptions);
  }

  /**
   * Compare the stored value to `expected`. Read failures are reported as a
   * mismatch, not thrown.
   */
  async verifySecret(vaultName: string, secretName: string, expected: string): Promise<SecretVerification> {
    requireArgs({ vaultName, secretName, expected });

    const result = (matches: boolean, message: string): SecretVerification => ({
      vaultName,
      secretName,
      matches,
      message,
    });

    let secret: KeyVaultSecret | null;
    try {
      secret = await this.getSecret(vaultName, secretName);
    } catch (error) {
      return result(false, `Failed to retrieve secret: ${formatErrorMessage(error)}`);
    }

    if (!secret) return result(false, `Secret ${secretName} not found in ${vaultName}`);
    if (secret.value !== expected) return result(false, "Secret value mismatch");
    return result(true, `Secret ${secretName} matches the expected value`);
  }

  /**
   * Set a secret, then read it back and compare.
   */
  async updateAndVerifySecret(vaultName: string, secretName: string, value: string): Promise<SecretVerification> {
    requireArgs({ vaultName, secretName, value });

    this.logger.info(`Updating Key Vault secret: ${secretName}`);
    this.logger.info(`Key Vault: ${vaultName}`);

    try {
      await this.setSecret(vaultName, secretName, value);
    } catch (error) {
      const message = `Failed to set secret in Key Vault: ${formatErrorMessage(error)}`;
      this.logger.error(`❌ ${message}`);
      return { vaultName, secretName, matches: false, message };
    }
    this.logger.info("✅ Secret updated successfully");

    this.logger.info("Verifying secret value...");
    const verification = await this.verifySecret(vaultName, secretName, value);
    if (!verification.matches) {
      this.logger.error(`❌ Secret verification failed: ${verification.message}`);
      return verification;
    }

    this.logger.info("✅ Secret verified successfully");
    return verification;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createKeyVaultManager(
  credentials: CredentialProvider,
  options?: KeyVaultManagerOptions,
): AzureKeyVaultManager {
  return new AzureKeyVaultManager(credentials, options);
}
