/**
 * Azure Key Vault — Type Definitions
 */

export type KeyVaultSecret = {
  id: string;
  name: string;
  value?: string;
  contentType?: string;
  enabled?: boolean;
  createdOn?: string;
  updatedOn?: string;
};

/** Result of comparing a stored secret to the value a pipeline expects. */
export type SecretVerification = {
  vaultName: string;
  secretName: string;
  matches: boolean;
  /** Never contains either secret value. */
  message: string;
};
