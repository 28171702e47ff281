export { AzureKeyVaultManager, createKeyVaultManager, vaultUrlFor } from "./manager.js";
export type { CredentialProvider, KeyVaultManagerOptions } from "./manager.js";
export type { KeyVaultSecret, SecretVerification } from "./types.js";
