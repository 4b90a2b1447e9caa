// Path: src/lib/vault/index.ts
// Public API for vault access

export type { SecretLookup, SecretFetcher, SecretWriter, SecretClientLike } from './types.js';
export {
  KeyVaultSecretStore,
  classifyVaultError,
  vaultUrlFor,
  type KeyVaultSecretStoreOptions,
  type SecretClientFactory,
} from './keyvault.js';
