// Path: src/lib/vault/types.ts
// Secret store capability types

/**
 * Outcome of looking a secret up by name.
 * Access and network failures are not outcomes: they are thrown.
 */
export type SecretLookup =
  | { status: 'found'; value: string }
  | { status: 'missing' };

/**
 * Read side of the vault
 */
export interface SecretFetcher {
  /**
   * @throws VaultAccessError when the vault cannot be reached or refuses the caller
   */
  getSecret(vaultName: string, secretName: string): Promise<SecretLookup>;
}

/**
 * Write side of the vault
 */
export interface SecretWriter {
  setSecret(vaultName: string, secretName: string, value: string): Promise<void>;
}

/**
 * The subset of the Key Vault SecretClient used here
 */
export interface SecretClientLike {
  getSecret(secretName: string): Promise<{ value?: string }>;
  setSecret(secretName: string, value: string): Promise<unknown>;
}
