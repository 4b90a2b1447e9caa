// Path: src/lib/secret-name.ts
// Vault secret naming convention

/**
 * Characters and length Azure Key Vault accepts for a secret name
 */
const KEY_VAULT_NAME_PATTERN = /^[0-9A-Za-z-]{1,127}$/;

/**
 * Build the vault secret name for one secret of an application environment.
 *
 * The result is the lookup key in the vault and must stay byte-for-byte
 * `<app>-<env>-<vaultKey>`; no case folding or character substitution.
 *
 * @example
 * buildSecretName('my-web-app', 'dev', 'database-url') // 'my-web-app-dev-database-url'
 */
export function buildSecretName(appName: string, envName: string, vaultKey: string): string {
  return `${appName}-${envName}-${vaultKey}`;
}

/**
 * Check whether Azure Key Vault would accept a secret name
 */
export function isValidVaultSecretName(name: string): boolean {
  return KEY_VAULT_NAME_PATTERN.test(name);
}
