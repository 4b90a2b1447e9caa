// Path: src/lib/vault/keyvault.ts
// Azure Key Vault implementation of the secret store

import {
  AggregateAuthenticationError,
  AuthenticationError,
  CredentialUnavailableError,
  DefaultAzureCredential,
  type TokenCredential,
} from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import { isRestError } from '@azure/core-rest-pipeline';
import {
  VaultAccessError,
  extractErrorMessage,
  isAuthError,
  isNetworkError,
  isPermissionError,
} from '../../utils/error.js';
import { vaultLogger as log } from '../logger.js';
import type { SecretClientLike, SecretFetcher, SecretLookup, SecretWriter } from './types.js';

const KEY_VAULT_SCOPE = 'https://vault.azure.net/.default';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'REQUEST_SEND_ERROR',
]);

export type SecretClientFactory = (vaultUrl: string, credential: TokenCredential) => SecretClientLike;

export interface KeyVaultSecretStoreOptions {
  /** Defaults to DefaultAzureCredential (az login, env vars, managed identity) */
  credential?: TokenCredential;
  /** Defaults to the Key Vault SDK SecretClient */
  clientFactory?: SecretClientFactory;
}

/**
 * Vault URL for a Key Vault name
 */
export function vaultUrlFor(vaultName: string): string {
  return `https://${vaultName}.vault.azure.net`;
}

/**
 * Sort a Key Vault error into "secret missing" or a fatal access failure.
 */
export function classifyVaultError(
  err: unknown,
  vaultName: string,
  secretName?: string
): 'missing' | VaultAccessError {
  const message = extractErrorMessage(err);
  const fail = (kind: VaultAccessError['kind']): VaultAccessError =>
    new VaultAccessError(message, kind, vaultName, { cause: err, secretName });

  if (
    err instanceof CredentialUnavailableError ||
    err instanceof AuthenticationError ||
    err instanceof AggregateAuthenticationError
  ) {
    return fail('auth');
  }

  if (isRestError(err)) {
    if (err.statusCode === 404 || err.code === 'SecretNotFound') {
      return 'missing';
    }
    if (err.code === 'ForbiddenByFirewall' || /network access/i.test(message)) {
      return fail('network');
    }
    if (err.statusCode === 403) {
      return fail('forbidden');
    }
    if (err.statusCode === 401) {
      return fail('auth');
    }
    if (err.code !== undefined && NETWORK_ERROR_CODES.has(err.code)) {
      return fail('network');
    }
  }

  if (isNetworkError(err)) return fail('network');
  if (isAuthError(err)) return fail('auth');
  if (isPermissionError(err)) return fail('forbidden');
  return fail('unknown');
}

/**
 * Secret store backed by Azure Key Vault.
 * One SDK client is kept per vault for the lifetime of the store.
 */
export class KeyVaultSecretStore implements SecretFetcher, SecretWriter {
  private readonly credential: TokenCredential;
  private readonly clientFactory: SecretClientFactory;
  private readonly clients = new Map<string, SecretClientLike>();

  constructor(options: KeyVaultSecretStoreOptions = {}) {
    this.credential = options.credential ?? new DefaultAzureCredential();
    this.clientFactory = options.clientFactory ?? ((url, credential) => new SecretClient(url, credential));
  }

  private client(vaultName: string): SecretClientLike {
    const url = vaultUrlFor(vaultName);
    let client = this.clients.get(url);
    if (!client) {
      client = this.clientFactory(url, this.credential);
      this.clients.set(url, client);
    }
    return client;
  }

  /**
   * Make sure a Key Vault token can be obtained before any secret call.
   *
   * @throws VaultAccessError of kind 'auth'
   */
  async verifyAccess(vaultName: string): Promise<void> {
    let token: Awaited<ReturnType<TokenCredential['getToken']>>;
    try {
      token = await this.credential.getToken(KEY_VAULT_SCOPE);
    } catch (err) {
      throw new VaultAccessError(extractErrorMessage(err), 'auth', vaultName, { cause: err });
    }
    if (!token) {
      throw new VaultAccessError('No access token returned for Key Vault', 'auth', vaultName);
    }
    log.debug({ vaultName, expiresOn: token.expiresOnTimestamp }, 'Credential verified');
  }

  async getSecret(vaultName: string, secretName: string): Promise<SecretLookup> {
    log.debug({ vaultName, secretName }, 'Fetching secret');

    try {
      const secret = await this.client(vaultName).getSecret(secretName);
      // An empty value is indistinguishable from an unset variable in the env file
      if (secret.value === undefined || secret.value === '') {
        return { status: 'missing' };
      }
      return { status: 'found', value: secret.value };
    } catch (err) {
      const outcome = classifyVaultError(err, vaultName, secretName);
      if (outcome === 'missing') {
        log.debug({ vaultName, secretName }, 'Secret not found');
        return { status: 'missing' };
      }
      log.error({ vaultName, secretName, kind: outcome.kind, err: outcome.message }, 'Key Vault request failed');
      throw outcome;
    }
  }

  async setSecret(vaultName: string, secretName: string, value: string): Promise<void> {
    log.debug({ vaultName, secretName }, 'Setting secret');

    try {
      await this.client(vaultName).setSecret(secretName, value);
    } catch (err) {
      const outcome = classifyVaultError(err, vaultName, secretName);
      // Setting a secret never yields "missing"; report the raw failure for that secret
      if (outcome === 'missing' || outcome.kind === 'unknown') {
        throw err;
      }
      throw outcome;
    }
  }
}
