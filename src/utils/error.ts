// Path: src/utils/error.ts
// Error types and error classification helpers

/**
 * Extract error message from unknown error type.
 * Handles Error objects, strings, and other types.
 *
 * @param err - Unknown error value
 * @returns Error message string
 */
export function extractErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'string') {
    return err;
  }
  return String(err);
}

/**
 * Check if an error is a transport-level network failure.
 */
export function isNetworkError(err: unknown): boolean {
  const msg = extractErrorMessage(err).toLowerCase();
  return /econnrefused|enotfound|etimedout|eai_again|socket hang up|econnreset|epipe|network/i.test(msg);
}

/**
 * Check if an error is an authentication error.
 */
export function isAuthError(err: unknown): boolean {
  const msg = extractErrorMessage(err).toLowerCase();
  return msg.includes('401') ||
         msg.includes('unauthorized') ||
         msg.includes('authentication') ||
         msg.includes('az login') ||
         msg.includes('expired');
}

/**
 * Check if an error is a permission/access error.
 */
export function isPermissionError(err: unknown): boolean {
  const msg = extractErrorMessage(err).toLowerCase();
  return msg.includes('403') ||
         msg.includes('forbidden') ||
         msg.includes('permission') ||
         msg.includes('eacces');
}

/**
 * Base error with a stable code and display metadata.
 */
export class AppError extends Error {
  readonly code: string;
  readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.metadata = options?.metadata;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The catalog file is missing, unparseable or structurally invalid.
 * `details` holds one line per problem found.
 */
export class ConfigError extends AppError {
  readonly details: readonly string[];

  constructor(message: string, details: readonly string[] = [], options?: { cause?: unknown }) {
    super(message, 'CONFIG_INVALID', { cause: options?.cause, metadata: { details } });
    this.name = 'ConfigError';
    this.details = details;
  }
}

export class UnknownApplicationError extends AppError {
  readonly application: string;
  readonly availableApplications: readonly string[];

  constructor(application: string, availableApplications: readonly string[]) {
    super(`Application '${application}' not found in configuration.`, 'UNKNOWN_APPLICATION', {
      metadata: { application, availableApplications },
    });
    this.name = 'UnknownApplicationError';
    this.application = application;
    this.availableApplications = availableApplications;
  }
}

export class UnknownEnvironmentError extends AppError {
  readonly application: string;
  readonly environment: string;
  readonly availableEnvironments: readonly string[];

  constructor(application: string, environment: string, availableEnvironments: readonly string[]) {
    super(
      `Environment '${environment}' not available for application '${application}'.`,
      'UNKNOWN_ENVIRONMENT',
      { metadata: { application, environment, availableEnvironments } }
    );
    this.name = 'UnknownEnvironmentError';
    this.application = application;
    this.environment = environment;
    this.availableEnvironments = availableEnvironments;
  }
}

export type VaultAccessKind = 'network' | 'forbidden' | 'auth' | 'unknown';

/**
 * The vault could not be reached or refused the caller.
 * Always fatal: a run never degrades these into missing secrets.
 */
export class VaultAccessError extends AppError {
  readonly kind: VaultAccessKind;
  readonly vaultName: string;

  constructor(
    message: string,
    kind: VaultAccessKind,
    vaultName: string,
    options?: { cause?: unknown; secretName?: string }
  ) {
    super(message, 'VAULT_ACCESS', {
      cause: options?.cause,
      metadata: { kind, vaultName, secretName: options?.secretName },
    });
    this.name = 'VaultAccessError';
    this.kind = kind;
    this.vaultName = vaultName;
  }

  /**
   * Follow-up instructions shown to the user for this kind of failure.
   */
  get remediation(): string[] {
    switch (this.kind) {
      case 'network':
        return [
          `Network access denied to Key Vault '${this.vaultName}'.`,
          'Key Vault requires VPN connection or access from approved IP ranges.',
          "Check your Key Vault's firewall settings and ensure your IP is allowed.",
        ];
      case 'forbidden':
        return [
          `Access to Key Vault '${this.vaultName}' was refused.`,
          'Ensure your identity has the "Key Vault Secrets User" role or a get/set access policy.',
        ];
      case 'auth':
        return [
          'Could not obtain Azure credentials.',
          "Run 'az login' or set AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET.",
        ];
      default:
        return [`Unexpected error talking to Key Vault '${this.vaultName}'.`];
    }
  }
}
