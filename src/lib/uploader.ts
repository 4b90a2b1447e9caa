// Path: src/lib/uploader.ts
// Upload env file values to the vault under the catalog naming convention

import type { ApplicationConfig } from './catalog/index.js';
import { uploadLogger as log } from './logger.js';
import { buildSecretName } from './secret-name.js';
import type { SecretWriter } from './vault/index.js';
import { VaultAccessError, extractErrorMessage } from '../utils/error.js';

export interface SecretUpload {
  secretName: string;
  envVar: string;
  value: string;
}

export interface SecretMapping {
  /** Secrets to upload, in declaration order */
  uploads: SecretUpload[];
  /** Declared variables with no value in the env file */
  missingVars: string[];
}

export interface UploadFailure {
  secretName: string;
  error: string;
}

export interface UploadResult {
  uploaded: string[];
  failed: UploadFailure[];
}

export type UploadProgressHandler = (
  upload: SecretUpload,
  outcome: { ok: true } | { ok: false; error: string }
) => void;

/**
 * Map env file values onto vault secret names for one application environment
 */
export function createSecretMapping(
  app: ApplicationConfig,
  envName: string,
  envVars: Readonly<Record<string, string>>
): SecretMapping {
  // One upload per vault name; a later declaration replaces the value in place
  const bySecretName = new Map<string, SecretUpload>();
  const missingVars: string[] = [];

  for (const secret of app.secrets) {
    const value = envVars[secret.envVar];
    if (value === undefined || value === '') {
      missingVars.push(secret.envVar);
      continue;
    }
    const secretName = buildSecretName(app.name, envName, secret.vaultKey);
    bySecretName.set(secretName, { secretName, envVar: secret.envVar, value });
  }

  const uploads = Array.from(bySecretName.values());

  log.debug({ app: app.name, env: envName, mapped: uploads.length, missing: missingVars.length }, 'Secret mapping created');
  return { uploads, missingVars };
}

/**
 * Mask a secret for display: first four characters, the rest as asterisks
 */
export function maskValue(value: string): string {
  if (value.length <= 4) {
    return '****';
  }
  return value.slice(0, 4) + '*'.repeat(value.length - 4);
}

/**
 * Upload secrets one at a time.
 *
 * A VaultAccessError stops the upload; any other failure is recorded
 * for that secret and the next one is attempted.
 */
export async function uploadSecrets(
  writer: SecretWriter,
  vaultName: string,
  uploads: readonly SecretUpload[],
  onProgress?: UploadProgressHandler
): Promise<UploadResult> {
  const result: UploadResult = { uploaded: [], failed: [] };

  for (const upload of uploads) {
    try {
      await writer.setSecret(vaultName, upload.secretName, upload.value);
      result.uploaded.push(upload.secretName);
      onProgress?.(upload, { ok: true });
    } catch (err) {
      if (err instanceof VaultAccessError) {
        throw err;
      }
      const error = extractErrorMessage(err);
      log.warn({ secretName: upload.secretName, err: error }, 'Upload failed');
      result.failed.push({ secretName: upload.secretName, error });
      onProgress?.(upload, { ok: false, error });
    }
  }

  return result;
}
