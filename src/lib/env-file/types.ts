// Path: src/lib/env-file/types.ts
// Type definitions for env file assembly

import type { SecretDefinition } from '../catalog/index.js';
import type { SecretLookup } from '../vault/index.js';

/**
 * A declared secret together with the outcome of its vault lookup
 */
export interface ResolvedSecret {
  definition: SecretDefinition;
  /** Name the secret was looked up under in the vault */
  secretName: string;
  lookup: SecretLookup;
}

/**
 * Rendered env file, one entry per line without trailing newlines
 */
export interface EnvironmentArtifact {
  lines: string[];
  foundCount: number;
  totalCount: number;
}

export interface FetchSummary {
  foundCount: number;
  totalCount: number;
  /** Vault names of the secrets that were not found, in declaration order */
  missingSecretNames: string[];
}

/**
 * Fixed inputs of one generation run
 */
export interface AssemblyTarget {
  vaultName: string;
  appName: string;
  envName: string;
}

export type ResolveProgressHandler = (secret: ResolvedSecret, index: number, total: number) => void;
