// Path: src/lib/catalog/validation.ts
// Structural validation of app-configs.json

import { buildSecretName, isValidVaultSecretName } from '../secret-name.js';
import type {
  ApplicationConfig,
  Catalog,
  SecretDefinition,
  ValidationIssue,
  ValidationResult,
} from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

/**
 * Read-only view over a Map built at load time. Unlike a frozen Map,
 * it has no `set`, `delete` or `clear` to call.
 */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly map: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.map = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.map.size;
  }

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void): void {
    this.map.forEach((value, key) => callbackfn(value, key, this));
  }

  entries() {
    return this.map.entries();
  }

  keys() {
    return this.map.keys();
  }

  values() {
    return this.map.values();
  }

  [Symbol.iterator]() {
    return this.map[Symbol.iterator]();
  }
}

/**
 * Validate one secret entry, returning the typed definition when usable
 */
function validateSecret(
  raw: unknown,
  prefix: string,
  errors: ValidationIssue[]
): SecretDefinition | null {
  if (!isRecord(raw)) {
    errors.push({ field: prefix, message: 'Secret entry must be an object' });
    return null;
  }

  let ok = true;
  for (const key of ['env_var', 'vault_key', 'category'] as const) {
    if (!isNonEmptyString(raw[key])) {
      errors.push({ field: `${prefix}.${key}`, message: `${key} is required` });
      ok = false;
    }
  }

  const description = raw.description ?? '';
  if (typeof description !== 'string') {
    errors.push({ field: `${prefix}.description`, message: 'description must be a string' });
    ok = false;
  }

  const { env_var: envVar, vault_key: vaultKey, category } = raw;
  if (!ok || typeof envVar !== 'string' || typeof vaultKey !== 'string' || typeof category !== 'string' || typeof description !== 'string') {
    return null;
  }

  return Object.freeze({ envVar, vaultKey, category, description });
}

/**
 * Validate one application entry
 */
function validateApplication(
  name: string,
  raw: unknown,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): ApplicationConfig | null {
  const prefix = `applications.${name}`;

  if (!isRecord(raw)) {
    errors.push({ field: prefix, message: 'Application entry must be an object' });
    return null;
  }

  const errorCount = errors.length;

  const description = raw.description ?? '';
  if (typeof description !== 'string') {
    errors.push({ field: `${prefix}.description`, message: 'description must be a string' });
  }

  const environments: string[] = [];
  if (!Array.isArray(raw.environments) || raw.environments.length === 0) {
    errors.push({ field: `${prefix}.environments`, message: 'At least one environment is required' });
  } else {
    raw.environments.forEach((env: unknown, i: number) => {
      if (isNonEmptyString(env)) {
        environments.push(env);
      } else {
        errors.push({ field: `${prefix}.environments[${i}]`, message: 'Environment name must be a non-empty string' });
      }
    });
  }

  const secrets: SecretDefinition[] = [];
  if (!Array.isArray(raw.secrets)) {
    errors.push({ field: `${prefix}.secrets`, message: 'secrets must be an array' });
  } else {
    raw.secrets.forEach((entry: unknown, i: number) => {
      const secret = validateSecret(entry, `${prefix}.secrets[${i}]`, errors);
      if (secret) secrets.push(secret);
    });
  }

  // Duplicate variable names are legal but the later line wins when the file is sourced
  const seen = new Set<string>();
  for (const secret of secrets) {
    if (seen.has(secret.envVar)) {
      warnings.push({
        field: `${prefix}.secrets`,
        message: `env_var "${secret.envVar}" is declared more than once`,
      });
    }
    seen.add(secret.envVar);
  }

  if (errors.length > errorCount || typeof description !== 'string') {
    return null;
  }

  return Object.freeze({
    name,
    description,
    environments: Object.freeze(environments),
    secrets: Object.freeze(secrets),
  });
}

/**
 * Check that no two distinct (app, env, vault_key) triples build the same
 * vault secret name, and that every name is one Key Vault accepts.
 */
function checkSecretNames(
  applications: ReadonlyMap<string, ApplicationConfig>,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  const owners = new Map<string, string>();

  for (const app of applications.values()) {
    for (const env of app.environments) {
      for (const secret of app.secrets) {
        const secretName = buildSecretName(app.name, env, secret.vaultKey);
        const owner = `${app.name}/${env}/${secret.vaultKey}`;
        const existing = owners.get(secretName);

        if (existing !== undefined && existing !== owner) {
          errors.push({
            field: `applications.${app.name}`,
            message: `Secret name "${secretName}" is built by both ${existing} and ${owner}`,
          });
          continue;
        }
        if (existing === undefined && !isValidVaultSecretName(secretName)) {
          warnings.push({
            field: `applications.${app.name}`,
            message: `Secret name "${secretName}" is not a valid Key Vault name (use 1-127 letters, digits and dashes)`,
          });
        }
        owners.set(secretName, owner);
      }
    }
  }
}

/**
 * Validate a parsed app-configs.json document.
 *
 * Every problem is collected; `catalog` is only set when there are no errors.
 */
export function validateCatalogDocument(document: unknown): {
  result: ValidationResult;
  catalog: Catalog | null;
} {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  if (!isRecord(document)) {
    errors.push({ field: '(root)', message: 'Configuration must be a JSON object' });
    return { result: { valid: false, errors, warnings }, catalog: null };
  }

  const vaultName = document.vault_name;
  if (!isNonEmptyString(vaultName)) {
    errors.push({ field: 'vault_name', message: 'vault_name is required' });
  }

  const applications = new Map<string, ApplicationConfig>();
  if (!isRecord(document.applications)) {
    errors.push({ field: 'applications', message: 'applications must be an object' });
  } else {
    for (const [name, raw] of Object.entries(document.applications)) {
      const app = validateApplication(name, raw, errors, warnings);
      if (app) applications.set(name, app);
    }
  }

  checkSecretNames(applications, errors, warnings);

  const valid = errors.length === 0;
  const catalog: Catalog | null =
    valid && typeof vaultName === 'string'
      ? Object.freeze({ vaultName, applications: new FrozenMap(applications) })
      : null;

  return { result: { valid, errors, warnings }, catalog };
}

/**
 * Render validation issues as display lines
 */
export function formatValidationIssues(issues: readonly ValidationIssue[]): string[] {
  return issues.map((issue) => `${issue.field}: ${issue.message}`);
}
