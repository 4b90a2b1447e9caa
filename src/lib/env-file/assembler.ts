// Path: src/lib/env-file/assembler.ts
// Secret resolution and env file rendering

import type { ApplicationConfig, SecretDefinition } from '../catalog/index.js';
import { assembleLogger as log } from '../logger.js';
import { buildSecretName } from '../secret-name.js';
import type { SecretFetcher } from '../vault/index.js';
import type {
  AssemblyTarget,
  EnvironmentArtifact,
  FetchSummary,
  ResolvedSecret,
  ResolveProgressHandler,
} from './types.js';

export const HEADER_RULE = '# ' + '='.repeat(77);

/**
 * Value as written after `NAME=`. Anything that would not read back
 * unchanged from a single line is double-quoted and escaped.
 */
export function formatEnvValue(value: string): string {
  if (!/[\r\n"'\\]/.test(value) && value.trim() === value) {
    return value;
  }
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n');
  return `"${escaped}"`;
}

/**
 * Look up every declared secret, one at a time, in declaration order.
 *
 * Missing secrets are recorded; any error thrown by the fetcher
 * (a VaultAccessError) ends the pass immediately.
 */
export async function resolveSecrets(
  fetcher: SecretFetcher,
  target: AssemblyTarget,
  secrets: readonly SecretDefinition[],
  onResolved?: ResolveProgressHandler
): Promise<ResolvedSecret[]> {
  const resolved: ResolvedSecret[] = [];

  for (const [index, definition] of secrets.entries()) {
    const secretName = buildSecretName(target.appName, target.envName, definition.vaultKey);
    const lookup = await fetcher.getSecret(target.vaultName, secretName);
    const entry: ResolvedSecret = { definition, secretName, lookup };

    if (lookup.status === 'found') {
      log.debug({ envVar: definition.envVar }, 'Found');
    } else {
      log.debug({ envVar: definition.envVar, secretName }, 'Missing');
    }

    resolved.push(entry);
    onResolved?.(entry, index, secrets.length);
  }

  return resolved;
}

/**
 * Render the env file for one application environment.
 *
 * A category heading is emitted each time the category differs from the
 * previous secret's, so groups follow first-seen order rather than sorting.
 */
export function render(
  app: ApplicationConfig,
  envName: string,
  vaultName: string,
  resolved: readonly ResolvedSecret[],
  now: Date = new Date()
): EnvironmentArtifact {
  if (resolved.length !== app.secrets.length) {
    throw new Error(
      `Expected ${app.secrets.length} resolved secrets for ${app.name}, got ${resolved.length}`
    );
  }

  const lines: string[] = [
    HEADER_RULE,
    `# Environment Variables for ${app.name} (${envName} environment)`,
    `# Generated on: ${now.toISOString()}`,
    `# Key Vault: ${vaultName}`,
    HEADER_RULE,
  ];

  let currentCategory: string | undefined;
  let foundCount = 0;

  app.secrets.forEach((definition, i) => {
    const entry = resolved[i];
    if (entry.definition.envVar !== definition.envVar) {
      throw new Error(`Resolved secret ${i} is ${entry.definition.envVar}, expected ${definition.envVar}`);
    }

    if (definition.category !== currentCategory) {
      lines.push('', `# ${definition.category.toUpperCase()}`);
      currentCategory = definition.category;
    }

    if (entry.lookup.status === 'found') {
      lines.push(`${definition.envVar}=${formatEnvValue(entry.lookup.value)}`);
      foundCount++;
    } else {
      lines.push(`${definition.envVar}=`);
    }
  });

  return { lines, foundCount, totalCount: app.secrets.length };
}

/**
 * File content of an artifact. The written file and the dry-run preview
 * both use this string.
 */
export function formatArtifact(artifact: EnvironmentArtifact): string {
  return artifact.lines.join('\n') + '\n';
}

/**
 * Count found secrets and list the vault names of the missing ones
 */
export function summarize(resolved: readonly ResolvedSecret[]): FetchSummary {
  const missingSecretNames = resolved
    .filter((entry) => entry.lookup.status === 'missing')
    .map((entry) => entry.secretName);

  return {
    foundCount: resolved.length - missingSecretNames.length,
    totalCount: resolved.length,
    missingSecretNames,
  };
}

/**
 * Resolve, render and summarize in memory. Nothing is persisted here.
 */
export async function assembleEnvironment(
  fetcher: SecretFetcher,
  app: ApplicationConfig,
  envName: string,
  vaultName: string,
  options: { now?: Date; onResolved?: ResolveProgressHandler } = {}
): Promise<{ artifact: EnvironmentArtifact; content: string; summary: FetchSummary }> {
  log.debug({ app: app.name, env: envName, secrets: app.secrets.length }, 'Assembling env file');

  const resolved = await resolveSecrets(
    fetcher,
    { vaultName, appName: app.name, envName },
    app.secrets,
    options.onResolved
  );
  const artifact = render(app, envName, vaultName, resolved, options.now);

  return { artifact, content: formatArtifact(artifact), summary: summarize(resolved) };
}
