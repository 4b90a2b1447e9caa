// Path: src/lib/env-file/assembler.test.ts
// Unit tests for secret resolution and env file rendering

import { describe, it, expect, vi } from 'vitest';
import { parseCatalog } from '../catalog/index.js';
import type { ApplicationConfig } from '../catalog/index.js';
import type { SecretFetcher, SecretLookup } from '../vault/index.js';
import { VaultAccessError } from '../../utils/error.js';
import {
  HEADER_RULE,
  assembleEnvironment,
  formatArtifact,
  formatEnvValue,
  render,
  resolveSecrets,
  summarize,
} from './assembler.js';

const NOW = new Date('2026-01-02T03:04:05.000Z');

/**
 * In-memory vault keyed by secret name
 */
function createFakeVault(values: Record<string, string>, failOn?: string) {
  const calls: string[] = [];
  let inFlight = 0;
  let maxInFlight = 0;

  const fetcher: SecretFetcher = {
    async getSecret(vaultName: string, secretName: string): Promise<SecretLookup> {
      calls.push(`${vaultName}/${secretName}`);
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await Promise.resolve();
      inFlight--;

      if (secretName === failOn) {
        throw new VaultAccessError('Client address is not authorized', 'network', vaultName);
      }
      const value = values[secretName];
      return value === undefined ? { status: 'missing' } : { status: 'found', value };
    },
  };

  return { fetcher, calls, maxInFlight: () => maxInFlight };
}

function singleSecretApp(): ApplicationConfig {
  const catalog = parseCatalog({
    vault_name: 'kv1',
    applications: {
      app1: {
        description: 'd',
        environments: ['dev'],
        secrets: [{ env_var: 'X', vault_key: 'x', category: 'c1', description: 'd' }],
      },
    },
  });
  const app = catalog.applications.get('app1');
  if (!app) throw new Error('fixture missing app1');
  return app;
}

function multiCategoryApp(): ApplicationConfig {
  const catalog = parseCatalog({
    vault_name: 'kv1',
    applications: {
      shop: {
        description: 'Shop',
        environments: ['dev', 'prod'],
        secrets: [
          { env_var: 'DB_HOST', vault_key: 'db-host', category: 'database', description: '' },
          { env_var: 'DB_PASSWORD', vault_key: 'db-password', category: 'database', description: '' },
          { env_var: 'STRIPE_KEY', vault_key: 'stripe-key', category: 'payments', description: '' },
          { env_var: 'DB_REPLICA', vault_key: 'db-replica', category: 'database', description: '' },
        ],
      },
    },
  });
  const app = catalog.applications.get('shop');
  if (!app) throw new Error('fixture missing shop');
  return app;
}

describe('resolveSecrets', () => {
  it('should look up each secret by its built name, in declaration order', async () => {
    const vault = createFakeVault({ 'shop-prod-db-host': 'db.internal' });
    const app = multiCategoryApp();

    const resolved = await resolveSecrets(
      vault.fetcher,
      { vaultName: 'kv1', appName: 'shop', envName: 'prod' },
      app.secrets
    );

    expect(vault.calls).toEqual([
      'kv1/shop-prod-db-host',
      'kv1/shop-prod-db-password',
      'kv1/shop-prod-stripe-key',
      'kv1/shop-prod-db-replica',
    ]);
    expect(resolved.map((r) => r.lookup.status)).toEqual(['found', 'missing', 'missing', 'missing']);
  });

  it('should never have more than one fetch in flight', async () => {
    const vault = createFakeVault({});
    await resolveSecrets(
      vault.fetcher,
      { vaultName: 'kv1', appName: 'shop', envName: 'dev' },
      multiCategoryApp().secrets
    );

    expect(vault.maxInFlight()).toBe(1);
  });

  it('should stop at the first access failure', async () => {
    const vault = createFakeVault({}, 'shop-dev-db-password');

    await expect(
      resolveSecrets(vault.fetcher, { vaultName: 'kv1', appName: 'shop', envName: 'dev' }, multiCategoryApp().secrets)
    ).rejects.toBeInstanceOf(VaultAccessError);
    expect(vault.calls).toHaveLength(2);
  });

  it('should report progress after each secret', async () => {
    const vault = createFakeVault({});
    const onResolved = vi.fn();

    await resolveSecrets(
      vault.fetcher,
      { vaultName: 'kv1', appName: 'app1', envName: 'dev' },
      singleSecretApp().secrets,
      onResolved
    );

    expect(onResolved).toHaveBeenCalledTimes(1);
    expect(onResolved).toHaveBeenCalledWith(
      { definition: singleSecretApp().secrets[0], secretName: 'app1-dev-x', lookup: { status: 'missing' } },
      0,
      1
    );
  });
});

describe('render', () => {
  it('should render the header and a found secret under its category', async () => {
    const app = singleSecretApp();
    const resolved = await resolveSecrets(
      createFakeVault({ 'app1-dev-x': 'val1' }).fetcher,
      { vaultName: 'kv1', appName: 'app1', envName: 'dev' },
      app.secrets
    );

    const artifact = render(app, 'dev', 'kv1', resolved, NOW);

    expect(artifact.lines).toEqual([
      HEADER_RULE,
      '# Environment Variables for app1 (dev environment)',
      '# Generated on: 2026-01-02T03:04:05.000Z',
      '# Key Vault: kv1',
      HEADER_RULE,
      '',
      '# C1',
      'X=val1',
    ]);
    expect(artifact.foundCount).toBe(1);
    expect(artifact.totalCount).toBe(1);
  });

  it('should use a 77 character rule', () => {
    expect(HEADER_RULE).toBe('# =============================================================================');
  });

  it('should emit an empty assignment for a missing secret', async () => {
    const app = singleSecretApp();
    const resolved = await resolveSecrets(
      createFakeVault({}).fetcher,
      { vaultName: 'kv1', appName: 'app1', envName: 'dev' },
      app.secrets
    );

    const artifact = render(app, 'dev', 'kv1', resolved, NOW);

    expect(artifact.lines[artifact.lines.length - 1]).toBe('X=');
    expect(artifact.foundCount).toBe(0);
  });

  it('should start a new group whenever the category changes', async () => {
    const app = multiCategoryApp();
    const resolved = await resolveSecrets(
      createFakeVault({ 'shop-dev-stripe-key': 'sk_test_placeholder' }).fetcher,
      { vaultName: 'kv1', appName: 'shop', envName: 'dev' },
      app.secrets
    );

    const artifact = render(app, 'dev', 'kv1', resolved, NOW);

    expect(artifact.lines.slice(5)).toEqual([
      '',
      '# DATABASE',
      'DB_HOST=',
      'DB_PASSWORD=',
      '',
      '# PAYMENTS',
      'STRIPE_KEY=sk_test_placeholder',
      '',
      '# DATABASE',
      'DB_REPLICA=',
    ]);
  });

  it('should emit exactly one value line per declared secret', async () => {
    const app = multiCategoryApp();
    const resolved = await resolveSecrets(
      createFakeVault({}).fetcher,
      { vaultName: 'kv1', appName: 'shop', envName: 'dev' },
      app.secrets
    );

    const valueLines = render(app, 'dev', 'kv1', resolved, NOW).lines.filter(
      (line) => line !== '' && !line.startsWith('#')
    );

    expect(valueLines.map((line) => line.split('=')[0])).toEqual(app.secrets.map((s) => s.envVar));
  });

  it('should refuse resolved secrets that do not match the declarations', () => {
    expect(() => render(multiCategoryApp(), 'dev', 'kv1', [], NOW)).toThrow(
      'Expected 4 resolved secrets for shop, got 0'
    );
  });
});

describe('summarize', () => {
  it('should count found secrets and list missing names in order', async () => {
    const resolved = await resolveSecrets(
      createFakeVault({ 'shop-dev-db-password': 'placeholder' }).fetcher,
      { vaultName: 'kv1', appName: 'shop', envName: 'dev' },
      multiCategoryApp().secrets
    );

    expect(summarize(resolved)).toEqual({
      foundCount: 1,
      totalCount: 4,
      missingSecretNames: ['shop-dev-db-host', 'shop-dev-stripe-key', 'shop-dev-db-replica'],
    });
  });
});

describe('assembleEnvironment', () => {
  it('should produce the file content and summary for a found secret', async () => {
    const result = await assembleEnvironment(
      createFakeVault({ 'app1-dev-x': 'val1' }).fetcher,
      singleSecretApp(),
      'dev',
      'kv1',
      { now: NOW }
    );

    expect(result.content).toBe(
      [
        HEADER_RULE,
        '# Environment Variables for app1 (dev environment)',
        '# Generated on: 2026-01-02T03:04:05.000Z',
        '# Key Vault: kv1',
        HEADER_RULE,
        '',
        '# C1',
        'X=val1',
      ].join('\n') + '\n'
    );
    expect(result.summary).toEqual({ foundCount: 1, totalCount: 1, missingSecretNames: [] });
  });

  it('should report a missing secret without failing', async () => {
    const result = await assembleEnvironment(createFakeVault({}).fetcher, singleSecretApp(), 'dev', 'kv1', {
      now: NOW,
    });

    expect(result.content.endsWith('\nX=\n')).toBe(true);
    expect(result.summary).toEqual({ foundCount: 0, totalCount: 1, missingSecretNames: ['app1-dev-x'] });
  });

  it('should keep a multi-line value on a single quoted line', async () => {
    const vault = createFakeVault({
      'shop-dev-db-password': '-----BEGIN KEY-----\nabc\n-----END KEY-----',
      'shop-dev-stripe-key': 'v',
    });

    const { artifact, content } = await assembleEnvironment(vault.fetcher, multiCategoryApp(), 'dev', 'kv1', {
      now: NOW,
    });

    expect(artifact.lines.slice(5)).toEqual([
      '',
      '# DATABASE',
      'DB_HOST=',
      'DB_PASSWORD="-----BEGIN KEY-----\\nabc\\n-----END KEY-----"',
      '',
      '# PAYMENTS',
      'STRIPE_KEY=v',
      '',
      '# DATABASE',
      'DB_REPLICA=',
    ]);
    expect(content.split('\n')).toHaveLength(artifact.lines.length + 1);
  });

  it('should differ only in the timestamp line between runs', async () => {
    const vault = createFakeVault({ 'shop-dev-db-host': 'db.internal' });
    const app = multiCategoryApp();

    const first = await assembleEnvironment(vault.fetcher, app, 'dev', 'kv1', { now: NOW });
    const second = await assembleEnvironment(vault.fetcher, app, 'dev', 'kv1', {
      now: new Date('2026-03-04T05:06:07.000Z'),
    });

    const firstLines = first.content.split('\n');
    const secondLines = second.content.split('\n');
    const differing = firstLines.filter((line, i) => line !== secondLines[i]);

    expect(differing).toEqual(['# Generated on: 2026-01-02T03:04:05.000Z']);
  });
});

describe('formatArtifact', () => {
  it('should join lines and end with a newline', () => {
    expect(formatArtifact({ lines: ['a', '', 'b'], foundCount: 0, totalCount: 0 })).toBe('a\n\nb\n');
  });
});

describe('formatEnvValue', () => {
  it('should leave plain values untouched', () => {
    expect(formatEnvValue('postgres://u:p@h/db?sslmode=require')).toBe('postgres://u:p@h/db?sslmode=require');
  });

  it('should quote and escape values that span lines', () => {
    expect(formatEnvValue('line1\r\nline2')).toBe('"line1\\r\\nline2"');
  });

  it('should escape quotes and backslashes', () => {
    expect(formatEnvValue('say "hi" C:\\temp')).toBe('"say \\"hi\\" C:\\\\temp"');
  });

  it('should quote values with leading or trailing whitespace', () => {
    expect(formatEnvValue(' padded ')).toBe('" padded "');
  });
});
