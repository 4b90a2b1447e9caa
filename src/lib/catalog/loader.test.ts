// Path: src/lib/catalog/loader.test.ts
// Unit tests for catalog loading

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadCatalog, parseCatalog } from './loader.js';
import { ConfigError } from '../../utils/error.js';

describe('loadCatalog', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kv-envgen-catalog-'));
  });

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should load a valid configuration file', () => {
    const configPath = path.join(testDir, 'app-configs.json');
    fs.writeFileSync(configPath, JSON.stringify({
      vault_name: 'kv1',
      applications: {
        app1: {
          description: 'd',
          environments: ['dev'],
          secrets: [{ env_var: 'X', vault_key: 'x', category: 'c1', description: 'd' }],
        },
      },
    }));

    const catalog = loadCatalog(configPath);

    expect(catalog.vaultName).toBe('kv1');
    expect(catalog.applications.get('app1')?.secrets).toHaveLength(1);
  });

  it('should throw ConfigError when the file does not exist', () => {
    const configPath = path.join(testDir, 'missing.json');

    expect(() => loadCatalog(configPath)).toThrow(ConfigError);
    expect(() => loadCatalog(configPath)).toThrow(`Configuration file not found: ${configPath}`);
  });

  it('should throw ConfigError when the file is not JSON', () => {
    const configPath = path.join(testDir, 'app-configs.json');
    fs.writeFileSync(configPath, '{ not json');

    expect(() => loadCatalog(configPath)).toThrow(`Failed to parse configuration file: ${configPath}`);
  });

  it('should throw ConfigError with details when vault_name is missing', () => {
    const configPath = path.join(testDir, 'app-configs.json');
    fs.writeFileSync(configPath, JSON.stringify({ applications: {} }));

    try {
      loadCatalog(configPath);
      expect.unreachable('loadCatalog should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('CONFIG_INVALID');
        expect(err.message).toBe(`Invalid configuration file: ${configPath}`);
        expect(err.details).toEqual(['vault_name: vault_name is required']);
      }
    }
  });
});

describe('parseCatalog', () => {
  it('should name the source in the error message', () => {
    expect(() => parseCatalog(null, 'inline')).toThrow('Invalid configuration file: inline');
  });
});
