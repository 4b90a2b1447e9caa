// Path: src/lib/catalog/selection.test.ts
// Unit tests for application listing and selection

import { describe, it, expect } from 'vitest';
import { parseCatalog } from './loader.js';
import { listApplications, validateSelection } from './selection.js';
import { UnknownApplicationError, UnknownEnvironmentError } from '../../utils/error.js';

const catalog = parseCatalog({
  vault_name: 'kv-test',
  applications: {
    'web-app': {
      description: 'Web frontend',
      environments: ['dev', 'prod'],
      secrets: [
        { env_var: 'DATABASE_URL', vault_key: 'database-url', category: 'database', description: '' },
        { env_var: 'REDIS_URL', vault_key: 'redis-url', category: 'cache', description: '' },
      ],
    },
    api: {
      description: 'Backend API',
      environments: ['staging'],
      secrets: [],
    },
  },
});

describe('listApplications', () => {
  it('should list applications in declaration order', () => {
    expect(listApplications(catalog)).toEqual([
      { name: 'web-app', description: 'Web frontend', environments: ['dev', 'prod'], secretCount: 2 },
      { name: 'api', description: 'Backend API', environments: ['staging'], secretCount: 0 },
    ]);
  });
});

describe('validateSelection', () => {
  it('should return the application for a valid pair', () => {
    const app = validateSelection(catalog, 'web-app', 'prod');
    expect(app.name).toBe('web-app');
  });

  it('should reject an unknown application with every application name', () => {
    try {
      validateSelection(catalog, 'mobile', 'dev');
      expect.unreachable('validateSelection should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownApplicationError);
      if (err instanceof UnknownApplicationError) {
        expect(err.message).toBe("Application 'mobile' not found in configuration.");
        expect(err.availableApplications).toEqual(['web-app', 'api']);
      }
    }
  });

  it("should reject an environment outside the application's list", () => {
    try {
      validateSelection(catalog, 'api', 'dev');
      expect.unreachable('validateSelection should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownEnvironmentError);
      if (err instanceof UnknownEnvironmentError) {
        expect(err.message).toBe("Environment 'dev' not available for application 'api'.");
        expect(err.availableEnvironments).toEqual(['staging']);
      }
    }
  });
});
