// Path: src/lib/catalog/loader.ts
// Catalog loading from app-configs.json

import fs from 'node:fs';
import { ConfigError, extractErrorMessage } from '../../utils/error.js';
import { catalogLogger as log } from '../logger.js';
import type { Catalog } from './types.js';
import { formatValidationIssues, validateCatalogDocument } from './validation.js';

/**
 * Build a catalog from an already parsed document.
 *
 * @param document - Parsed JSON value
 * @param source - Where the document came from, used in error messages
 * @throws ConfigError listing every problem when the document is invalid
 */
export function parseCatalog(document: unknown, source = 'configuration'): Catalog {
  const { result, catalog } = validateCatalogDocument(document);

  for (const warning of result.warnings) {
    log.warn({ field: warning.field, source }, warning.message);
  }

  if (!catalog) {
    throw new ConfigError(
      `Invalid configuration file: ${source}`,
      formatValidationIssues(result.errors)
    );
  }

  log.debug(
    { source, vaultName: catalog.vaultName, applications: catalog.applications.size },
    'Catalog loaded'
  );
  return catalog;
}

/**
 * Load and validate the catalog file.
 *
 * @throws ConfigError when the file is missing, unreadable, not JSON or invalid
 */
export function loadCatalog(configPath: string): Catalog {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read configuration file: ${configPath}`,
      [extractErrorMessage(err)],
      { cause: err }
    );
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse configuration file: ${configPath}`,
      [extractErrorMessage(err)],
      { cause: err }
    );
  }

  return parseCatalog(document, configPath);
}
