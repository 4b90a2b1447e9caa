// Path: src/lib/catalog/index.ts
// Public API for the application catalog

export type {
  ApplicationConfig,
  ApplicationDocument,
  ApplicationSummary,
  Catalog,
  CatalogDocument,
  SecretDefinition,
  SecretDefinitionDocument,
  ValidationIssue,
  ValidationResult,
} from './types.js';

export { loadCatalog, parseCatalog } from './loader.js';
export { listApplications, validateSelection } from './selection.js';
export { validateCatalogDocument, formatValidationIssues } from './validation.js';
