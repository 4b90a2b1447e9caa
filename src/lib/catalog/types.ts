// Path: src/lib/catalog/types.ts
// Application catalog type definitions

/**
 * Secret entry as written in app-configs.json
 */
export interface SecretDefinitionDocument {
  env_var: string;
  vault_key: string;
  category: string;
  description?: string;
}

/**
 * Application entry as written in app-configs.json
 */
export interface ApplicationDocument {
  description?: string;
  environments: string[];
  secrets: SecretDefinitionDocument[];
}

/**
 * Root of app-configs.json
 */
export interface CatalogDocument {
  vault_name: string;
  applications: Record<string, ApplicationDocument>;
}

/**
 * A declared secret of an application
 */
export interface SecretDefinition {
  /** Variable name written to the env file */
  readonly envVar: string;
  /** Suffix of the vault secret name */
  readonly vaultKey: string;
  /** Grouping label in the generated file */
  readonly category: string;
  readonly description: string;
}

export interface ApplicationConfig {
  readonly name: string;
  readonly description: string;
  /** Environment names in declaration order */
  readonly environments: readonly string[];
  /** Secrets in declaration order */
  readonly secrets: readonly SecretDefinition[];
}

/**
 * Fully validated catalog. Application iteration order is declaration order.
 */
export interface Catalog {
  readonly vaultName: string;
  readonly applications: ReadonlyMap<string, ApplicationConfig>;
}

/**
 * Row of the application listing
 */
export interface ApplicationSummary {
  name: string;
  description: string;
  environments: readonly string[];
  secretCount: number;
}

export interface ValidationIssue {
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
