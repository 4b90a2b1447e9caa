// Path: src/lib/catalog/selection.ts
// Application listing and app/environment validation

import { UnknownApplicationError, UnknownEnvironmentError } from '../../utils/error.js';
import type { ApplicationConfig, ApplicationSummary, Catalog } from './types.js';

/**
 * Summaries of every application, in declaration order
 */
export function listApplications(catalog: Catalog): ApplicationSummary[] {
  return Array.from(catalog.applications.values(), (app) => ({
    name: app.name,
    description: app.description,
    environments: app.environments,
    secretCount: app.secrets.length,
  }));
}

/**
 * Resolve an application and check the environment belongs to it.
 *
 * @throws UnknownApplicationError with every application name
 * @throws UnknownEnvironmentError with the application's environments
 */
export function validateSelection(
  catalog: Catalog,
  appName: string,
  envName: string
): ApplicationConfig {
  const app = catalog.applications.get(appName);
  if (!app) {
    throw new UnknownApplicationError(appName, Array.from(catalog.applications.keys()));
  }

  if (!app.environments.includes(envName)) {
    throw new UnknownEnvironmentError(appName, envName, app.environments);
  }

  return app;
}
