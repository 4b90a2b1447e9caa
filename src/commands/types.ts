// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'generate' command
 */
export interface GenerateCommandOptions {
  app?: string;
  env?: string;
  output?: string;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Options for the 'list-apps' command
 */
export interface ListAppsCommandOptions {
  config?: string;
  json?: boolean;
}

/**
 * Options for the 'upload' command
 */
export interface UploadCommandOptions {
  envFile: string;
  app?: string;
  env?: string;
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}
