// Path: src/commands/upload.ts
// Upload env file values to Key Vault

import type { Command } from 'commander';
import { createRunSettings, type RunSettings } from '../lib/config.js';
import { loadCatalog, validateSelection, type Catalog } from '../lib/catalog/index.js';
import { readEnvFile } from '../lib/env-file/index.js';
import { setLogLevel } from '../lib/logger.js';
import {
  createSecretMapping,
  maskValue,
  uploadSecrets,
  type UploadResult,
} from '../lib/uploader.js';
import { KeyVaultSecretStore, type SecretWriter } from '../lib/vault/index.js';
import { AppError } from '../utils/error.js';
import { resolveUserPath } from '../utils/path.js';
import { createConsoleOutput, type CommandOutput } from './output.js';
import { promptSelection, type Selection } from './prompts.js';
import { exitWithError } from './report.js';
import type { UploadCommandOptions } from './types.js';

const RULE = '='.repeat(60);

export interface UploadDependencies {
  writer: SecretWriter;
  output: CommandOutput;
  /** Runs before the first upload; skipped for dry runs */
  preflight?: () => Promise<void>;
}

/**
 * Upload the declared secrets of one application environment from an env file.
 * Returns null when nothing was uploaded (dry run or no values to upload).
 */
export async function runUpload(
  catalog: Catalog,
  selection: Selection,
  envFilePath: string,
  settings: RunSettings,
  deps: UploadDependencies
): Promise<UploadResult | null> {
  const { output } = deps;
  const app = validateSelection(catalog, selection.app, selection.env);

  const envVars = readEnvFile(envFilePath);
  output.info(`Loaded ${Object.keys(envVars).length} environment variables from ${envFilePath}`);

  const { uploads, missingVars } = createSecretMapping(app, selection.env, envVars);
  if (missingVars.length > 0) {
    output.warn('Missing environment variables in env file:');
    for (const name of missingVars) {
      output.warn(`  - ${name}`);
    }
  }
  output.info(`Mapped ${uploads.length} secrets for upload`);

  if (uploads.length === 0) {
    output.warn('No secrets to upload');
    return null;
  }

  if (settings.dryRun) {
    output.info('DRY RUN - Secrets that would be uploaded:');
    const lines = uploads.map((upload) => `${upload.secretName} = ${maskValue(upload.value)}`);
    output.print(`${RULE}\n${lines.join('\n')}\n${RULE}\n`);
    output.info(`Total secrets to upload: ${uploads.length}`);
    return null;
  }

  await deps.preflight?.();
  output.info(`Connected to Key Vault: ${catalog.vaultName}`);

  const result = await uploadSecrets(deps.writer, catalog.vaultName, uploads, (upload, outcome) => {
    if (outcome.ok) {
      output.success(`Uploaded: ${upload.secretName}`);
    } else {
      output.error(`Failed to upload ${upload.secretName}: ${outcome.error}`);
    }
  });

  output.success(`Upload complete: ${result.uploaded.length} secrets uploaded`);
  if (result.failed.length > 0) {
    output.warn(`Failed uploads: ${result.failed.length} secrets`);
  }
  output.info('To generate an env file from the uploaded secrets, use:');
  output.info(`  kv-envgen generate --app ${app.name} --env ${selection.env}`);

  return result;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload secrets from an env file to Key Vault')
    .requiredOption('-f, --env-file <path>', 'Path to the env file containing secrets')
    .option('-a, --app <app>', 'Application name')
    .option('-e, --env <env>', 'Target environment')
    .option('-c, --config <path>', 'Path to app-configs.json')
    .option('-d, --dry-run', 'Show what would be uploaded without uploading')
    .option('-v, --verbose', 'Verbose output')
    .addHelpText('after', `
Examples:
  kv-envgen upload --env-file .env --app my-web-app --env dev
  kv-envgen upload --env-file ./prod.env --app my-web-app --env prod --dry-run
`)
    .action(async (options: UploadCommandOptions) => {
      const output = createConsoleOutput();
      if (options.verbose) {
        setLogLevel('debug');
      }

      try {
        const settings = createRunSettings(options);
        const catalog = loadCatalog(settings.configPath);

        let selection: Selection;
        if (options.app && options.env) {
          selection = { app: options.app, env: options.env };
        } else if (process.stdin.isTTY) {
          selection = await promptSelection(catalog, { app: options.app, env: options.env });
        } else {
          throw new AppError(
            'Both --app and --env are required when not running interactively',
            'MISSING_SELECTION'
          );
        }

        const store = new KeyVaultSecretStore();
        const result = await runUpload(catalog, selection, resolveUserPath(options.envFile), settings, {
          writer: store,
          output,
          preflight: () => store.verifyAccess(catalog.vaultName),
        });

        if (result && result.failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (err) {
        exitWithError(err, output);
      }
    });
}
