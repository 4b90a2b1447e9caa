// Path: src/commands/generate.ts
// Generate an env file from Key Vault secrets

import type { Command } from 'commander';
import {
  DEFAULT_OUTPUT_FILE,
  createGenerateSettings,
  createRunSettings,
  type GenerateSettings,
} from '../lib/config.js';
import { loadCatalog, validateSelection, type Catalog } from '../lib/catalog/index.js';
import { assembleEnvironment, type FetchSummary } from '../lib/env-file/index.js';
import { setLogLevel } from '../lib/logger.js';
import { KeyVaultSecretStore, type SecretFetcher } from '../lib/vault/index.js';
import { AppError } from '../utils/error.js';
import { countLines, writeAtomic } from '../utils/file.js';
import { createConsoleOutput, createSpinner, type CommandOutput, type ProgressReporter } from './output.js';
import { promptOutputPath, promptSelection, type Selection } from './prompts.js';
import { exitWithError } from './report.js';
import type { GenerateCommandOptions } from './types.js';

export const PREVIEW_RULE = '-'.repeat(40);

export interface GenerateDependencies {
  fetcher: SecretFetcher;
  output: CommandOutput;
  /** Runs after validation and before the first secret fetch */
  preflight?: () => Promise<void>;
  progress?: ProgressReporter;
  now?: Date;
}

export interface GenerateResult {
  content: string;
  summary: FetchSummary;
  /** False for dry runs */
  written: boolean;
}

/**
 * Print the fetch summary and, when secrets are missing, how to add them
 */
export function reportSummary(summary: FetchSummary, vaultName: string, output: CommandOutput): void {
  output.info(`Secrets summary: ${summary.foundCount}/${summary.totalCount} found`);

  if (summary.missingSecretNames.length > 0) {
    output.warn('Missing secrets in Key Vault:');
    for (const name of summary.missingSecretNames) {
      output.warn(`  - ${name}`);
    }
    output.info('To add missing secrets, use:');
    output.info(`az keyvault secret set --vault-name "${vaultName}" --name "SECRET_NAME" --value "SECRET_VALUE"`);
    output.info('or upload a filled-in env file with: kv-envgen upload --env-file <path>');
  }
}

/**
 * Validate the selection, assemble the env file in memory, then preview or write it.
 * Nothing touches the output path unless every secret lookup completed.
 */
export async function runGenerate(
  catalog: Catalog,
  selection: Selection,
  settings: GenerateSettings,
  deps: GenerateDependencies
): Promise<GenerateResult> {
  const { output } = deps;
  const app = validateSelection(catalog, selection.app, selection.env);

  await deps.preflight?.();

  output.info(`Generating .env content for ${app.name} (${selection.env} environment)...`);

  deps.progress?.start('Fetching secrets...');
  const { content, summary } = await assembleEnvironment(
    deps.fetcher,
    app,
    selection.env,
    catalog.vaultName,
    {
      now: deps.now,
      onResolved: (_secret, index, total) => {
        deps.progress?.update(`Fetching secrets (${index + 1}/${total})...`);
      },
    }
  ).finally(() => deps.progress?.stop());

  reportSummary(summary, catalog.vaultName, output);

  if (settings.dryRun) {
    output.info(`DRY RUN - Content that would be written to ${settings.outputPath}:`);
    output.print(`${PREVIEW_RULE}\n${content}${PREVIEW_RULE}\n`);
    return { content, summary, written: false };
  }

  writeAtomic(settings.outputPath, content, { mode: 0o600 });
  output.success(`Environment file generated: ${settings.outputPath}`);
  output.info(`File contains ${countLines(content)} lines`);

  return { content, summary, written: true };
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate', { isDefault: true })
    .description('Generate an env file from Key Vault secrets')
    .option('-a, --app <app>', 'Application name')
    .option('-e, --env <env>', 'Environment (dev, staging, prod, ...)')
    .option('-o, --output <path>', `Output file path (default: ${DEFAULT_OUTPUT_FILE})`)
    .option('-c, --config <path>', 'Path to app-configs.json')
    .option('-d, --dry-run', 'Show what would be generated without creating the file')
    .option('-v, --verbose', 'Verbose output')
    .addHelpText('after', `
Examples:
  kv-envgen                                   # Interactive mode
  kv-envgen generate --app my-web-app --env dev
  kv-envgen generate --app my-web-app --env prod --output ./prod.env
  kv-envgen generate --dry-run --app my-web-app --env dev
`)
    .action(async (options: GenerateCommandOptions) => {
      const output = createConsoleOutput();
      if (options.verbose) {
        setLogLevel('debug');
      }

      try {
        const base = createRunSettings(options);
        const catalog = loadCatalog(base.configPath);
        output.info(`Found Key Vault: ${catalog.vaultName}`);

        let selection: Selection;
        let outputPath = options.output;
        if (options.app && options.env) {
          selection = { app: options.app, env: options.env };
        } else {
          if (!process.stdin.isTTY) {
            throw new AppError(
              'Both --app and --env are required when not running interactively',
              'MISSING_SELECTION'
            );
          }
          selection = await promptSelection(catalog, { app: options.app, env: options.env });
          outputPath ??= await promptOutputPath(DEFAULT_OUTPUT_FILE);
        }

        const settings = createGenerateSettings({ ...options, output: outputPath });
        const store = new KeyVaultSecretStore();

        await runGenerate(catalog, selection, settings, {
          fetcher: store,
          output,
          preflight: () => store.verifyAccess(catalog.vaultName),
          progress: createSpinner(!settings.verbose && process.stderr.isTTY === true),
        });
      } catch (err) {
        exitWithError(err, output);
      }
    });
}
