// Path: src/commands/list-apps.ts
// List applications and environments from the catalog

import type { Command } from 'commander';
import chalk from 'chalk';
import { createRunSettings } from '../lib/config.js';
import { listApplications, loadCatalog, type Catalog } from '../lib/catalog/index.js';
import { createConsoleOutput } from './output.js';
import { exitWithError } from './report.js';
import type { ListAppsCommandOptions } from './types.js';

/**
 * Human-readable listing, one block per application
 */
export function formatApplicationList(catalog: Catalog): string {
  const lines: string[] = [];

  for (const app of listApplications(catalog)) {
    lines.push(`  ${chalk.cyan(app.name)} (${app.description}):`);
    lines.push(`    Environments: ${app.environments.join(', ')}`);
    lines.push(`    Secrets: ${app.secretCount} configured`);
    lines.push('');
  }

  return lines.join('\n');
}

export function registerListAppsCommand(program: Command): void {
  program
    .command('list-apps')
    .description('List available applications and environments')
    .option('-c, --config <path>', 'Path to app-configs.json')
    .option('--json', 'Output as JSON')
    .action((options: ListAppsCommandOptions) => {
      const output = createConsoleOutput();

      try {
        const settings = createRunSettings(options);
        const catalog = loadCatalog(settings.configPath);

        if (options.json) {
          output.print(JSON.stringify(listApplications(catalog), null, 2) + '\n');
          return;
        }

        output.info('Available applications and environments:');
        output.print('\n' + formatApplicationList(catalog) + '\n');
      } catch (err) {
        exitWithError(err, output);
      }
    });
}
