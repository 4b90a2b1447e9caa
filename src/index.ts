#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerGenerateCommand } from './commands/generate.js';
import { registerListAppsCommand } from './commands/list-apps.js';
import { registerUploadCommand } from './commands/upload.js';

// Read version from package.json at runtime
function getVersion(): string {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('kv-envgen')
  .description('Generate env files from Azure Key Vault secrets')
  .version(getVersion());

registerGenerateCommand(program);
registerListAppsCommand(program);
registerUploadCommand(program);

await program.parseAsync();
