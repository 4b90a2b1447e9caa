// Path: src/commands/report.ts
// Rendering of fatal errors for the CLI

import {
  ConfigError,
  UnknownApplicationError,
  UnknownEnvironmentError,
  VaultAccessError,
  extractErrorMessage,
} from '../utils/error.js';
import { cliLogger as log, flushLogs } from '../lib/logger.js';
import type { CommandOutput } from './output.js';

/**
 * Print an error with whatever follow-up the user needs to fix it
 */
export function reportCliError(err: unknown, output: CommandOutput): void {
  if (err instanceof ConfigError) {
    output.error(err.message);
    for (const detail of err.details) {
      output.error(`  - ${detail}`);
    }
    return;
  }

  if (err instanceof UnknownApplicationError) {
    output.error(err.message);
    output.info(`Available applications: ${err.availableApplications.join(', ')}`);
    return;
  }

  if (err instanceof UnknownEnvironmentError) {
    output.error(err.message);
    output.info(`Available environments for ${err.application}: ${err.availableEnvironments.join(', ')}`);
    return;
  }

  if (err instanceof VaultAccessError) {
    const [headline, ...hints] = err.remediation;
    output.error(headline);
    for (const hint of hints) {
      output.info(hint);
    }
    output.info(`Details: ${err.message}`);
    return;
  }

  log.error({ err }, 'Unexpected error');
  output.error(extractErrorMessage(err));
}

/**
 * Report the error and end the process with status 1
 */
export function exitWithError(err: unknown, output: CommandOutput): never {
  reportCliError(err, output);
  flushLogs();
  process.exit(1);
}
