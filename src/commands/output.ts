// Path: src/commands/output.ts
// User-facing console output

import chalk from 'chalk';
import ora from 'ora';

/**
 * Status lines go to stderr; `print` writes raw text to stdout
 */
export interface CommandOutput {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  print(text: string): void;
}

export function createConsoleOutput(): CommandOutput {
  return {
    info: (message) => console.error(`${chalk.blue('[INFO]')} ${message}`),
    success: (message) => console.error(`${chalk.green('[SUCCESS]')} ${message}`),
    warn: (message) => console.error(`${chalk.yellow('[WARNING]')} ${message}`),
    error: (message) => console.error(`${chalk.red('[ERROR]')} ${message}`),
    print: (text) => {
      process.stdout.write(text);
    },
  };
}

/**
 * Transient progress display while vault calls are in flight
 */
export interface ProgressReporter {
  start(text: string): void;
  update(text: string): void;
  stop(): void;
}

export function createSpinner(enabled: boolean): ProgressReporter {
  const spinner = ora({ isEnabled: enabled });
  return {
    start: (text) => {
      spinner.start(text);
    },
    update: (text) => {
      spinner.text = text;
    },
    stop: () => {
      spinner.stop();
    },
  };
}
