// Path: src/lib/logger.ts
// Centralized Pino logger for kv-envgen

import pino from 'pino';
import { createRequire } from 'node:module';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;
const logFile = process.env.LOG_FILE;
const defaultLevel = process.env.LOG_LEVEL ?? 'warn';

// Cache the result
let pinoPrettyAvailable: boolean | null = null;

function isPinoPrettyAvailable(): boolean {
  if (pinoPrettyAvailable === null) {
    try {
      createRequire(import.meta.url).resolve('pino-pretty');
      pinoPrettyAvailable = true;
    } catch {
      pinoPrettyAvailable = false;
    }
  }
  return pinoPrettyAvailable;
}

/**
 * Pretty-print to stderr when running interactively and pino-pretty resolves.
 * stdout is reserved for dry-run previews and JSON listings.
 */
function createTransport(): pino.TransportSingleOptions | undefined {
  if (logFile || isTest || !process.stderr.isTTY || !isPinoPrettyAvailable()) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      destination: 2,
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,service',
    },
  };
}

const transport = createTransport();

/**
 * Base logger instance
 *
 * Configure via environment variables:
 * - LOG_LEVEL: trace, debug, info, warn, error, fatal, silent (default: warn)
 * - LOG_FILE: write JSON logs to this file instead of stderr
 */
export const logger = pino(
  {
    level: defaultLevel,
    transport,
    base: {
      service: 'kv-envgen',
      pid: process.pid,
    },
    // Secret values never reach the log output
    redact: {
      paths: ['value', 'secretValue', 'lookup.value'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  transport ? undefined : pino.destination({ dest: logFile ?? 2, sync: true, mkdir: logFile !== undefined })
);

const moduleLoggers: pino.Logger[] = [];

/**
 * Create a child logger with additional context
 *
 * @example
 * const log = createLogger({ module: 'vault' });
 * log.debug({ secretName }, 'Fetching secret');
 */
export function createLogger(context: Record<string, unknown>): pino.Logger {
  const child = logger.child(context);
  moduleLoggers.push(child);
  return child;
}

// Pre-configured module loggers
export const catalogLogger = createLogger({ module: 'catalog' });
export const vaultLogger = createLogger({ module: 'vault' });
export const assembleLogger = createLogger({ module: 'assembler' });
export const uploadLogger = createLogger({ module: 'uploader' });
export const cliLogger = createLogger({ module: 'cli' });

/**
 * Change the level of the base logger and every module logger.
 * Child loggers copy their level at creation, so they are updated one by one.
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  logger.level = level;
  for (const child of moduleLoggers) {
    child.level = level;
  }
}

/**
 * Flush pending log lines before process exit
 */
export function flushLogs(): void {
  logger.flush();
}

export type Logger = pino.Logger;
