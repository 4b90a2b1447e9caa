// Path: src/lib/config.ts
// Run settings resolved once at startup

import path from 'node:path';
import { resolveUserPath } from '../utils/path.js';

/** Environment variable overriding the catalog location */
export const CONFIG_PATH_ENV = 'KV_ENVGEN_CONFIG';
export const DEFAULT_CONFIG_FILE = 'app-configs.json';
export const DEFAULT_OUTPUT_FILE = './.env';

/**
 * Immutable settings for one command invocation
 */
export interface RunSettings {
  /** Absolute path of app-configs.json */
  readonly configPath: string;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

export interface GenerateSettings extends RunSettings {
  /** Absolute path the env file is written to */
  readonly outputPath: string;
}

export interface RunSettingsInput {
  config?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Locate the catalog: --config, then KV_ENVGEN_CONFIG, then ./app-configs.json
 */
export function resolveConfigPath(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const configured = option ?? env[CONFIG_PATH_ENV];
  return path.resolve(cwd, configured && configured !== '' ? configured : DEFAULT_CONFIG_FILE);
}

export function createRunSettings(
  input: RunSettingsInput,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RunSettings {
  return Object.freeze({
    configPath: resolveConfigPath(input.config, env, cwd),
    dryRun: input.dryRun ?? false,
    verbose: input.verbose ?? false,
  });
}

export function createGenerateSettings(
  input: RunSettingsInput & { output?: string },
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): GenerateSettings {
  return Object.freeze({
    ...createRunSettings(input, env, cwd),
    outputPath: resolveUserPath(input.output || DEFAULT_OUTPUT_FILE, cwd),
  });
}
