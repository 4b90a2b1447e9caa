// Path: src/lib/env-file/index.ts
// Public API for env file assembly and parsing

export type {
  AssemblyTarget,
  EnvironmentArtifact,
  FetchSummary,
  ResolvedSecret,
  ResolveProgressHandler,
} from './types.js';

export {
  HEADER_RULE,
  assembleEnvironment,
  formatEnvValue,
  formatArtifact,
  render,
  resolveSecrets,
  summarize,
} from './assembler.js';

export { parseEnvFile, readEnvFile } from './parser.js';

export { buildSecretName, isValidVaultSecretName } from '../secret-name.js';
