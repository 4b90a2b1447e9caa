// Path: src/lib/env-file/parser.ts
// Env file parsing for uploads

import fs from 'node:fs';

const DOUBLE_QUOTE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  '"': '"',
  '\\': '\\',
};

/**
 * Parse an env file into a Map of key-value pairs
 * Handles:
 *   KEY=value
 *   KEY="quoted value"
 *   KEY="value with \"escaped\" quotes and \n newlines"
 *   KEY='single quoted'
 *   # comments
 *   export KEY=value
 */
export function parseEnvFile(content: string): Map<string, string> {
  const result = new Map<string, string>();

  for (const line of content.split(/\r?\n/)) {
    let trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    if (trimmed.startsWith('export ')) {
      trimmed = trimmed.substring(7).trim();
    }

    const eqIndex = trimmed.indexOf('=');
    if (eqIndex === -1) continue;

    const key = trimmed.substring(0, eqIndex).trim();
    if (!key) continue;
    let value = trimmed.substring(eqIndex + 1).trim();

    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value
        .substring(1, value.length - 1)
        .replace(/\\([nr"\\])/g, (_match, ch: string) => DOUBLE_QUOTE_ESCAPES[ch] ?? ch);
    } else if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
      value = value.substring(1, value.length - 1);
    }

    result.set(key, value);
  }

  return result;
}

/**
 * Read an env file and keep only variables with a non-empty value
 *
 * @throws Error when the file does not exist or cannot be read
 */
export function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Environment file not found: ${filePath}`);
  }

  const values: Record<string, string> = {};
  for (const [key, value] of parseEnvFile(fs.readFileSync(filePath, 'utf-8'))) {
    if (value !== '') {
      values[key] = value;
    }
  }
  return values;
}
