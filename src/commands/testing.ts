// Path: src/commands/testing.ts
// Recording output for command tests

import type { CommandOutput } from './output.js';

export interface RecordingOutput extends CommandOutput {
  /** Status lines as "<level>: <message>" */
  lines: string[];
  /** Raw stdout text */
  printed: string[];
}

export function createRecordingOutput(): RecordingOutput {
  const lines: string[] = [];
  const printed: string[] = [];
  return {
    lines,
    printed,
    info: (message) => lines.push(`info: ${message}`),
    success: (message) => lines.push(`success: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    print: (text) => printed.push(text),
  };
}
