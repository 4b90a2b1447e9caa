// Path: src/utils/file.ts
// Atomic file write utilities - prevent partial writes

import fs from 'node:fs';
import path from 'node:path';
import { validateOutputPath } from './path.js';

export interface AtomicWriteOptions {
  /**
   * File permissions (octal number, e.g., 0o600).
   * Defaults to 0o600.
   */
  mode?: number;
}

/**
 * Write content to a file atomically.
 *
 * Uses temp file + rename pattern to ensure the file is either
 * fully written or not modified at all.
 *
 * @param filePath - Absolute path to target file
 * @param content - Content to write
 * @param options - Write options
 */
export function writeAtomic(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): void {
  validateOutputPath(filePath);

  const mode = options.mode ?? 0o600;
  const dir = path.dirname(filePath);
  const tempPath = `${filePath}.tmp.${process.pid}`;

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o750 });
  }

  try {
    fs.writeFileSync(tempPath, content, { mode });
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    // Remove the temp file, then surface the original failure
    if (fs.existsSync(tempPath)) {
      fs.rmSync(tempPath, { force: true });
    }
    throw err;
  }
}

/**
 * Count the lines of a text file the way `wc -l` does.
 */
export function countLines(content: string): number {
  let count = 0;
  for (const ch of content) {
    if (ch === '\n') count++;
  }
  return count;
}
