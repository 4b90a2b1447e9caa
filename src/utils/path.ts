// Path: src/utils/path.ts
// Output path resolution and validation

import path from 'node:path';

/**
 * Check if a path is safe to hand to the filesystem.
 * Rejects null bytes, which can truncate paths in some systems.
 */
export function isPathSafe(userPath: string): boolean {
  return !userPath.includes('\0');
}

/**
 * Validate an output path for file operations.
 *
 * @throws Error if the path is empty, relative or unsafe
 */
export function validateOutputPath(filePath: string): void {
  if (!filePath) {
    throw new Error('Path cannot be empty');
  }

  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  if (!isPathSafe(filePath)) {
    throw new Error(`Invalid path: ${filePath}`);
  }
}

/**
 * Resolve a user-supplied path against a base directory.
 *
 * @param userPath - Path as typed on the command line or in a prompt
 * @param baseDir - Directory relative paths are resolved from
 */
export function resolveUserPath(userPath: string, baseDir: string = process.cwd()): string {
  const resolved = path.resolve(baseDir, userPath);
  validateOutputPath(resolved);
  return resolved;
}
