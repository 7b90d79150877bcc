/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFile } from 'node:fs/promises';
import { ParseError, TemplateError } from './types.js';

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof ParseError) {
    return `Parse error: ${err.message}`;
  }

  if (err instanceof TemplateError) {
    return err.message;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Read the package version from package.json next to dist/ or src/.
 */
export async function readVersion(): Promise<string> {
  const content = await readFile(
    new URL('../package.json', import.meta.url),
    'utf-8'
  );
  const data: unknown = JSON.parse(content);
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}
