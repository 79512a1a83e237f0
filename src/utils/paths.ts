/**
 * INI Store - Path Utilities
 * @module utils/paths
 */

import { existsSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';

/** Prefix marking the staging file of an in-progress rewrite */
export const DEFAULT_TEMP_PREFIX = '~';

/**
 * Resolve a store path against the working directory
 */
export function resolveStorePath(path: string): string {
  return resolve(path);
}

/**
 * Staging file for a rewrite: same directory, prefixed basename.
 *
 * @example
 * tempPathFor('/etc/app/settings.ini') // '/etc/app/~settings.ini'
 */
export function tempPathFor(filePath: string, prefix = DEFAULT_TEMP_PREFIX): string {
  return join(dirname(filePath), prefix + basename(filePath));
}

export function pathExists(path: string): boolean {
  return existsSync(path);
}
