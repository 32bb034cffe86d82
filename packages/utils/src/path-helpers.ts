/**
 * Path Helpers
 *
 * Absolute-path resolution and trailing-slash trimming for scripts, plus
 * Windows-safe temp-dir helpers that handle 8.3 short names (e.g., RUNNER~1).
 *
 * @package @shkit/utils
 */

import { tmpdir } from 'node:os';
import { mkdirSync, realpathSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Temp directory with symlinks and Windows short names resolved
 *
 * tmpdir() can return `C:\Users\RUNNER~1\...` on Windows or a symlinked
 * `/var/folders/...` on macOS, while files created under it report the long,
 * real path. Tests compare against this value instead.
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}

/**
 * mkdirSync() that returns the real path of the created directory
 *
 * @example
 * const dir = mkdirSyncReal(join(normalizedTmpdir(), 'shkit-test'), { recursive: true });
 */
export function mkdirSyncReal(
  path: string,
  options?: Parameters<typeof mkdirSync>[1]
): string {
  mkdirSync(path, options);
  return normalizePath(path);
}

/**
 * Resolve symlinks and Windows short names in an existing path
 *
 * @param path - Path to normalize
 * @returns Real (normalized) path, or original if normalization fails
 *
 * @example
 * ```typescript
 * const shortPath = 'C:\\PROGRA~1\\nodejs';
 * const longPath = normalizePath(shortPath);
 * // Result: 'C:\\Program Files\\nodejs'
 * ```
 */
export function normalizePath(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return path;
  }
}

export interface AbsolutePathOptions {
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Resolve symlinks when the path exists (default: false) */
  physical?: boolean;
}

/**
 * Resolve a path to an absolute one
 *
 * Lexical by default: `.` and `..` segments are collapsed without touching
 * the filesystem. With `physical`, an existing path also has its symlinks
 * resolved; a path that does not exist stays lexical.
 *
 * @example
 * absolutePath('../logs', { cwd: '/srv/app' }); // '/srv/logs'
 * absolutePath('');                              // process.cwd()
 */
export function absolutePath(path: string, options: AbsolutePathOptions = {}): string {
  const absolute = resolve(options.cwd ?? process.cwd(), path);
  return options.physical ? normalizePath(absolute) : absolute;
}

/**
 * Remove every trailing slash from a path
 *
 * A path made only of slashes collapses to its first character, so the
 * filesystem root stays a root. Backslashes count as slashes on Windows.
 *
 * @example
 * trimTrailingSlashes('/var/log//'); // '/var/log'
 * trimTrailingSlashes('///');        // '/'
 */
export function trimTrailingSlashes(path: string): string {
  const pattern = process.platform === 'win32' ? /[/\\]+$/ : /\/+$/;
  const trimmed = path.replace(pattern, '');
  if (trimmed === '' && path !== '') {
    return path.charAt(0);
  }
  return trimmed;
}
