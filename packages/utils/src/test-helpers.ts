/**
 * Shared Test Helpers
 *
 * Common utilities for tests across all packages
 */

import { chmodSync, mkdtempSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { normalizedTmpdir } from './path-helpers.js';

/**
 * Create a unique temporary test directory
 *
 * @returns Real path to the created temporary directory
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(() => {
 *   testDir = createTempTestDir();
 * });
 * ```
 */
export function createTempTestDir(prefix: string = 'shkit-test-'): string {
  return mkdtempSync(join(normalizedTmpdir(), prefix));
}

/**
 * Write an executable shell script into a directory
 *
 * @param dir - Directory that plays the role of a search path entry
 * @param name - Command name
 * @param body - Script body after the shebang line (default: exit 0)
 * @returns Absolute path of the script
 *
 * @example
 * ```typescript
 * writeFakeExecutable(binDir, 'logger', 'echo "$@" >> "$LOG_FILE"');
 * ```
 */
export function writeFakeExecutable(dir: string, name: string, body: string = 'exit 0'): string {
  const path = join(dir, name);
  writeFileSync(path, `#!/bin/sh\n${body}\n`);
  chmodSync(path, 0o755);
  return path;
}
