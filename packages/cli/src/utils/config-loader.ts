/**
 * Configuration Loader
 *
 * Finds shkit.config.yaml by walking up from the working directory and
 * loads it through @shkit/config.
 */

import { existsSync } from 'node:fs';
import { join, dirname, resolve } from 'node:path';

import {
  CONFIG_FILE_NAME,
  findAndLoadConfig,
  safeLoadConfigFromFile,
  validateConfig,
  type ResolvedShkitConfig,
} from '@shkit/config';

/**
 * Find configuration directory by walking up directory tree
 *
 * Searches for shkit.config.yaml starting from startDir and walking up
 * to the root directory, the way linters and formatters find theirs.
 *
 * @param startDir Directory to start searching from
 * @returns Directory containing the config file, or null if not found
 */
export function findConfigUp(startDir: string): string | null {
  let currentDir = resolve(startDir);

  while (true) {
    if (existsSync(join(currentDir, CONFIG_FILE_NAME))) {
      return currentDir;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Find config file path if it exists (searches up directory tree)
 *
 * @param cwd Current working directory
 * @returns Config file path or null if not found
 */
export function findConfigPath(cwd?: string): string | null {
  const configDir = findConfigUp(cwd ?? process.cwd());
  return configDir ? join(configDir, CONFIG_FILE_NAME) : null;
}

/**
 * Load shkit configuration, falling back to defaults when no file exists
 *
 * @param cwd Current working directory (defaults to process.cwd())
 * @returns Resolved configuration
 * @throws Error if a config file exists but is unreadable or invalid
 */
export function loadConfig(cwd?: string): ResolvedShkitConfig {
  const configDir = findConfigUp(cwd ?? process.cwd());
  if (!configDir) {
    return validateConfig({});
  }
  return findAndLoadConfig(configDir) ?? validateConfig({});
}

/**
 * Load configuration with detailed validation errors
 *
 * @param cwd Current working directory (defaults to process.cwd())
 * @returns Object with config, errors, and file path
 */
export function loadConfigWithErrors(cwd?: string): {
  config: ResolvedShkitConfig | null;
  errors: string[] | null;
  filePath: string | null;
} {
  const filePath = findConfigPath(cwd);

  if (!filePath) {
    return { config: null, errors: null, filePath: null };
  }

  const result = safeLoadConfigFromFile(filePath);
  if (!result.success) {
    return { config: null, errors: result.errors, filePath };
  }

  return { config: result.data, errors: null, filePath };
}
