/**
 * Configuration Loader
 *
 * Loads and resolves shkit configuration from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';

import { logDebug } from '@shkit/utils';
import { parse as parseYaml } from 'yaml';

import { safeValidateConfig, validateConfig, type ResolvedShkitConfig } from './schema.js';
import type { SafeValidationResult } from './schema-utils.js';

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'shkit.config.yaml';

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration
 * @throws Error if file cannot be loaded or is invalid
 */
export function loadConfigFromFile(configPath: string): ResolvedShkitConfig {
  const absolutePath = readableConfigPath(configPath);
  const document = toConfigDocument(parseYaml(readFileSync(absolutePath, 'utf-8')));

  logDebug('config', `Loaded ${absolutePath}`);
  return anchorPaths(validateConfig(document), dirname(absolutePath));
}

/**
 * Load configuration from a file path, returning errors instead of throwing
 *
 * YAML syntax errors, a document that is not a mapping and schema violations
 * all come back as messages. An unreadable file still throws.
 *
 * @param configPath - Path to config file (must be .yaml)
 */
export function safeLoadConfigFromFile(configPath: string): SafeValidationResult<ResolvedShkitConfig> {
  const absolutePath = readableConfigPath(configPath);
  const content = readFileSync(absolutePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, errors: [`YAML syntax error: ${message}`] };
  }

  let document: Record<string, unknown>;
  try {
    document = toConfigDocument(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, errors: [message] };
  }

  const result = safeValidateConfig(document);
  if (!result.success) {
    return result;
  }

  logDebug('config', `Loaded ${absolutePath}`);
  return { success: true, data: anchorPaths(result.data, dirname(absolutePath)) };
}

/**
 * Load shkit.config.yaml from a directory
 *
 * A missing file is not an error; an unreadable or invalid one is.
 *
 * @param cwd - Directory to look in (default: process.cwd())
 * @returns Loaded configuration or undefined if no config file exists
 */
export function findAndLoadConfig(
  cwd: string = process.cwd()
): ResolvedShkitConfig | undefined {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    logDebug('config', `No config at ${configPath}`);
    return undefined;
  }

  return loadConfigFromFile(configPath);
}

function readableConfigPath(configPath: string): string {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml')) {
    throw new Error(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.\n` +
      `Please use ${CONFIG_FILE_NAME}`
    );
  }
  return absolutePath;
}

/**
 * Check the parsed YAML is a mapping and drop `$schema`
 */
function toConfigDocument(raw: unknown): Record<string, unknown> {
  // An empty file parses to null: every section takes its defaults
  const document = raw ?? {};

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new Error('Configuration must be an object');
  }

  // $schema is only there for IDE support
  return Object.fromEntries(Object.entries(document).filter(([key]) => key !== '$schema'));
}

/**
 * Anchor relative protected paths at the config directory
 */
function anchorPaths(config: ResolvedShkitConfig, basePath: string): ResolvedShkitConfig {
  config.remove.protectedPaths = config.remove.protectedPaths.map(path => resolve(basePath, path));
  return config;
}
