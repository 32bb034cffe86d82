/**
 * @shkit/config
 *
 * Configuration system for shkit with YAML-first design
 * and Zod schema validation.
 *
 * @example Basic YAML configuration
 * ```yaml
 * # shkit.config.yaml
 * dependencies:
 *   commands: [rsync, logger]
 *
 * logging:
 *   tag: nightly-backup
 *   level: notice
 *   syslog: true
 *   facility: local0
 *
 * remove:
 *   protectedPaths: [/srv/backups]
 * ```
 */

// Core schema types and validation
export {
  type DependenciesConfig,
  type LoggingConfig,
  type RemoveConfig,
  type ShkitConfig,
  type ResolvedShkitConfig,
  DependenciesConfigSchema,
  LoggingConfigSchema,
  RemoveConfigSchema,
  ShkitConfigSchema,
  validateConfig,
  safeValidateConfig,
} from './schema.js';

export { formatZodIssues, type SafeValidationResult } from './schema-utils.js';

// Config loading
export {
  CONFIG_FILE_NAME,
  loadConfigFromFile,
  safeLoadConfigFromFile,
  findAndLoadConfig,
} from './loader.js';

export { defineConfig } from './define-config.js';
export { generateJsonSchema } from './schema-export.js';
export { LOGGING_DEFAULTS } from './constants.js';
