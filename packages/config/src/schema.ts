/**
 * Configuration Schema with Zod Validation
 *
 * Provides runtime validation and type safety for shkit.config.yaml.
 */

import { LOG_LEVELS, SYSLOG_FACILITIES } from '@shkit/utils';
import { z } from 'zod';

import { LOGGING_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * Dependencies Schema
 *
 * External programs a script needs before it starts.
 */
export const DependenciesConfigSchema = z.object({
  /** Bare command names that must resolve on the search path (default: []) */
  commands: z.array(z.string().min(1, 'Command name cannot be empty')).default([]),

  /** Optional: Directories searched instead of PATH */
  searchPath: z.array(z.string().min(1, 'Search path entry cannot be empty')).optional(),
}).strict();

export type DependenciesConfig = z.infer<typeof DependenciesConfigSchema>;

/**
 * Logging Schema
 */
export const LoggingConfigSchema = z.object({
  /** Program tag shown in every record (default: shkit) */
  tag: z.string().min(1, 'Tag cannot be empty').default(LOGGING_DEFAULTS.TAG),

  /** Minimum level emitted (default: info) */
  level: z.enum(LOG_LEVELS).default(LOGGING_DEFAULTS.LEVEL),

  /** Also send records to syslog (default: false) */
  syslog: z.boolean().default(LOGGING_DEFAULTS.SYSLOG),

  /** syslog facility (default: user) */
  facility: z.enum(SYSLOG_FACILITIES).default(LOGGING_DEFAULTS.FACILITY),
}).strict();

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/**
 * Removal Schema
 */
export const RemoveConfigSchema = z.object({
  /** Paths safeRemove() must refuse, relative to the config file's directory or absolute */
  protectedPaths: z.array(z.string().min(1, 'Protected path cannot be empty')).default([]),
}).strict();

export type RemoveConfig = z.infer<typeof RemoveConfigSchema>;

/**
 * Full Configuration Schema
 *
 * Every section is optional; defaults are applied during validation.
 */
export const ShkitConfigSchema = z.object({
  /** Dependency check configuration */
  dependencies: DependenciesConfigSchema.optional().default({}),

  /** Logging configuration */
  logging: LoggingConfigSchema.optional().default({}),

  /** Safe removal configuration */
  remove: RemoveConfigSchema.optional().default({}),
}).strict();

// Input type (before defaults applied) for hand-written configs
export type ShkitConfig = z.input<typeof ShkitConfigSchema>;

// Output type (defaults applied) returned by the loader
export type ResolvedShkitConfig = z.output<typeof ShkitConfigSchema>;

/**
 * Validate configuration object
 *
 * @param config - Configuration object to validate
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(ShkitConfigSchema);

/**
 * Safe validation function for ShkitConfig
 *
 * @param config - Configuration data to validate
 * @returns Validation result with success/error information
 */
export const safeValidateConfig = createSafeValidator(ShkitConfigSchema);
