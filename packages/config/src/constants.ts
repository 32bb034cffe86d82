/**
 * Configuration Defaults
 *
 * Single source of truth for default values applied by the config schema.
 *
 * @packageDocumentation
 */

/**
 * Default logging configuration values
 *
 * @example
 * ```typescript
 * import { LOGGING_DEFAULTS } from '@shkit/config';
 *
 * const tag = config.logging?.tag ?? LOGGING_DEFAULTS.TAG;
 * ```
 */
export const LOGGING_DEFAULTS = {
  /** Program tag shown in log lines and syslog records */
  TAG: 'shkit' as const,

  /** Minimum level emitted */
  LEVEL: 'info' as const,

  /** syslog delivery is opt-in */
  SYSLOG: false as const,

  /** syslog facility */
  FACILITY: 'user' as const,
} as const;

export type LoggingDefaults = typeof LOGGING_DEFAULTS;
