/**
 * @shkit/utils
 *
 * Helpers for scripts: dependency checks, weekday lookup, path helpers,
 * leveled logging and guarded removal.
 * This is the foundational package with NO dependencies on other shkit packages.
 *
 * @package @shkit/utils
 */

// External dependency checks
export {
  checkDependencies,
  assertDependencies,
  resolveCommand,
  parseSearchPath,
  formatMissing,
  MissingDependencyError,
  type SearchPathOptions,
  type DependencyCheckResult,
} from './dependency-check.js';

// Shell-free command execution
export {
  safeExecSync,
  safeExecResult,
  CommandExecutionError,
  CommandNotFoundError,
  type SafeExecOptions,
  type SafeExecResult,
} from './safe-exec.js';

export {
  WEEKDAY_NAMES,
  weekdayName,
  weekdayIndex,
  type WeekdayName,
  type WeekdayFormat,
  type WeekdayOptions,
} from './weekday.js';

// Path helpers (plus Windows 8.3 short name handling for tests)
export {
  absolutePath,
  trimTrailingSlashes,
  normalizedTmpdir,
  mkdirSyncReal,
  normalizePath,
  type AbsolutePathOptions,
} from './path-helpers.js';

export {
  LOG_LEVELS,
  SYSLOG_FACILITIES,
  createLogger,
  parseLogLevel,
  parseSyslogFacility,
  isLevelEnabled,
  effectiveLogLevel,
  formatLogLine,
  logDebug,
  type LogLevel,
  type LogCategory,
  type LogExtra,
  type Logger,
  type LoggerOptions,
  type SyslogFacility,
} from './logger.js';

export {
  safeRemove,
  UnsafeRemovalError,
  type SafeRemoveOptions,
  type RemoveResult,
  type RemovedKind,
  type UnsafeRemovalReason,
} from './safe-remove.js';
