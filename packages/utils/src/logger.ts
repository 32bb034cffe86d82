/**
 * Leveled logging to stderr and syslog
 *
 * Scripts create a Logger with a tag and a minimum level. Every record goes
 * to stderr; with `syslog: true` it is also handed to the host's `logger`
 * program. Internal shkit diagnostics use logDebug(), which only prints when
 * SHKIT_DEBUG=1.
 *
 * @package @shkit/utils
 */

import { safeExecResult } from './safe-exec.js';

/** Levels from most to least severe */
export const LOG_LEVELS = ['error', 'warning', 'notice', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** syslog(3) facility keywords accepted by logger(1) */
export const SYSLOG_FACILITIES = [
  'auth',
  'authpriv',
  'cron',
  'daemon',
  'ftp',
  'kern',
  'lpr',
  'mail',
  'news',
  'syslog',
  'user',
  'uucp',
  'local0',
  'local1',
  'local2',
  'local3',
  'local4',
  'local5',
  'local6',
  'local7',
] as const;

export type SyslogFacility = (typeof SYSLOG_FACILITIES)[number];

const SYSLOG_PRIORITY: Record<LogLevel, string> = {
  error: 'err',
  warning: 'warning',
  notice: 'notice',
  info: 'info',
  debug: 'debug',
};

const LEVEL_ALIASES = new Map<string, LogLevel>([
  ['err', 'error'],
  ['warn', 'warning'],
]);

export type LogCategory = 'remove' | 'config';

/**
 * Extra data attached to a record: an Error (message and stack are printed)
 * or a metadata object (printed as JSON)
 */
export type LogExtra = Error | Record<string, unknown>;

export interface LoggerOptions {
  /** Program tag shown in every line (default: 'shkit') */
  tag?: string;
  /** Minimum level emitted (default: 'info') */
  level?: LogLevel;
  /** Write records to stderr (default: true) */
  stderr?: boolean;
  /** Also send records to syslog (default: false) */
  syslog?: boolean;
  /** syslog facility (default: 'user') */
  facility?: SyslogFacility;
  /** Program used for syslog delivery (default: 'logger') */
  syslogCommand?: string;
  /** Directories searched for the syslog program (default: env.PATH) */
  searchPath?: readonly string[] | string;
  /**
   * Environment consulted for SHKIT_DEBUG and SHKIT_LOG_LEVEL (default: process.env).
   * An unknown SHKIT_LOG_LEVEL is reported once and ignored.
   */
  env?: NodeJS.ProcessEnv;
}

export interface Logger {
  readonly tag: string;
  readonly level: LogLevel;
  log(level: LogLevel, message: string, extra?: LogExtra): void;
  error(message: string, extra?: LogExtra): void;
  warning(message: string, extra?: LogExtra): void;
  notice(message: string, extra?: LogExtra): void;
  info(message: string, extra?: LogExtra): void;
  debug(message: string, extra?: LogExtra): void;
}

function findLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find(candidate => candidate === normalized) ?? LEVEL_ALIASES.get(normalized);
}

/**
 * Parse a level name (case-insensitive, accepts `warn` and `err`)
 *
 * @throws RangeError for unknown names
 */
export function parseLogLevel(value: string): LogLevel {
  const level = findLogLevel(value);
  if (level) {
    return level;
  }
  throw new RangeError(`Unknown log level: ${value} (expected one of ${LOG_LEVELS.join(', ')})`);
}

/**
 * Parse a syslog facility keyword (case-insensitive)
 *
 * @throws RangeError for unknown facilities
 */
export function parseSyslogFacility(value: string): SyslogFacility {
  const normalized = value.trim().toLowerCase();
  const facility = SYSLOG_FACILITIES.find(candidate => candidate === normalized);
  if (!facility) {
    throw new RangeError(`Unknown syslog facility: ${value}`);
  }
  return facility;
}

/**
 * True when a record at `level` passes a `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);
}

/**
 * Level after applying SHKIT_DEBUG and SHKIT_LOG_LEVEL overrides
 *
 * An unrecognised SHKIT_LOG_LEVEL is ignored and `level` is kept.
 */
export function effectiveLogLevel(level: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.SHKIT_DEBUG === '1') {
    return 'debug';
  }
  const override = env.SHKIT_LOG_LEVEL;
  return (override ? findLogLevel(override) : undefined) ?? level;
}

/**
 * Format one stderr line: `[timestamp] [LEVEL] [tag] message`
 */
export function formatLogLine(level: LogLevel, tag: string, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${tag}] ${message}`;
}

function writeExtra(extra: LogExtra | undefined): void {
  if (!extra) {
    return;
  }
  if (extra instanceof Error) {
    console.error(`Error: ${extra.message}`);
    if (extra.stack) {
      console.error(extra.stack);
    }
    return;
  }
  console.error(JSON.stringify(extra, null, 2));
}

/**
 * Create a logger
 *
 * @example
 * ```typescript
 * const log = createLogger({ tag: 'backup', syslog: true });
 * log.info('Backup started');
 * log.error('Upload failed', error);
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const tag = options.tag ?? 'shkit';
  const env = options.env ?? process.env;
  const level = effectiveLogLevel(options.level ?? 'info', env);
  const facility = options.facility ?? 'user';
  const syslogCommand = options.syslogCommand ?? 'logger';

  let useStderr = options.stderr ?? true;
  let useSyslog = options.syslog ?? false;

  const override = env.SHKIT_LOG_LEVEL;
  if (override && env.SHKIT_DEBUG !== '1' && !findLogLevel(override)) {
    console.error(formatLogLine('warning', tag, `Ignoring unknown SHKIT_LOG_LEVEL "${override}"; using ${level}`));
  }

  const sendToSyslog = (recordLevel: LogLevel, message: string, extra?: LogExtra): void => {
    let text = message;
    if (extra instanceof Error) {
      text = `${message}: ${extra.message}`;
    } else if (extra) {
      text = `${message} ${JSON.stringify(extra)}`;
    }
    const result = safeExecResult(
      syslogCommand,
      ['-t', tag, '-p', `${facility}.${SYSLOG_PRIORITY[recordLevel]}`, '--', text],
      { encoding: 'utf8', stdio: 'pipe', env, searchPath: options.searchPath },
    );
    if (result.status === 0) {
      return;
    }

    // First failure disables syslog for this logger and falls back to stderr
    const reason = result.error?.message ?? `${syslogCommand} exited with status ${result.status}`;
    useSyslog = false;
    useStderr = true;
    console.error(formatLogLine('warning', tag, `syslog delivery failed (${reason}); logging to stderr only`));
  };

  const log = (recordLevel: LogLevel, message: string, extra?: LogExtra): void => {
    if (!isLevelEnabled(recordLevel, level)) {
      return;
    }
    if (useSyslog) {
      sendToSyslog(recordLevel, message, extra);
    }
    if (useStderr) {
      console.error(formatLogLine(recordLevel, tag, message));
      writeExtra(extra);
    }
  };

  return {
    tag,
    level,
    log,
    error: (message, extra) => log('error', message, extra),
    warning: (message, extra) => log('warning', message, extra),
    notice: (message, extra) => log('notice', message, extra),
    info: (message, extra) => log('info', message, extra),
    debug: (message, extra) => log('debug', message, extra),
  };
}

/**
 * Log an internal debug message
 * Only outputs when SHKIT_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('remove', 'Removed', { path });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (process.env.SHKIT_DEBUG === '1') {
    console.error(formatLogLine('debug', category, message));
    writeExtra(metadata);
  }
}
