import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import {
  createLogger,
  effectiveLogLevel,
  formatLogLine,
  isLevelEnabled,
  logDebug,
  parseLogLevel,
  parseSyslogFacility,
} from '../src/logger.js';
import { createTempTestDir, writeFakeExecutable } from '../src/test-helpers.js';

const NOW = '2024-05-01T10:00:00.000Z';

describe('parseLogLevel', () => {
  it('should accept level names case-insensitively', () => {
    expect(parseLogLevel('Info')).toBe('info');
    expect(parseLogLevel('NOTICE')).toBe('notice');
  });

  it('should accept warn and err aliases', () => {
    expect(parseLogLevel('warn')).toBe('warning');
    expect(parseLogLevel('err')).toBe('error');
  });

  it('should reject unknown levels', () => {
    expect(() => parseLogLevel('loud')).toThrow(RangeError);
    expect(() => parseLogLevel('constructor')).toThrow(RangeError);
  });
});

describe('parseSyslogFacility', () => {
  it('should accept known facilities case-insensitively', () => {
    expect(parseSyslogFacility('LOCAL3')).toBe('local3');
    expect(parseSyslogFacility('daemon')).toBe('daemon');
  });

  it('should reject unknown facilities', () => {
    expect(() => parseSyslogFacility('local9')).toThrow('Unknown syslog facility: local9');
  });
});

describe('isLevelEnabled', () => {
  it('should pass records at or above the threshold', () => {
    expect(isLevelEnabled('error', 'info')).toBe(true);
    expect(isLevelEnabled('info', 'info')).toBe(true);
  });

  it('should drop records below the threshold', () => {
    expect(isLevelEnabled('debug', 'info')).toBe(false);
    expect(isLevelEnabled('notice', 'warning')).toBe(false);
  });
});

describe('effectiveLogLevel', () => {
  it('should keep the configured level without overrides', () => {
    expect(effectiveLogLevel('notice', {})).toBe('notice');
  });

  it('should force debug when SHKIT_DEBUG=1', () => {
    expect(effectiveLogLevel('error', { SHKIT_DEBUG: '1', SHKIT_LOG_LEVEL: 'error' })).toBe('debug');
  });

  it('should apply SHKIT_LOG_LEVEL', () => {
    expect(effectiveLogLevel('info', { SHKIT_LOG_LEVEL: 'warn' })).toBe('warning');
  });

  it('should ignore an unknown SHKIT_LOG_LEVEL', () => {
    expect(effectiveLogLevel('notice', { SHKIT_LOG_LEVEL: 'loud' })).toBe('notice');
  });
});

describe('formatLogLine', () => {
  it('should include timestamp, level and tag', () => {
    expect(formatLogLine('info', 'backup', 'started', new Date(NOW))).toBe(
      `[${NOW}] [INFO] [backup] started`,
    );
  });
});

describe('createLogger', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      lines.push(args.join(' '));
    });
    vi.useFakeTimers();
    vi.setSystemTime(new Date(NOW));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should write records to stderr with the default tag', () => {
    const log = createLogger({ env: {} });

    log.info('hello');

    expect(lines).toEqual([`[${NOW}] [INFO] [shkit] hello`]);
  });

  it('should drop records below the minimum level', () => {
    const log = createLogger({ tag: 'job', level: 'warning', env: {} });

    log.debug('noise');
    log.info('noise');
    log.notice('noise');
    log.warning('careful');
    log.error('broken');

    expect(lines).toEqual([
      `[${NOW}] [WARNING] [job] careful`,
      `[${NOW}] [ERROR] [job] broken`,
    ]);
  });

  it('should honor SHKIT_LOG_LEVEL from the supplied environment', () => {
    const log = createLogger({ level: 'debug', env: { SHKIT_LOG_LEVEL: 'error' } });

    log.warning('hidden');

    expect(log.level).toBe('error');
    expect(lines).toEqual([]);
  });

  it('should warn once and keep the configured level for an unknown SHKIT_LOG_LEVEL', () => {
    const log = createLogger({ tag: 'job', level: 'notice', env: { SHKIT_LOG_LEVEL: 'loud' } });

    log.info('hidden');
    log.notice('shown');

    expect(log.level).toBe('notice');
    expect(lines).toEqual([
      `[${NOW}] [WARNING] [job] Ignoring unknown SHKIT_LOG_LEVEL "loud"; using notice`,
      `[${NOW}] [NOTICE] [job] shown`,
    ]);
  });

  it('should print metadata as JSON after the line', () => {
    const log = createLogger({ tag: 'job', env: {} });

    log.info('copied', { files: 3 });

    expect(lines).toEqual([`[${NOW}] [INFO] [job] copied`, '{\n  "files": 3\n}']);
  });

  it('should print error message and stack', () => {
    const log = createLogger({ tag: 'job', env: {} });
    const error = new Error('boom');

    log.error('failed', error);

    expect(lines[0]).toBe(`[${NOW}] [ERROR] [job] failed`);
    expect(lines[1]).toBe('Error: boom');
    expect(lines[2]).toBe(error.stack);
  });

  it('should write nothing when stderr is disabled and syslog is off', () => {
    const log = createLogger({ stderr: false, env: {} });

    log.error('quiet');

    expect(lines).toEqual([]);
  });

  describe.skipIf(process.platform === 'win32')('syslog sink', () => {
    let binDir: string;

    beforeEach(() => {
      binDir = createTempTestDir('shkit-syslog-');
    });

    afterEach(() => {
      rmSync(binDir, { recursive: true, force: true });
    });

    it('should pass tag, priority and message to the logger program', () => {
      writeFakeExecutable(binDir, 'logger', 'printf \'%s\\n\' "$@" > "${0%/*}/args.txt"');
      const log = createLogger({
        tag: 'backup',
        syslog: true,
        stderr: false,
        facility: 'local3',
        searchPath: [binDir],
        env: {},
      });

      log.error('disk full', new Error('boom'));

      expect(readFileSync(join(binDir, 'args.txt'), 'utf8')).toBe(
        '-t\nbackup\n-p\nlocal3.err\n--\ndisk full: boom\n',
      );
      expect(lines).toEqual([]);
    });

    it('should append metadata as compact JSON to the syslog message', () => {
      writeFakeExecutable(binDir, 'logger', 'printf \'%s\\n\' "$@" > "${0%/*}/args.txt"');
      const log = createLogger({
        tag: 'backup',
        syslog: true,
        stderr: false,
        facility: 'local3',
        searchPath: [binDir],
        env: {},
      });

      log.info('copied', { files: 3 });

      expect(readFileSync(join(binDir, 'args.txt'), 'utf8')).toBe(
        '-t\nbackup\n-p\nlocal3.info\n--\ncopied {"files":3}\n',
      );
      expect(lines).toEqual([]);
    });

    it('should fall back to stderr once when the logger program is missing', () => {
      const log = createLogger({
        tag: 'backup',
        syslog: true,
        stderr: false,
        searchPath: [binDir],
        env: {},
      });

      log.warning('first');
      log.warning('second');

      expect(lines).toEqual([
        `[${NOW}] [WARNING] [backup] syslog delivery failed (Command not found: logger); logging to stderr only`,
        `[${NOW}] [WARNING] [backup] first`,
        `[${NOW}] [WARNING] [backup] second`,
      ]);
    });

    it('should report the exit status when the logger program fails', () => {
      writeFakeExecutable(binDir, 'logger', 'exit 3');
      const log = createLogger({ tag: 'backup', syslog: true, searchPath: [binDir], env: {} });

      log.notice('hello');

      expect(lines).toEqual([
        `[${NOW}] [WARNING] [backup] syslog delivery failed (logger exited with status 3); logging to stderr only`,
        `[${NOW}] [NOTICE] [backup] hello`,
      ]);
    });
  });
});

describe('logDebug', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      lines.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should stay silent without SHKIT_DEBUG', () => {
    logDebug('config', 'loaded');

    expect(lines).toEqual([]);
  });

  it('should print with SHKIT_DEBUG=1', () => {
    process.env.SHKIT_DEBUG = '1';

    logDebug('remove', 'Removed file', { path: '/tmp/x' });

    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[DEBUG\] \[remove\] Removed file$/);
    expect(lines[1]).toBe('{\n  "path": "/tmp/x"\n}');
  });
});
