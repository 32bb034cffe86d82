/**
 * Log Command
 *
 * Emit one log record from a shell script, to stderr and optionally syslog.
 * Defaults come from the logging section of shkit.config.yaml.
 */

import { createLogger, parseLogLevel, parseSyslogFacility, type LoggerOptions } from '@shkit/utils';
import type { Command } from 'commander';

import { loadConfig } from '../utils/config-loader.js';
import { reportError } from '../utils/error-output.js';

interface LogCommandOptions {
  tag?: string;
  syslog?: boolean;
  facility?: string;
}

export function logCommand(program: Command): void {
  program
    .command('log')
    .description('Write a log record (levels: error, warning, notice, info, debug)')
    .argument('<level>', 'Record level (warn and err are accepted)')
    .argument('<message...>', 'Message words, joined with spaces')
    .option('--tag <tag>', 'Program tag (default: logging.tag)')
    .option('--syslog', 'Also send the record to syslog')
    .option('--facility <facility>', 'syslog facility (default: logging.facility)')
    .action((level: string, message: string[], options: LogCommandOptions) => {
      let failed = false;
      try {
        const recordLevel = parseLogLevel(level);
        const { logging } = loadConfig();

        const loggerOptions: LoggerOptions = {
          tag: options.tag ?? logging.tag,
          level: logging.level,
          syslog: options.syslog ?? logging.syslog,
          facility: options.facility === undefined ? logging.facility : parseSyslogFacility(options.facility),
        };

        createLogger(loggerOptions).log(recordLevel, message.join(' '));
      } catch (error) {
        reportError('Failed to log', error);
        failed = true;
      }
      if (failed) {
        process.exit(1);
      }
    });
}
