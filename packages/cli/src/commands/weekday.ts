/**
 * Weekday Command
 *
 * Print the weekday name for a day number (0-7) or for today.
 */

import { weekdayName } from '@shkit/utils';
import type { Command } from 'commander';

import { reportError } from '../utils/error-output.js';

interface WeekdayCommandOptions {
  short?: boolean;
  utc?: boolean;
}

/**
 * Parse a day argument (plain digits only)
 */
function parseDayArgument(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new RangeError(`Day number must be an integer from 0 to 7, got ${value}`);
  }
  return Number.parseInt(value, 10);
}

export function weekdayCommand(program: Command): void {
  program
    .command('weekday')
    .description('Print the weekday name of a day number (0 and 7 are Sunday) or of today')
    .argument('[day]', 'Day number 0-7 (default: today)')
    .option('--short', 'Print the three-letter name')
    .option('--utc', "Use today's UTC weekday instead of the local one")
    .action((day: string | undefined, options: WeekdayCommandOptions) => {
      let name: string | undefined;
      try {
        name = weekdayName(day === undefined ? new Date() : parseDayArgument(day), {
          format: options.short ? 'short' : 'long',
          utc: options.utc ?? false,
        });
      } catch (error) {
        reportError('Invalid day', error);
      }
      if (name === undefined) {
        process.exit(1);
      }
      console.log(name);
    });
}
