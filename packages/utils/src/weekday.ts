/**
 * Weekday name lookup
 *
 * Day numbers follow the cron convention: 0 and 7 are Sunday, 1 is Monday.
 * That covers both `date +%w` (0-6) and `date +%u` (1-7) output.
 *
 * @package @shkit/utils
 */

export const WEEKDAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

export type WeekdayName = (typeof WEEKDAY_NAMES)[number];

export type WeekdayFormat = 'long' | 'short';

export interface WeekdayOptions {
  /** 'long' (default) gives "Monday", 'short' gives "Mon" */
  format?: WeekdayFormat;
  /** Read the UTC weekday of a Date instead of the local one */
  utc?: boolean;
}

function toDayIndex(day: Date | number, utc: boolean): number {
  if (day instanceof Date) {
    if (Number.isNaN(day.getTime())) {
      throw new RangeError('Invalid date');
    }
    return utc ? day.getUTCDay() : day.getDay();
  }

  if (!Number.isInteger(day) || day < 0 || day > 7) {
    throw new RangeError(`Day number must be an integer from 0 to 7, got ${day}`);
  }
  return day % 7;
}

/**
 * Get the English name of a weekday
 *
 * @param day - A Date, or a day number 0-7 (0 and 7 are Sunday)
 * @throws RangeError for invalid dates and out-of-range numbers
 *
 * @example
 * weekdayName(1);                       // 'Monday'
 * weekdayName(7, { format: 'short' });  // 'Sun'
 */
export function weekdayName(day: Date | number, options: WeekdayOptions = {}): string {
  const name: WeekdayName = WEEKDAY_NAMES[toDayIndex(day, options.utc ?? false)];
  return options.format === 'short' ? name.slice(0, 3) : name;
}

/**
 * Reverse lookup: weekday name to day number (Sunday = 0)
 *
 * Case-insensitive; accepts long and three-letter names.
 */
export function weekdayIndex(name: string): number {
  const needle = name.trim().toLowerCase();
  const index = WEEKDAY_NAMES.findIndex(
    candidate => candidate.toLowerCase() === needle || candidate.slice(0, 3).toLowerCase() === needle,
  );
  if (index === -1) {
    throw new RangeError(`Unknown weekday: ${name}`);
  }
  return index;
}
