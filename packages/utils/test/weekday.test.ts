import { describe, it, expect } from 'vitest';

import { WEEKDAY_NAMES, weekdayIndex, weekdayName } from '../src/weekday.js';

describe('weekdayName', () => {
  it('should map 0-6 to Sunday through Saturday', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(day => weekdayName(day))).toEqual([...WEEKDAY_NAMES]);
  });

  it('should treat 7 as Sunday', () => {
    expect(weekdayName(7)).toBe('Sunday');
  });

  it('should return three-letter names in short format', () => {
    expect(weekdayName(3, { format: 'short' })).toBe('Wed');
    expect(weekdayName(7, { format: 'short' })).toBe('Sun');
  });

  it('should read the local weekday of a Date', () => {
    // 1 January 2024 was a Monday
    expect(weekdayName(new Date(2024, 0, 1))).toBe('Monday');
  });

  it('should read the UTC weekday when requested', () => {
    expect(weekdayName(new Date(Date.UTC(2024, 0, 7, 12)), { utc: true })).toBe('Sunday');
  });

  it('should reject out-of-range numbers', () => {
    expect(() => weekdayName(8)).toThrow(RangeError);
    expect(() => weekdayName(-1)).toThrow('Day number must be an integer from 0 to 7, got -1');
  });

  it('should reject non-integers', () => {
    expect(() => weekdayName(2.5)).toThrow(RangeError);
    expect(() => weekdayName(Number.NaN)).toThrow(RangeError);
  });

  it('should reject invalid dates', () => {
    expect(() => weekdayName(new Date('not a date'))).toThrow('Invalid date');
  });
});

describe('weekdayIndex', () => {
  it('should look up long names case-insensitively', () => {
    expect(weekdayIndex('friday')).toBe(5);
    expect(weekdayIndex('SUNDAY')).toBe(0);
  });

  it('should accept three-letter names', () => {
    expect(weekdayIndex('Tue')).toBe(2);
  });

  it('should ignore surrounding whitespace', () => {
    expect(weekdayIndex('  sat ')).toBe(6);
  });

  it('should reject unknown names', () => {
    expect(() => weekdayIndex('Funday')).toThrow('Unknown weekday: Funday');
  });
});
