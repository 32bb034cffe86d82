/**
 * Zod Schema Utilities
 *
 * Validator factories that turn Zod issues into `path: message` strings.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';

export type SafeValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

/**
 * Format Zod issues as `path: message` (root issues carry no path)
 *
 * @example
 * formatZodIssues(error.issues); // ['logging.level: Invalid enum value ...']
 */
export function formatZodIssues(issues: readonly z.ZodIssue[]): string[] {
  return issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Create a validator that returns a success/errors union instead of throwing
 *
 * @example
 * ```typescript
 * const result = safeValidateConfig(raw);
 * if (!result.success) {
 *   console.error(result.errors.join('\n'));
 * }
 * ```
 */
export function createSafeValidator<T extends z.ZodType>(schema: T) {
  return function safeValidate(data: unknown): SafeValidationResult<z.output<T>> {
    const result = schema.safeParse(data);

    if (result.success) {
      return { success: true, data: result.data };
    }

    return { success: false, errors: formatZodIssues(result.error.issues) };
  };
}

/**
 * Create a validator that throws ZodError on invalid data
 */
export function createStrictValidator<T extends z.ZodType>(schema: T) {
  return function validate(data: unknown): z.output<T> {
    return schema.parse(data);
  };
}
