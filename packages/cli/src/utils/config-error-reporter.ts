/**
 * Configuration error reporting
 */

import chalk from 'chalk';

export interface ConfigErrorDetails {
  fileName: string;
  errors: string[];
}

/**
 * Format configuration validation errors for display
 *
 * @param maxErrors Maximum number of errors to show (default: 5)
 */
export function formatConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): string[] {
  const messages: string[] = [chalk.yellow('Validation errors:')];

  for (const err of details.errors.slice(0, maxErrors)) {
    messages.push(chalk.gray(`  • ${err}`));
  }

  if (details.errors.length > maxErrors) {
    messages.push(chalk.gray(`  ... and ${details.errors.length - maxErrors} more`));
  }

  return messages;
}

/**
 * Print configuration validation errors and a hint to stderr
 */
export function displayConfigErrors(details: ConfigErrorDetails, maxErrors: number = 5): void {
  console.error(chalk.red(`❌ Configuration is invalid: ${details.fileName}`));
  for (const msg of formatConfigErrors(details, maxErrors)) console.error(msg);
  console.error(chalk.blue('💡 Run `shkit config --schema` for the accepted keys'));
}
