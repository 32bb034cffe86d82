import chalk from 'chalk';

/**
 * Message of anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print a command failure to stderr in the CLI's error style
 *
 * @param context - What was being attempted, e.g. "Failed to load configuration"
 */
export function reportError(context: string, error: unknown): void {
  console.error(chalk.red(`❌ ${context}:`), errorMessage(error));
  if (process.env.SHKIT_DEBUG === '1' && error instanceof Error && error.stack) {
    console.error(chalk.gray('Stack trace:'));
    console.error(chalk.gray(error.stack));
  }
}
