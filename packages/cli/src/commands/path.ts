/**
 * Path Commands
 *
 * `abspath` and `trim-slash`: string-level path helpers for shell scripts.
 */

import { absolutePath, trimTrailingSlashes } from '@shkit/utils';
import type { Command } from 'commander';

export function abspathCommand(program: Command): void {
  program
    .command('abspath')
    .description('Print the absolute form of a path')
    .argument('<path>', 'Path to resolve against the working directory')
    .option('--physical', 'Resolve symlinks when the path exists')
    .action((path: string, options: { physical?: boolean }) => {
      console.log(absolutePath(path, { physical: options.physical ?? false }));
    });
}

export function trimSlashCommand(program: Command): void {
  program
    .command('trim-slash')
    .description('Print a path without its trailing slashes')
    .argument('<path>', 'Path to trim')
    .action((path: string) => {
      console.log(trimTrailingSlashes(path));
    });
}
