/**
 * Rm Command
 *
 * Remove files and directories, refusing the root, home, working directory
 * and configured protected paths.
 */

import { safeRemove, UnsafeRemovalError, type RemoveResult, type UnsafeRemovalReason } from '@shkit/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadConfig } from '../utils/config-loader.js';
import { errorMessage, reportError } from '../utils/error-output.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface RmOptions {
  recursive?: boolean;
  dryRun?: boolean;
  yaml?: boolean;
}

interface RemovalFailure {
  path: string;
  /** Why removal was refused, or 'error' for filesystem failures */
  reason: UnsafeRemovalReason | 'error';
  error: string;
}

interface RmResult {
  ok: boolean;
  results: RemoveResult[];
  failures: RemovalFailure[];
}

function removeAll(paths: readonly string[], options: RmOptions, protectedPaths: readonly string[]): RmResult {
  const results: RemoveResult[] = [];
  const failures: RemovalFailure[] = [];

  for (const path of paths) {
    try {
      results.push(safeRemove(path, {
        recursive: options.recursive ?? false,
        dryRun: options.dryRun ?? false,
        protectedPaths,
      }));
    } catch (error) {
      failures.push({
        path: error instanceof UnsafeRemovalError ? error.path : path,
        reason: error instanceof UnsafeRemovalError ? error.reason : 'error',
        error: errorMessage(error),
      });
    }
  }

  return { ok: failures.length === 0, results, failures };
}

function displayRmResult(result: RmResult): void {
  for (const entry of result.results) {
    if (entry.kind === 'missing') {
      continue;
    }
    const verb = entry.dryRun ? 'Would remove' : 'Removed';
    console.log(chalk.gray(`${verb} ${entry.kind} ${entry.path}`));
  }
  for (const failure of result.failures) {
    console.error(chalk.red(`❌ ${failure.error}`));
  }
}

export function rmCommand(program: Command): void {
  program
    .command('rm')
    .description('Remove paths, refusing /, $HOME, the working directory and protected paths')
    .argument('<paths...>', 'Files or directories to remove')
    .option('-r, --recursive', 'Remove non-empty directories')
    .option('--dry-run', 'Show what would be removed without removing it')
    .option('--yaml', 'Output results as YAML')
    .action(async (paths: string[], options: RmOptions) => {
      let ok = false;
      try {
        const { remove } = loadConfig();
        const result = removeAll(paths, options, remove.protectedPaths);

        if (options.yaml) {
          await outputYamlResult(result);
        } else {
          displayRmResult(result);
        }
        ok = result.ok;
      } catch (error) {
        reportError('Removal failed', error);
      }
      if (!ok) {
        process.exit(1);
      }
    });
}
