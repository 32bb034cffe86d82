/**
 * Check-Deps Command
 *
 * Verify that external programs are on the search path before a script runs.
 */

import { checkDependencies, formatMissing, type SearchPathOptions } from '@shkit/utils';
import chalk from 'chalk';
import type { Command } from 'commander';

import { getCommandName } from '../utils/command-name.js';
import { loadConfig } from '../utils/config-loader.js';
import { reportError } from '../utils/error-output.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface CheckDepsOptions {
  path?: string;
  yaml?: boolean;
}

export function checkDepsCommand(program: Command): void {
  program
    .command('check-deps')
    .description('Check that required commands are available (prints the missing ones)')
    .argument('[commands...]', 'Command names to look up (default: dependencies.commands from shkit.config.yaml)')
    .option('--path <dirs>', 'PATH-style list of directories to search instead of PATH')
    .option('--yaml', 'Output { ok, missing, found } as YAML')
    .action(async (commands: string[], options: CheckDepsOptions) => {
      let ok = false;
      try {
        ok = await runCheckDeps(commands, options);
      } catch (error) {
        reportError('Dependency check failed', error);
      }
      if (!ok) {
        process.exit(1);
      }
    });
}

async function runCheckDeps(commands: string[], options: CheckDepsOptions): Promise<boolean> {
  // The config file is only consulted for what the command line leaves out
  const config = commands.length === 0 || options.path === undefined ? loadConfig() : undefined;

  const names = commands.length > 0 ? commands : (config?.dependencies.commands ?? []);
  if (names.length === 0) {
    console.error(chalk.yellow('⚠️  No commands to check'));
    console.error(chalk.gray(`   Usage: ${getCommandName()} check-deps <commands...>`));
  }

  const searchOptions: SearchPathOptions = {};
  const searchPath = options.path ?? config?.dependencies.searchPath;
  if (searchPath !== undefined) {
    searchOptions.searchPath = searchPath;
  }

  const result = checkDependencies(names, searchOptions);

  if (options.yaml) {
    await outputYamlResult(result);
  } else if (!result.ok) {
    process.stdout.write(`${formatMissing(result.missing)}\n`);
  }

  return result.ok;
}
