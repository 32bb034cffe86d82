/**
 * Config Command
 *
 * Show, validate or describe the shkit configuration.
 */

import { basename } from 'node:path';

import { generateJsonSchema, validateConfig } from '@shkit/config';
import chalk from 'chalk';
import type { Command } from 'commander';

import { displayConfigErrors } from '../utils/config-error-reporter.js';
import { loadConfigWithErrors } from '../utils/config-loader.js';
import { reportError } from '../utils/error-output.js';
import { outputYamlResult } from '../utils/yaml-output.js';

interface ConfigCommandOptions {
  validate?: boolean;
  schema?: boolean;
}

/**
 * @returns true when the command succeeded
 */
async function runConfig(options: ConfigCommandOptions): Promise<boolean> {
  if (options.schema) {
    console.log(JSON.stringify(generateJsonSchema(), null, 2));
    return true;
  }

  const result = loadConfigWithErrors();

  if (result.errors) {
    displayConfigErrors({ fileName: basename(result.filePath ?? 'shkit.config.yaml'), errors: result.errors });
    return false;
  }

  if (options.validate) {
    if (!result.filePath) {
      console.error(chalk.red('❌ No configuration file found'));
      console.error(chalk.gray('   Create shkit.config.yaml in this directory or a parent'));
      return false;
    }
    console.log(chalk.green(`✅ Configuration is valid: ${result.filePath}`));
    return true;
  }

  if (!result.filePath) {
    console.error(chalk.gray('No shkit.config.yaml found; showing defaults'));
  }
  await outputYamlResult(result.config ?? validateConfig({}));
  return true;
}

export function configCommand(program: Command): void {
  program
    .command('config')
    .description('Show the resolved shkit configuration as YAML')
    .option('--validate', 'Validate configuration only (exit 0 if valid, 1 if invalid or missing)')
    .option('--schema', 'Print the JSON Schema of shkit.config.yaml')
    .action(async (options: ConfigCommandOptions) => {
      let ok = false;
      try {
        ok = await runConfig(options);
      } catch (error) {
        reportError('Failed to load configuration', error);
      }
      if (!ok) {
        process.exit(1);
      }
    });
}
