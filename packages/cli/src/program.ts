/**
 * shkit command-line program
 *
 * Builds the Commander program; bin.ts parses process.argv with it.
 */

import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { checkDepsCommand } from './commands/check-deps.js';
import { configCommand } from './commands/config.js';
import { logCommand } from './commands/log.js';
import { abspathCommand, trimSlashCommand } from './commands/path.js';
import { rmCommand } from './commands/rm.js';
import { weekdayCommand } from './commands/weekday.js';

const FALLBACK_VERSION = '0.0.0';

/**
 * Read the CLI version from package.json (one level above src/ and dist/)
 */
export function readVersion(packageJsonPath: string = join(dirname(fileURLToPath(import.meta.url)), '../package.json')): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
    console.warn(`Warning: ${packageJsonPath} has no version, using fallback`);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
  }
  return FALLBACK_VERSION;
}

/**
 * Create the shkit program with every command registered
 */
export function createProgram(program: Command = new Command()): Command {
  program
    .name('shkit')
    .description('Helpers for shell scripts: dependency checks, weekdays, paths, logging and safe removal')
    .version(readVersion());

  checkDepsCommand(program);  // shkit check-deps
  weekdayCommand(program);    // shkit weekday
  abspathCommand(program);    // shkit abspath
  trimSlashCommand(program);  // shkit trim-slash
  logCommand(program);        // shkit log
  rmCommand(program);         // shkit rm
  configCommand(program);     // shkit config

  return program;
}
