/**
 * Command name detection
 *
 * Lets error messages show the name the user actually typed.
 */

import { basename } from 'node:path';

const COMMAND_NAME_DEFAULT = 'shkit';

/**
 * Get the command name that was used to invoke the CLI
 *
 * @returns `basename(argv[1])` when it looks like an installed binary, otherwise "shkit"
 */
export function getCommandName(argv: readonly string[] = process.argv): string {
  const scriptPath = argv[1];
  if (!scriptPath) {
    return COMMAND_NAME_DEFAULT;
  }

  const commandName = basename(scriptPath);

  // Dev mode runs bin.js or bin.ts directly
  if (/\.[cm]?[jt]s$/.test(commandName)) {
    return COMMAND_NAME_DEFAULT;
  }
  return commandName;
}
