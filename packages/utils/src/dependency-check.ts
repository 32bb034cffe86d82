/**
 * External Dependency Checker
 *
 * Verifies that the programs a script needs can be found on a search path.
 * The search path is an explicit input: callers either pass the directories
 * or an environment to read `PATH` from. Nothing is cached between calls.
 *
 * @package @shkit/utils
 */

import { delimiter as platformDelimiter } from 'node:path';

import which from 'which';

/**
 * Options shared by every lookup
 */
export interface SearchPathOptions {
  /**
   * Directories to search, in order. Accepts a list of directories or a
   * PATH-style string. When omitted, `env.PATH` is used.
   */
  searchPath?: readonly string[] | string;
  /** Windows executable extensions (PATHEXT form). Defaults to `env.PATHEXT`. */
  pathExt?: string;
  /** Environment consulted when `searchPath` or `pathExt` are omitted (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Outcome of a dependency check
 */
export interface DependencyCheckResult {
  /** True when every requested command resolved */
  ok: boolean;
  /** Commands that did not resolve, in input order (duplicates kept) */
  missing: string[];
  /** Absolute path each resolvable command resolved to */
  found: Record<string, string>;
}

/**
 * Error thrown by assertDependencies() when commands are missing
 */
export class MissingDependencyError extends Error {
  public readonly missing: readonly string[];

  constructor(missing: readonly string[]) {
    super(`Missing required commands: ${formatMissing(missing)}`);
    this.name = 'MissingDependencyError';
    this.missing = missing;
  }
}

/**
 * Split a PATH-style string into directories
 *
 * Empty entries are dropped, so an empty or unset PATH yields no directories.
 *
 * @param value - PATH-style string (undefined is treated as empty)
 * @param delimiter - Entry separator (default: platform delimiter)
 *
 * @example
 * parseSearchPath('/usr/local/bin::/usr/bin'); // ['/usr/local/bin', '/usr/bin']
 */
export function parseSearchPath(
  value: string | undefined,
  delimiter: string = platformDelimiter,
): string[] {
  if (!value) {
    return [];
  }
  return value.split(delimiter).filter(entry => entry.length > 0);
}

function resolveSearchDirs(options: SearchPathOptions): string[] {
  const { searchPath } = options;
  if (searchPath === undefined) {
    const env = options.env ?? process.env;
    return parseSearchPath(env.PATH);
  }
  if (typeof searchPath === 'string') {
    return parseSearchPath(searchPath);
  }
  return searchPath.filter(entry => entry.length > 0);
}

function isBareCommandName(name: string): boolean {
  return name.length > 0 && !/[/\\]/.test(name);
}

function lookup(name: string, dirs: readonly string[], pathExt: string | undefined): string | null {
  if (dirs.length === 0 || !isBareCommandName(name)) {
    return null;
  }
  return which.sync(name, {
    path: dirs.join(platformDelimiter),
    pathExt,
    nothrow: true,
  });
}

/**
 * Resolve a bare command name to an absolute executable path
 *
 * @param name - Command name (e.g., 'git'); names containing a path separator never resolve
 * @param options - Search path options
 * @returns Absolute path, or null if not found
 *
 * @example
 * resolveCommand('ls', { searchPath: ['/bin', '/usr/bin'] }); // '/bin/ls'
 */
export function resolveCommand(name: string, options: SearchPathOptions = {}): string | null {
  const dirs = resolveSearchDirs(options);
  const pathExt = options.pathExt ?? (options.env ?? process.env).PATHEXT;
  return lookup(name, dirs, pathExt);
}

/**
 * Check which of the given commands are missing from the search path
 *
 * Never throws for missing commands; the caller decides whether to abort.
 *
 * @param commands - Command names, in the order they should be reported
 * @param options - Search path options
 *
 * @example
 * const result = checkDependencies(['git', 'jq']);
 * if (!result.ok) {
 *   console.log(formatMissing(result.missing));
 * }
 */
export function checkDependencies(
  commands: readonly string[],
  options: SearchPathOptions = {},
): DependencyCheckResult {
  const dirs = resolveSearchDirs(options);
  const pathExt = options.pathExt ?? (options.env ?? process.env).PATHEXT;

  const missing: string[] = [];
  const found: Record<string, string> = {};

  for (const command of commands) {
    const resolved = lookup(command, dirs, pathExt);
    if (resolved === null) {
      missing.push(command);
    } else {
      found[command] = resolved;
    }
  }

  return { ok: missing.length === 0, missing, found };
}

/**
 * Run checkDependencies() and throw when anything is missing
 *
 * @throws MissingDependencyError listing every missing command
 */
export function assertDependencies(
  commands: readonly string[],
  options: SearchPathOptions = {},
): DependencyCheckResult {
  const result = checkDependencies(commands, options);
  if (!result.ok) {
    throw new MissingDependencyError(result.missing);
  }
  return result;
}

/**
 * Join missing command names into the single line reported on stdout
 */
export function formatMissing(missing: readonly string[]): string {
  return missing.join(' ');
}
