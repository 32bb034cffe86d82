import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import { resolveCommand, type SearchPathOptions } from './dependency-check.js';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions extends SearchPathOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Working directory */
  cwd?: string;
  /** Timeout in milliseconds */
  timeout?: number;
  /** Data written to the child's stdin */
  input?: string;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (0 = success, -1 = not found or not spawned) */
  status: number;
  /** Standard output */
  stdout: Buffer | string;
  /** Standard error */
  stderr: Buffer | string;
  /** Error object if command could not be resolved or spawned */
  error?: Error;
}

/**
 * Error thrown when command execution fails
 */
export class CommandExecutionError extends Error {
  public readonly status: number;
  public readonly stdout: Buffer | string;
  public readonly stderr: Buffer | string;

  constructor(
    message: string,
    status: number,
    stdout: Buffer | string,
    stderr: Buffer | string,
  ) {
    super(message);
    this.name = 'CommandExecutionError';
    this.status = status;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

/**
 * Error thrown when a command does not resolve on the search path
 */
export class CommandNotFoundError extends Error {
  public readonly command: string;

  constructor(command: string) {
    super(`Command not found: ${command}`);
    this.name = 'CommandNotFoundError';
    this.command = command;
  }
}

/**
 * Windows needs a shell for .cmd/.bat/.ps1 scripts.
 * Safe because the path was already resolved by the dependency checker.
 */
function shouldUseShell(commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }

  const lowerPath = commandPath.toLowerCase();
  return lowerPath.endsWith('.cmd') || lowerPath.endsWith('.bat') || lowerPath.endsWith('.ps1');
}

function spawnResolved(
  command: string,
  commandPath: string,
  args: string[],
  options: SafeExecOptions,
) {
  const useShell = shouldUseShell(commandPath);

  const spawnOptions: SpawnSyncOptions = {
    shell: useShell,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    timeout: options.timeout,
    encoding: options.encoding,
    input: options.input,
  };

  // When shell:true, use command name so shell can resolve it properly
  return spawnSync(useShell ? command : commandPath, args, spawnOptions);
}

/**
 * Run a command by absolute path with `shell: false`
 *
 * The command is resolved with the same search path rules as the
 * dependency checker, so `searchPath` and `env` apply to both.
 *
 * @param command - Command name (e.g., 'logger', 'git')
 * @param args - Array of arguments
 * @param options - Execution options
 * @returns Buffer or string output
 * @throws CommandNotFoundError if the command does not resolve
 * @throws CommandExecutionError on non-zero exit
 *
 * @example
 * const today = safeExecSync('date', ['+%A'], { encoding: 'utf8' });
 */
export function safeExecSync(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): Buffer | string {
  const commandPath = resolveCommand(command, options);
  if (commandPath === null) {
    throw new CommandNotFoundError(command);
  }

  const result = spawnResolved(command, commandPath, args, options);

  if (result.error) {
    throw result.error;
  }

  if (result.status !== 0) {
    throw new CommandExecutionError(
      `Command failed with exit code ${result.status ?? 'unknown'}: ${command} ${args.join(' ')}`,
      result.status ?? -1,
      result.stdout,
      result.stderr,
    );
  }

  return result.stdout;
}

/**
 * Run a command and return a detailed result instead of throwing
 *
 * @example
 * const result = safeExecResult('logger', ['-t', 'backup', '--', 'done']);
 * if (result.status !== 0) {
 *   console.error(result.error?.message ?? result.stderr.toString());
 * }
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  const commandPath = resolveCommand(command, options);
  if (commandPath === null) {
    return {
      status: -1,
      stdout: Buffer.from(''),
      stderr: Buffer.from(''),
      error: new CommandNotFoundError(command),
    };
  }

  const result = spawnResolved(command, commandPath, args, options);

  return {
    status: result.status ?? -1,
    stdout: result.stdout ?? Buffer.from(''),
    stderr: result.stderr ?? Buffer.from(''),
    error: result.error,
  };
}
