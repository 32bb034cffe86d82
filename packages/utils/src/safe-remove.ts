/**
 * Guarded file and directory removal
 *
 * safeRemove() refuses the filesystem root, and refuses the home directory,
 * the working directory and configured protected paths together with their
 * ancestors. Symlinks are never followed.
 *
 * @package @shkit/utils
 */

import { lstatSync, readdirSync, rmSync, rmdirSync, unlinkSync } from 'node:fs';
import { homedir } from 'node:os';
import { parse, resolve, sep } from 'node:path';

import { logDebug } from './logger.js';

export type RemovedKind = 'file' | 'symlink' | 'directory' | 'missing';

export type UnsafeRemovalReason = 'empty' | 'root' | 'home' | 'cwd' | 'protected' | 'not-empty';

export interface SafeRemoveOptions {
  /** Remove non-empty directories (default: false) */
  recursive?: boolean;
  /** Report what would be removed without touching the disk (default: false) */
  dryRun?: boolean;
  /** Base directory for relative targets (default: process.cwd()) */
  cwd?: string;
  /** Additional paths that must never be removed */
  protectedPaths?: readonly string[];
  /** Home directory to protect (default: os.homedir()) */
  homeDir?: string;
}

export interface RemoveResult {
  /** Absolute path of the target */
  path: string;
  /** What the target was */
  kind: RemovedKind;
  /** True when something was deleted */
  removed: boolean;
  /** True when this was a dry run */
  dryRun: boolean;
}

/**
 * Error thrown when a removal is refused
 */
export class UnsafeRemovalError extends Error {
  public readonly path: string;
  public readonly reason: UnsafeRemovalReason;

  constructor(path: string, reason: UnsafeRemovalReason, message: string) {
    super(message);
    this.name = 'UnsafeRemovalError';
    this.path = path;
    this.reason = reason;
  }
}

function isSameOrAncestor(candidate: string, path: string): boolean {
  if (candidate === path) {
    return true;
  }
  const prefix = candidate.endsWith(sep) ? candidate : candidate + sep;
  return path.startsWith(prefix);
}

function assertRemovable(target: string, absolute: string, cwd: string, options: SafeRemoveOptions): void {
  if (target.trim() === '') {
    throw new UnsafeRemovalError(absolute, 'empty', 'Refusing to remove an empty path');
  }
  if (absolute === parse(absolute).root) {
    throw new UnsafeRemovalError(absolute, 'root', `Refusing to remove filesystem root: ${absolute}`);
  }
  if (isSameOrAncestor(absolute, resolve(options.homeDir ?? homedir()))) {
    throw new UnsafeRemovalError(absolute, 'home', `Refusing to remove the home directory or its parent: ${absolute}`);
  }
  if (isSameOrAncestor(absolute, cwd)) {
    throw new UnsafeRemovalError(absolute, 'cwd', `Refusing to remove the working directory or its parent: ${absolute}`);
  }
  for (const protectedPath of options.protectedPaths ?? []) {
    const resolvedProtected = resolve(cwd, protectedPath);
    if (absolute === resolvedProtected) {
      throw new UnsafeRemovalError(absolute, 'protected', `Refusing to remove protected path: ${absolute}`);
    }
    if (isSameOrAncestor(absolute, resolvedProtected)) {
      throw new UnsafeRemovalError(
        absolute,
        'protected',
        `Refusing to remove ${absolute}: it contains protected path ${resolvedProtected}`,
      );
    }
  }
}

/**
 * Remove a file, symlink or directory after safety checks
 *
 * A missing target is not an error. A symlink is removed itself, never the
 * file it points to. Directories need `recursive` unless they are empty.
 *
 * @throws UnsafeRemovalError when the target is refused
 *
 * @example
 * safeRemove('build', { recursive: true });
 * safeRemove(tmpFile);
 */
export function safeRemove(target: string, options: SafeRemoveOptions = {}): RemoveResult {
  const cwd = resolve(options.cwd ?? process.cwd());
  const absolute = resolve(cwd, target);
  const dryRun = options.dryRun ?? false;

  assertRemovable(target, absolute, cwd, options);

  const stats = lstatSync(absolute, { throwIfNoEntry: false });
  if (!stats) {
    return { path: absolute, kind: 'missing', removed: false, dryRun };
  }

  let kind: RemovedKind;
  if (stats.isSymbolicLink()) {
    kind = 'symlink';
  } else if (stats.isDirectory()) {
    kind = 'directory';
    if (!options.recursive && readdirSync(absolute).length > 0) {
      throw new UnsafeRemovalError(
        absolute,
        'not-empty',
        `Directory not empty (use recursive to remove it): ${absolute}`,
      );
    }
  } else {
    kind = 'file';
  }

  if (dryRun) {
    return { path: absolute, kind, removed: false, dryRun };
  }

  if (kind === 'directory') {
    if (options.recursive) {
      rmSync(absolute, { recursive: true });
    } else {
      rmdirSync(absolute);
    }
  } else {
    unlinkSync(absolute);
  }

  logDebug('remove', `Removed ${kind}`, { path: absolute });
  return { path: absolute, kind, removed: true, dryRun };
}
