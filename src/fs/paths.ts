/**
 * Path resolution
 *
 * Turns a user-supplied path into an absolute one anchored at a working
 * directory. Server-side resolution is confined to the root: a path that
 * normalizes outside of it is rejected before the filesystem is touched.
 */

import type { Stats } from 'node:fs';
import { extname, isAbsolute, relative, resolve, sep } from 'node:path';

import { PathError } from '../protocol/errors.ts';
import { errorMessage, statOrUndefined } from '../utils.ts';

export type EntryKind = 'file' | 'directory' | 'other';

export interface ResolvedPath {
  /** The path as the user typed it */
  readonly raw: string;
  /** Absolute, normalized path */
  readonly path: string;
  readonly valid: true;
  readonly exists: boolean;
  /** Set when the entry exists */
  readonly kind?: EntryKind;
  /** Suffix of the last component without the dot, '' when there is none */
  readonly filetype: string;
}

export interface ResolveOptions {
  /** Reject paths that normalize outside of the working directory */
  confine?: boolean;
}

/**
 * Whether `target` is `root` or lies below it
 */
export function isInside(root: string, target: string): boolean {
  const rel = relative(root, target);
  if (rel === '') return true;
  if (isAbsolute(rel)) return false;
  return rel !== '..' && !rel.startsWith(`..${sep}`);
}

/**
 * Lexical part of resolution: join, normalize and check confinement.
 * Never touches the filesystem.
 */
export function normalizePath(
  rawPath: string,
  workingDir: string,
  options: ResolveOptions = {},
): string | PathError {
  if (rawPath.length === 0) {
    return new PathError('INVALID_PATH', rawPath, 'Empty path');
  }
  if (rawPath.includes('\0')) {
    return new PathError('INVALID_PATH', rawPath, `Path '${rawPath}' contains a NUL byte`);
  }

  const root = resolve(workingDir);
  const target = resolve(root, rawPath);

  if (options.confine && !isInside(root, target)) {
    return new PathError('OUTSIDE_ROOT', rawPath, `Path '${rawPath}' is outside the server root`);
  }
  return target;
}

export function entryKind(stats: Stats): EntryKind {
  if (stats.isFile()) return 'file';
  if (stats.isDirectory()) return 'directory';
  return 'other';
}

/** Suffix-derived filetype; no content inspection */
export function filetypeOf(path: string): string {
  return extname(path).slice(1);
}

/**
 * Resolve a raw path against a working directory and record whether it
 * exists. A missing entry is not an error here.
 */
export async function resolvePath(
  rawPath: string,
  workingDir: string,
  options: ResolveOptions = {},
): Promise<ResolvedPath | PathError> {
  const normalized = normalizePath(rawPath, workingDir, options);
  if (normalized instanceof PathError) return normalized;

  let stats: Stats | undefined;
  try {
    stats = await statOrUndefined(normalized);
  } catch (err) {
    return new PathError('INACCESSIBLE', rawPath, `Cannot access '${rawPath}': ${errorMessage(err)}`);
  }

  return {
    raw: rawPath,
    path: normalized,
    valid: true,
    exists: stats !== undefined,
    kind: stats ? entryKind(stats) : undefined,
    filetype: filetypeOf(normalized),
  };
}
