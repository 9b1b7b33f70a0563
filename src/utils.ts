/**
 * Filesystem helpers shared by the resolver, lister and transfer engine
 */

import { randomBytes } from 'node:crypto';
import type { Stats } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/** Narrow a thrown value to a Node system error */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Whether the error means "nothing there" rather than "cannot look" */
export function isMissingEntry(err: unknown): boolean {
  return isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * stat() that resolves undefined for a missing entry. Any other failure
 * (permissions, I/O) is rethrown.
 */
export async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch (err) {
    if (isMissingEntry(err)) return undefined;
    throw err;
  }
}

/**
 * Hidden sibling of `path` used while a download or upload is in flight.
 * Living in the same directory keeps the final rename atomic.
 */
export function temporaryPathFor(path: string): string {
  const suffix = randomBytes(6).toString('hex');
  return join(dirname(path), `.${basename(path)}.${suffix}.part`);
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
