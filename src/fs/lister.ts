/**
 * Directory listing
 */

import { readdir } from 'node:fs/promises';

import { PathError } from '../protocol/errors.ts';
import { errorMessage, isErrnoException } from '../utils.ts';
import type { ResolvedPath } from './paths.ts';

/**
 * Names of the entries of a directory, sorted ascending by UTF-16 code unit
 * (plain `Array.prototype.sort`), so listings are deterministic.
 */
export async function listDirectory(dir: ResolvedPath): Promise<string[] | PathError> {
  if (!dir.exists) {
    return new PathError('NOT_FOUND', dir.raw, `No such directory: ${dir.raw}`);
  }
  if (dir.kind !== 'directory') {
    return new PathError('NOT_A_DIRECTORY', dir.raw, `Not a directory: ${dir.raw}`);
  }

  try {
    const names = await readdir(dir.path);
    return names.sort();
  } catch (err) {
    if (isErrnoException(err)) {
      if (err.code === 'ENOENT') {
        return new PathError('NOT_FOUND', dir.raw, `No such directory: ${dir.raw}`);
      }
      if (err.code === 'ENOTDIR') {
        return new PathError('NOT_A_DIRECTORY', dir.raw, `Not a directory: ${dir.raw}`);
      }
    }
    return new PathError('INACCESSIBLE', dir.raw, `Cannot list '${dir.raw}': ${errorMessage(err)}`);
  }
}
