/**
 * Directory Lister Tests
 */

import assert from 'node:assert/strict';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { test } from 'node:test';

import { listDirectory } from '../src/fs/lister.ts';
import { resolvePath, type ResolvedPath } from '../src/fs/paths.ts';
import { PathError } from '../src/protocol/errors.ts';
import { tempDir, writeFiles } from './helpers.ts';

async function resolved(raw: string, dir: string): Promise<ResolvedPath> {
  const result = await resolvePath(raw, dir);
  assert.ok(!(result instanceof PathError));
  return result;
}

test('listDirectory: entries are sorted by code unit', async (t) => {
  const dir = await tempDir(t);
  await writeFiles(dir, { 'b.txt': 'b', 'A.txt': 'A', 'a.txt': 'a', '_notes': 'n' });
  await mkdir(join(dir, 'Photos'));

  assert.deepEqual(await listDirectory(await resolved('.', dir)), [
    'A.txt',
    'Photos',
    '_notes',
    'a.txt',
    'b.txt',
  ]);
});

test('listDirectory: an empty directory lists nothing', async (t) => {
  const dir = await tempDir(t);
  assert.deepEqual(await listDirectory(await resolved('.', dir)), []);
});

test('listDirectory: a file is NOT_A_DIRECTORY', async (t) => {
  const dir = await tempDir(t);
  await writeFiles(dir, { 'plain.txt': 'x' });

  const result = await listDirectory(await resolved('plain.txt', dir));
  assert.ok(result instanceof PathError);
  assert.equal(result.code, 'NOT_A_DIRECTORY');
  assert.equal(result.message, 'Not a directory: plain.txt');
});

test('listDirectory: a missing directory is NOT_FOUND', async (t) => {
  const dir = await tempDir(t);

  const result = await listDirectory(await resolved('gone', dir));
  assert.ok(result instanceof PathError);
  assert.equal(result.code, 'NOT_FOUND');
  assert.equal(result.message, 'No such directory: gone');
});
