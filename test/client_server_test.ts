/**
 * Client/Server Tests
 *
 * A Client and a Server joined by an in-memory transport pair.
 */

import assert from 'node:assert/strict';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { test } from 'node:test';

import type { Transport } from '../src/adapters/types.ts';
import { Client } from '../src/client.ts';
import { createLogger, logServerActivity } from '../src/logger.ts';
import { CommandError } from '../src/protocol/errors.ts';
import { FrameReader } from '../src/protocol/stream.ts';
import { Server } from '../src/server.ts';
import { connectPair, createTransportPair, tempDir, waitForEvent, writeFiles } from './helpers.ts';

interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function captureLogs(): { records: LogRecord[]; destination: { write: (line: string) => void } } {
  const records: LogRecord[] = [];
  return {
    records,
    destination: { write: (line) => records.push(JSON.parse(line)) },
  };
}

// =============================================================================
// GET
// =============================================================================

test('GET: copies a server file into the client directory', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(root, { 'mytext.txt': 'hello' });
  const { server, client, session } = await connectPair(t, { root }, cwd);

  const { records, destination } = captureLogs();
  logServerActivity(server, createLogger({ level: 'info', destination }));

  const result = await client.get('mytext.txt', 'new_mytext.txt');

  assert.deepEqual(result, {
    command: { type: 'GET', source: 'mytext.txt', destination: 'new_mytext.txt' },
    code: 'OK',
    message: 'Transferred 5 bytes',
    local: false,
    bytes: 5,
  });
  assert.equal(await readFile(join(cwd, 'new_mytext.txt'), 'utf8'), 'hello');

  const completed = records.filter((r) => r.msg === 'transfer completed');
  assert.equal(completed.length, 1);
  assert.equal(completed[0].session, session.id);
  assert.equal(completed[0].direction, 'send');
  assert.equal(completed[0].path, 'mytext.txt');
  assert.equal(completed[0].bytes, 5);
});

test('GET: repeating a transfer gives the same file', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(root, { 'mytext.txt': 'same every time' });
  const { client } = await connectPair(t, { root }, cwd);

  const first = await client.get('mytext.txt', 'copy.txt');
  const second = await client.get('mytext.txt', 'copy.txt');

  assert.equal(first.code, 'OK');
  assert.deepEqual(second, first);
  assert.equal(await readFile(join(cwd, 'copy.txt'), 'utf8'), 'same every time');
  assert.deepEqual(await readdir(cwd), ['copy.txt']);
});

test('GET: binary content survives a change of extension', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const image = new Uint8Array(10000).map((_, i) => (i * 7) % 256);
  await writeFiles(root, { 'photo.png': image });
  const { client } = await connectPair(t, { root }, cwd);

  const result = await client.get('photo.png', 'photo.jpg');

  assert.equal(result.code, 'OK');
  assert.equal(result.bytes, 10000);
  assert.deepEqual(new Uint8Array(await readFile(join(cwd, 'photo.jpg'))), image);
});

test('GET: a file larger than the chunk size arrives in several chunks', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const content = new Uint8Array(10000).map((_, i) => i % 251);
  await writeFiles(root, { 'big.bin': content });
  const { client } = await connectPair(t, { root, chunkSize: 4096 }, cwd);
  const transferred: number[] = [];
  client.on('progress', (_command, progress) => transferred.push(progress.transferred));

  const result = await client.get('big.bin', 'copy.bin');

  assert.equal(result.code, 'OK');
  assert.equal(result.bytes, 10000);
  assert.deepEqual(transferred, [4096, 8192, 10000]);
  assert.deepEqual(new Uint8Array(await readFile(join(cwd, 'copy.bin'))), content);
});

test('GET: parent directories of the destination are created', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(root, { 'mytext.txt': 'nested' });
  const { client } = await connectPair(t, { root }, cwd);

  const result = await client.get('mytext.txt', 'deep/nested/copy.txt');

  assert.equal(result.code, 'OK');
  assert.equal(await readFile(join(cwd, 'deep', 'nested', 'copy.txt'), 'utf8'), 'nested');
});

test('GET: a missing server file is FILE_NOT_FOUND and nothing is written', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { client } = await connectPair(t, { root }, cwd);

  assert.deepEqual(await client.get('nope.txt', 'out.txt'), {
    command: { type: 'GET', source: 'nope.txt', destination: 'out.txt' },
    code: 'FILE_NOT_FOUND',
    message: `No such file: ${join(root, 'nope.txt')}`,
    local: false,
  });
  assert.deepEqual(await readdir(cwd), []);
});

test('GET: a path leaving the root is OUTSIDE_ROOT', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { client } = await connectPair(t, { root }, cwd);

  const result = await client.get('../secret.txt', 'copy.txt');

  assert.equal(result.code, 'OUTSIDE_ROOT');
  assert.equal(result.message, "Path '../secret.txt' is outside the server root");
  assert.equal(result.local, false);
  assert.deepEqual(await readdir(cwd), []);
});

// =============================================================================
// PUT
// =============================================================================

test('PUT: uploads a client file into the root', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(cwd, { 'local.txt': 'upload me' });
  const { client } = await connectPair(t, { root }, cwd);

  assert.deepEqual(await client.put('local.txt', 'remote.txt'), {
    command: { type: 'PUT', source: 'local.txt', destination: 'remote.txt' },
    code: 'OK',
    message: 'Transferred 9 bytes',
    local: false,
    bytes: 9,
  });
  assert.equal(await readFile(join(root, 'remote.txt'), 'utf8'), 'upload me');
});

test('PUT: a missing local file fails before any connection is needed', async (t) => {
  const cwd = await tempDir(t);
  const client = new Client({ cwd });

  assert.deepEqual(await client.put('local.txt', 'remote.txt'), {
    command: { type: 'PUT', source: 'local.txt', destination: 'remote.txt' },
    code: 'FILE_NOT_FOUND',
    message: `No such file: ${join(cwd, 'local.txt')}`,
    local: true,
  });
});

test('PUT: a missing server directory is DIRECTORY_NOT_FOUND and the session continues', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(cwd, { 'local.txt': 'upload me' });
  const { client } = await connectPair(t, { root }, cwd);

  assert.deepEqual(await client.put('local.txt', 'nowhere/remote.txt'), {
    command: { type: 'PUT', source: 'local.txt', destination: 'nowhere/remote.txt' },
    code: 'DIRECTORY_NOT_FOUND',
    message: `No such directory: ${join(root, 'nowhere')}`,
    local: false,
    bytes: 9,
  });

  const listing = await client.list('server');
  assert.equal(listing.code, 'OK');
  assert.deepEqual(listing.entries, []);
});

test('PUT: a failed send still closes the local file', { skip: process.platform !== 'linux' }, async (t) => {
  const cwd = await tempDir(t);
  await writeFiles(cwd, { 'up.txt': 'data' });
  const transport: Transport = {
    readable: new ReadableStream<Uint8Array>(),
    writable: new WritableStream<Uint8Array>({
      write() {
        throw new Error('link down');
      },
    }),
    closed: false,
    close() {},
  };
  const client = new Client({ cwd });
  await client.connect({ transport });
  const openFiles = async () => (await readdir('/proc/self/fd')).length;

  const before = await openFiles();
  await assert.rejects(client.put('up.txt', 'up.txt'), { message: 'link down' });

  assert.equal(await openFiles(), before);
});

test('PUT: progress is reported per chunk', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(cwd, { 'big.bin': new Uint8Array(10000) });
  const { client } = await connectPair(t, { root }, cwd, 4096);
  const transferred: number[] = [];
  client.on('progress', (_command, progress) => transferred.push(progress.transferred));

  const result = await client.put('big.bin', 'big.bin');

  assert.equal(result.code, 'OK');
  assert.deepEqual(transferred, [4096, 8192, 10000]);
});

// =============================================================================
// LS
// =============================================================================

test('LS server: an empty root lists no entries', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { client } = await connectPair(t, { root }, cwd);

  assert.deepEqual(await client.list('server'), {
    command: { type: 'LS', target: 'server' },
    code: 'OK',
    message: '0 entries',
    local: false,
    entries: [],
  });
});

test('LS client: a missing working directory is DIRECTORY_NOT_FOUND', async (t) => {
  const dir = await tempDir(t);
  const client = new Client({ cwd: join(dir, 'gone') });

  assert.deepEqual(await client.list('client'), {
    command: { type: 'LS', target: 'client' },
    code: 'DIRECTORY_NOT_FOUND',
    message: 'No such directory: .',
    local: true,
  });
});

test('LS client: lists the client directory without the server', async (t) => {
  const cwd = await tempDir(t);
  await writeFiles(cwd, { 'b.txt': 'b', 'a.txt': 'a' });
  const client = new Client({ cwd });

  assert.deepEqual(await client.list('client'), {
    command: { type: 'LS', target: 'client' },
    code: 'OK',
    message: '2 entries',
    local: true,
    entries: ['a.txt', 'b.txt'],
  });
});

// =============================================================================
// Client behaviour
// =============================================================================

test('Client: malformed text is rejected locally and the next command still runs', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(root, { 'a.txt': 'a' });
  const { client } = await connectPair(t, { root }, cwd);

  const bad = await client.run('FETCH a.txt');
  assert.ok(bad instanceof CommandError);
  assert.equal(bad.message, "Unknown command 'FETCH'");

  const good = await client.run('ls server');
  assert.ok(!(good instanceof CommandError));
  assert.deepEqual(good.entries, ['a.txt']);
});

test('Client: a second command while one runs is refused', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  await writeFiles(root, { 'mytext.txt': 'hello' });
  const { client } = await connectPair(t, { root }, cwd);

  const first = client.get('mytext.txt', 'copy.txt');
  await assert.rejects(client.list('server'), {
    message: "Cannot run 'LS server': another command is in progress",
  });
  assert.equal((await first).code, 'OK');
});

test('Client: an unknown frame tag from the server is a protocol error', async (t) => {
  const cwd = await tempDir(t);
  const [clientSide, serverSide] = createTransportPair();
  t.after(() => serverSide.close());
  const client = new Client({ cwd });
  await client.connect({ transport: clientSide });

  const pending = client.list('server');
  const serverReader = new FrameReader(serverSide.readable);
  assert.deepEqual(await serverReader.read(), { type: 1, text: 'LS server' });

  const raw = serverSide.writable.getWriter();
  await raw.write(new Uint8Array([0x09, 0, 0, 0, 0]));

  await assert.rejects(pending, {
    name: 'ProtocolError',
    code: 'UNKNOWN_FRAME_TYPE',
    message: 'Unknown frame type 0x09',
  });
  assert.equal(client.connected, false);
});

test('Client: connecting twice is refused', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { client } = await connectPair(t, { root }, cwd);
  const [other] = createTransportPair();

  await assert.rejects(client.connect({ transport: other }), { message: 'Already connected' });
  other.close();
});

// =============================================================================
// Server behaviour
// =============================================================================

test('Server: connections beyond the limit are closed', async (t) => {
  const root = await tempDir(t);
  const server = new Server({ root, maxConnections: 1 });
  t.after(() => server.close());

  const [, first] = createTransportPair();
  const [, second] = createTransportPair();

  assert.ok(server.injectTransport(first));
  assert.equal(server.injectTransport(second), undefined);
  assert.equal(second.closed, true);
  assert.equal(server.connections, 1);
});

test('Server: close() ends every session', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { server, client, session } = await connectPair(t, { root }, cwd);
  const disconnected = waitForEvent(server, 'disconnect');

  await server.close();

  assert.deepEqual(await disconnected, [session]);
  assert.equal(session.state, 'closed');
  assert.equal(server.connections, 0);
  await assert.rejects(client.list('server'), { message: 'Not connected' });
});

test('Server: session activity is forwarded with the session', async (t) => {
  const root = await tempDir(t);
  const cwd = await tempDir(t);
  const { server, client, session } = await connectPair(t, { root }, cwd);
  const seen: string[] = [];
  server.on('activity', (from, activity) => {
    assert.equal(from, session);
    seen.push(activity.type);
  });

  await client.list('server');

  assert.deepEqual(seen, ['command-received', 'listing-produced']);
});
