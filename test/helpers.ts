/**
 * Test Helpers
 *
 * In-memory transports, temporary directories and small stream utilities
 * shared by the test files.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TestContext } from 'node:test';

import type { Transport } from '../src/adapters/types.ts';
import { Client } from '../src/client.ts';
import { Server, type ServerConfig } from '../src/server.ts';
import type { Session } from '../src/session.ts';
import { concatBytes } from '../src/utils/binary.ts';
import type { EventEmitter } from '../src/utils/events.ts';

/** Chunks a pipe buffers before writes wait for the reader */
const PIPE_BUFFER = 64;

interface Pipe {
  stream: TransformStream<Uint8Array, Uint8Array>;
  terminate: () => void;
}

function createPipe(): Pipe {
  let controller: TransformStreamDefaultController<Uint8Array> | undefined;
  const stream = new TransformStream<Uint8Array, Uint8Array>(
    {
      start(c) {
        controller = c;
      },
    },
    undefined,
    { highWaterMark: PIPE_BUFFER },
  );
  return { stream, terminate: () => controller?.terminate() };
}

class MemoryTransport implements Transport {
  readonly readable: ReadableStream<Uint8Array>;
  readonly writable: WritableStream<Uint8Array>;
  readonly remoteAddress = 'memory';
  private _state: { closed: boolean };
  private _shutdown: () => void;

  constructor(
    readable: ReadableStream<Uint8Array>,
    writable: WritableStream<Uint8Array>,
    state: { closed: boolean },
    shutdown: () => void,
  ) {
    this.readable = readable;
    this.writable = writable;
    this._state = state;
    this._shutdown = shutdown;
  }

  get closed(): boolean {
    return this._state.closed;
  }

  close(): void {
    if (this._state.closed) return;
    this._state.closed = true;
    this._shutdown();
  }
}

/**
 * Two connected transports. Closing either end ends both directions, the
 * way a TCP connection does: buffered data stays readable, then reads
 * report the end and writes fail.
 */
export function createTransportPair(): [Transport, Transport] {
  const toServer = createPipe();
  const toClient = createPipe();
  const state = { closed: false };
  const shutdown = () => {
    toServer.terminate();
    toClient.terminate();
  };

  const client = new MemoryTransport(toClient.stream.readable, toServer.stream.writable, state, shutdown);
  const server = new MemoryTransport(toServer.stream.readable, toClient.stream.writable, state, shutdown);
  return [client, server];
}

/**
 * Fresh temporary directory, removed after the test
 */
export async function tempDir(t: TestContext, prefix = 'sfmp-test-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  t.after(() => rm(dir, { recursive: true, force: true }));
  return dir;
}

/**
 * Write `files` (name to content) into `dir`
 */
export async function writeFiles(dir: string, files: Record<string, string | Uint8Array>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    await writeFile(join(dir, name), content);
  }
}

/**
 * Collect data from a stream until it ends
 */
export async function collectData(stream: ReadableStream<Uint8Array>): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  const reader = stream.getReader();

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
    }
  } finally {
    reader.releaseLock();
  }

  return concatBytes(chunks);
}

/**
 * Wait for the next emission of an event and resolve its arguments
 */
export function waitForEvent<
  EventMap extends { [K in keyof EventMap]: unknown[] },
  K extends keyof EventMap,
>(emitter: EventEmitter<EventMap>, event: K): Promise<EventMap[K]> {
  return new Promise((resolve) => {
    emitter.once(event, (...args) => resolve(args));
  });
}

export interface Connected {
  server: Server;
  client: Client;
  session: Session;
}

/**
 * A Server and a Client joined by an in-memory transport pair. Both are
 * closed after the test.
 */
export async function connectPair(
  t: TestContext,
  config: ServerConfig,
  cwd: string,
  chunkSize?: number,
): Promise<Connected> {
  const server = new Server(config);
  const [clientSide, serverSide] = createTransportPair();
  const session = server.injectTransport(serverSide);
  if (!session) throw new Error('Server refused the in-memory transport');

  const client = new Client({ cwd, chunkSize });
  await client.connect({ transport: clientSide });

  t.after(async () => {
    client.end();
    await server.close();
  });
  return { server, client, session };
}
