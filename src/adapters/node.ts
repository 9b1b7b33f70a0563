/**
 * Node.js Transport Implementation
 *
 * Provides the Transport interface on top of `node:net` sockets, exposed as
 * Web Streams through `Duplex.toWeb`.
 */

import { connect as netConnect, createServer, type Server as NetServer, type Socket } from 'node:net';
import { Duplex } from 'node:stream';

import { DEFAULT_PORT } from '../protocol/constants.ts';
import type {
  ListenOptions,
  Transport,
  TransportFactory,
  TransportListener,
  TransportOptions,
} from './types.ts';

/**
 * Node TCP Transport
 *
 * Wraps a net.Socket to implement the Transport interface.
 */
export class NodeTransport implements Transport {
  private _socket: Socket;
  private _closed = false;
  private _readable: ReadableStream<Uint8Array>;
  private _writable: WritableStream<Uint8Array>;

  constructor(socket: Socket) {
    this._socket = socket;
    const { readable, writable } = Duplex.toWeb(socket);
    this._readable = readable;
    this._writable = writable;
    socket.once('close', () => {
      this._closed = true;
    });
  }

  get readable(): ReadableStream<Uint8Array> {
    return this._readable;
  }

  get writable(): WritableStream<Uint8Array> {
    return this._writable;
  }

  get remoteAddress(): string | undefined {
    return this._socket.remoteAddress;
  }

  get remotePort(): number | undefined {
    return this._socket.remotePort;
  }

  close(): void {
    if (!this._closed) {
      this._closed = true;
      this._socket.destroy();
    }
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Get the underlying socket */
  get socket(): Socket {
    return this._socket;
  }
}

/**
 * Node TCP Listener
 *
 * Wraps a net.Server and hands out one NodeTransport per accepted socket.
 * Sockets accepted while nobody is iterating are queued.
 */
export class NodeListener implements TransportListener {
  private _server: NetServer;
  private _closed = false;
  private _pending: Transport[] = [];
  private _waiters: ((transport: Transport | null) => void)[] = [];

  constructor(server: NetServer) {
    this._server = server;

    server.on('connection', (socket: Socket) => {
      const transport = new NodeTransport(socket);
      const waiter = this._waiters.shift();
      if (waiter) {
        waiter(transport);
      } else {
        this._pending.push(transport);
      }
    });

    server.on('close', () => {
      this._closed = true;
      this._flushWaiters();
    });
  }

  async *accept(): AsyncIterableIterator<Transport> {
    while (true) {
      const queued = this._pending.shift();
      if (queued) {
        yield queued;
        continue;
      }
      if (this._closed) return;

      const next = await new Promise<Transport | null>((resolve) => {
        this._waiters.push(resolve);
      });
      if (next === null) return;
      yield next;
    }
  }

  close(): void {
    if (this._closed) return;
    this._closed = true;
    this._server.close();
    for (const transport of this._pending.splice(0)) {
      transport.close();
    }
    this._flushWaiters();
  }

  get address(): string {
    const addr = this._server.address();
    return addr !== null && typeof addr === 'object' ? addr.address : '';
  }

  get port(): number {
    const addr = this._server.address();
    return addr !== null && typeof addr === 'object' ? addr.port : 0;
  }

  /** Async iterator implementation */
  [Symbol.asyncIterator](): AsyncIterableIterator<Transport> {
    return this.accept();
  }

  /** Get the underlying net.Server */
  get server(): NetServer {
    return this._server;
  }

  private _flushWaiters(): void {
    for (const waiter of this._waiters.splice(0)) {
      waiter(null);
    }
  }
}

/**
 * Node Transport Factory
 *
 * Creates TCP connections and listeners using `node:net`.
 */
export class NodeTransportFactory implements TransportFactory {
  /**
   * Create a TCP connection to a remote host
   */
  connect(options: TransportOptions): Promise<Transport> {
    const { host, port, timeout } = options;

    return new Promise<Transport>((resolve, reject) => {
      const socket = netConnect({ host, port });

      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };

      if (timeout && timeout > 0) {
        socket.setTimeout(timeout, () => {
          onError(new Error(`Connection timeout after ${timeout}ms`));
        });
      }

      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        socket.setTimeout(0);
        resolve(new NodeTransport(socket));
      });
    });
  }

  /**
   * Create a TCP listener on a local address
   */
  listen(options: ListenOptions): Promise<TransportListener> {
    const { host, port, backlog } = options;
    const server = createServer();
    const listener = new NodeListener(server);

    return new Promise<TransportListener>((resolve, reject) => {
      server.once('error', reject);
      server.listen({ host: host || '0.0.0.0', port, backlog }, () => {
        server.off('error', reject);
        resolve(listener);
      });
    });
  }
}

/**
 * Default transport factory instance
 */
export const nodeTransport: NodeTransportFactory = new NodeTransportFactory();

/**
 * Connect to a remote SFMP server
 *
 * Convenience function for creating client connections.
 */
export function connect(
  host: string,
  port: number = DEFAULT_PORT,
  timeout?: number,
): Promise<Transport> {
  return nodeTransport.connect({ host, port, timeout });
}

/**
 * Listen for incoming SFMP connections
 *
 * Convenience function for creating server listeners.
 */
export function listen(port: number, host?: string): Promise<TransportListener> {
  return nodeTransport.listen({ port, host });
}
