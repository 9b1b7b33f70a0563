/**
 * SFMP Server
 *
 * Accepts connections and runs one Session per connection, each confined to
 * the same root directory.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';

import { nodeTransport } from './adapters/node.ts';
import type { Transport, TransportFactory, TransportListener } from './adapters/types.ts';
import { toError } from './protocol/errors.ts';
import { Session, type SessionActivity } from './session.ts';
import { EventEmitter } from './utils/events.ts';

export interface ServerConfig {
  /** Directory served; every client path is resolved inside it */
  root: string;
  /** Bytes per CHUNK frame sent by sessions */
  chunkSize?: number;
  /** Per-session idle timeout in ms while waiting for a command */
  idleTimeout?: number;
  /** Connections beyond this are closed on accept */
  maxConnections?: number;
  /** Pending connections the listener queues */
  backlog?: number;
  /** Frame-level trace output, prefixed per connection */
  debug?: (msg: string) => void;
}

/** Pending connections queued by default */
export const DEFAULT_BACKLOG = 10;

export interface ServerEvents {
  connection: [Session];
  disconnect: [Session];
  activity: [Session, SessionActivity];
  'session-error': [Session, Error];
  error: [Error];
  listening: [];
  close: [];
}

export class Server extends EventEmitter<ServerEvents> {
  readonly root: string;
  maxConnections: number;

  private _config: ServerConfig;
  private _listener?: TransportListener;
  private _accepting?: Promise<void>;
  private _sessions = new Map<Session, Promise<void>>();
  private _closed = false;

  constructor(config: ServerConfig, listener?: (session: Session) => void) {
    super();
    this._config = config;
    this.root = resolve(config.root);
    this.maxConnections = config.maxConnections ?? Infinity;

    if (listener) {
      this.on('connection', listener);
    }
  }

  /** Number of sessions currently being served */
  get connections(): number {
    return this._sessions.size;
  }

  /**
   * Start listening for connections
   */
  async listen(
    port: number,
    hostname?: string,
    factory: TransportFactory = nodeTransport,
  ): Promise<void> {
    const rootStats = await stat(this.root);
    if (!rootStats.isDirectory()) {
      throw new Error(`Server root is not a directory: ${this.root}`);
    }

    this._listener = await factory.listen({
      port,
      host: hostname,
      backlog: this._config.backlog ?? DEFAULT_BACKLOG,
    });
    this._closed = false;
    this.emit('listening');

    this._accepting = this._acceptConnections(this._listener);
  }

  /**
   * Accept incoming connections
   */
  private async _acceptConnections(listener: TransportListener): Promise<void> {
    try {
      for await (const transport of listener) {
        this.injectTransport(transport);
      }
    } catch (err) {
      this.emit('error', toError(err));
    }
  }

  /**
   * Serve an already established transport. Returns the session, or
   * undefined when the connection limit is reached and the transport was
   * closed.
   */
  injectTransport(transport: Transport): Session | undefined {
    if (this._closed || this._sessions.size >= this.maxConnections) {
      transport.close();
      return undefined;
    }

    let debug = this._config.debug;
    if (debug) {
      const debugPrefix = `[${Date.now()}] `;
      const origDebug = debug;
      debug = (msg: string) => origDebug(`${debugPrefix}${msg}`);
    }

    const session = new Session(transport, {
      root: this.root,
      chunkSize: this._config.chunkSize,
      idleTimeout: this._config.idleTimeout,
      debug,
    });

    session.on('activity', (activity) => this.emit('activity', session, activity));
    session.on('error', (err) => this.emit('session-error', session, err));
    session.once('close', () => {
      this._sessions.delete(session);
      this.emit('disconnect', session);
    });

    this._sessions.set(session, session.run());
    this.emit('connection', session);
    return session;
  }

  /**
   * Get server address
   */
  address(): { hostname: string; port: number } | undefined {
    if (!this._listener) return undefined;
    return { hostname: this._listener.address, port: this._listener.port };
  }

  /**
   * Stop accepting, close every session and wait for them to wind down
   */
  async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;

    this._listener?.close();
    this._listener = undefined;
    await this._accepting;

    const running = [...this._sessions];
    for (const [session] of running) {
      session.close();
    }
    await Promise.all(running.map(([, done]) => done));

    this.emit('close');
  }
}
