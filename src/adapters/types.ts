/**
 * Transport Abstraction
 *
 * Defines the byte-stream interfaces the frame codec runs over. Transports
 * expose Web Streams so the protocol code is the same for TCP sockets and
 * in-memory pipes.
 */

/**
 * Transport interface for SFMP connections
 *
 * Provides readable and writable streams for bidirectional communication.
 * Implementations can wrap TCP sockets or any other reliable ordered stream.
 */
export interface Transport {
  /** Readable stream for incoming data */
  readonly readable: ReadableStream<Uint8Array>;

  /** Writable stream for outgoing data */
  readonly writable: WritableStream<Uint8Array>;

  /** Remote address information (if available) */
  readonly remoteAddress?: string;

  /** Remote port (if available) */
  readonly remotePort?: number;

  /**
   * Close the transport. Pending reads settle (done or rejected) and
   * further writes fail, even while a reader or writer holds the lock.
   */
  close(): void;

  /** Whether the transport is closed */
  readonly closed: boolean;
}

/**
 * Transport options for creating connections
 */
export interface TransportOptions {
  /** Host to connect to */
  host: string;

  /** Port to connect to */
  port: number;

  /** Connection timeout in milliseconds */
  timeout?: number;
}

/**
 * Server listener interface
 */
export interface TransportListener extends AsyncIterable<Transport> {
  /** Accept incoming connections until the listener is closed */
  accept(): AsyncIterableIterator<Transport>;

  /** Close the listener */
  close(): void;

  /** Local address the listener is bound to */
  readonly address: string;

  /** Local port the listener is bound to */
  readonly port: number;
}

/**
 * Server listen options
 */
export interface ListenOptions {
  /** Host/address to bind to */
  host?: string;

  /** Port to listen on (0 picks an ephemeral port) */
  port: number;

  /** Backlog size for pending connections */
  backlog?: number;
}

/**
 * Transport factory interface
 *
 * Implementations provide platform-specific transport creation.
 */
export interface TransportFactory {
  /** Create a client transport connection */
  connect(options: TransportOptions): Promise<Transport>;

  /** Create a server listener */
  listen(options: ListenOptions): Promise<TransportListener>;
}
