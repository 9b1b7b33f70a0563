/**
 * SFMP Client
 *
 * High-level API for one SFMP connection. Commands run one at a time; local
 * preconditions (source exists, destination directory can be created) are
 * checked before anything is sent.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

import { nodeTransport } from './adapters/node.ts';
import type { Transport, TransportFactory } from './adapters/types.ts';
import { listDirectory } from './fs/lister.ts';
import { resolvePath } from './fs/paths.ts';
import {
  type Command,
  formatCommand,
  type GetCommand,
  type ListCommand,
  type ListTarget,
  parseCommand,
  type PutCommand,
} from './protocol/command.ts';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PORT,
  FRAME_TYPE,
  STATUS_CODE,
  STATUS_NAME_BY_VALUE,
  type StatusName,
} from './protocol/constants.ts';
import { CommandError, PathError, pathErrorStatus, ProtocolError, TransferError } from './protocol/errors.ts';
import { commandFrame, frameTypeName, type StatusFrame } from './protocol/frame.ts';
import { FrameReader, FrameWriter } from './protocol/stream.ts';
import {
  openSource,
  receiveFile,
  receiveListing,
  streamFile,
  type TransferOptions,
  type TransferProgress,
} from './protocol/transfer.ts';
import { errorMessage } from './utils.ts';
import { EventEmitter } from './utils/events.ts';

export interface ClientOptions {
  /** Directory client-side paths are resolved against (default: process.cwd()) */
  cwd?: string;
  /** Bytes per CHUNK frame sent by PUT */
  chunkSize?: number;
}

export interface ClientConfig {
  host?: string;
  port?: number;
  /** Connection timeout in ms */
  timeout?: number;
  /** Use an established transport instead of opening a TCP connection */
  transport?: Transport;
  /** Transport factory used when no transport is given */
  factory?: TransportFactory;
  /** Frame-level trace output */
  debug?: (msg: string) => void;
}

/**
 * Result of one command. `local` results were decided without the server.
 */
export interface CommandResult {
  command: Command;
  code: StatusName;
  message: string;
  local: boolean;
  /** Bytes moved by GET/PUT */
  bytes?: number;
  /** Entry names of an LS */
  entries?: string[];
}

export interface ClientEvents {
  ready: [];
  progress: [Command, TransferProgress];
  error: [Error];
  close: [];
}

interface Connection {
  transport: Transport;
  reader: FrameReader;
  writer: FrameWriter;
}

function localResult(command: Command, code: StatusName, message: string): CommandResult {
  return { command, code, message, local: true };
}

export class Client extends EventEmitter<ClientEvents> {
  readonly cwd: string;

  private _chunkSize: number;
  private _connection?: Connection;
  private _busy = false;

  constructor(options: ClientOptions = {}) {
    super();
    this.cwd = options.cwd ?? process.cwd();
    this._chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  }

  get connected(): boolean {
    return this._connection !== undefined && !this._connection.transport.closed;
  }

  async connect(config: ClientConfig = {}): Promise<void> {
    if (this._connection) {
      throw new Error('Already connected');
    }

    const transport = config.transport ??
      await (config.factory ?? nodeTransport).connect({
        host: config.host || 'localhost',
        port: config.port ?? DEFAULT_PORT,
        timeout: config.timeout,
      });

    this._connection = {
      transport,
      reader: new FrameReader(transport.readable, { debug: config.debug }),
      writer: new FrameWriter(transport.writable, { debug: config.debug }),
    };
    this.emit('ready');
  }

  /**
   * Parse and run command text
   */
  async run(text: string): Promise<CommandResult | CommandError> {
    const command = parseCommand(text);
    if (command instanceof CommandError) return command;
    return await this.execute(command);
  }

  get(source: string, destination: string): Promise<CommandResult> {
    return this.execute({ type: 'GET', source, destination });
  }

  put(source: string, destination: string): Promise<CommandResult> {
    return this.execute({ type: 'PUT', source, destination });
  }

  list(target: ListTarget): Promise<CommandResult> {
    return this.execute({ type: 'LS', target });
  }

  /**
   * Run a command. Status failures are results; a protocol error closes the
   * connection and is thrown.
   */
  async execute(command: Command): Promise<CommandResult> {
    if (this._busy) {
      throw new Error(`Cannot run '${formatCommand(command)}': another command is in progress`);
    }
    this._busy = true;

    try {
      switch (command.type) {
        case 'GET':
          return await this._get(command);
        case 'PUT':
          return await this._put(command);
        case 'LS':
          return command.target === 'client'
            ? await this._listLocal(command)
            : await this._listRemote(command);
      }
    } catch (err) {
      if (err instanceof ProtocolError) {
        this.emit('error', err);
        this.end();
      }
      throw err;
    } finally {
      this._busy = false;
    }
  }

  /**
   * Close the connection
   */
  end(): void {
    const connection = this._connection;
    if (!connection) return;
    this._connection = undefined;
    connection.transport.close();
    this.emit('close');
  }

  private async _get(command: GetCommand): Promise<CommandResult> {
    const destination = await resolvePath(command.destination, this.cwd);
    if (destination instanceof PathError) {
      return localResult(command, pathErrorStatus(destination), destination.message);
    }

    try {
      await mkdir(dirname(destination.path), { recursive: true });
    } catch (err) {
      return localResult(
        command,
        'IO_ERROR',
        `Cannot create directory for '${command.destination}': ${errorMessage(err)}`,
      );
    }

    const { reader, writer } = this._requireConnection();
    await writer.write(commandFrame(formatCommand(command)));

    const first = await reader.peek();
    if (first?.type === FRAME_TYPE.STATUS) {
      await reader.read();
      return this._remoteResult(command, first);
    }

    const outcome = await receiveFile(reader, destination.path, this._transferOptions(command));
    const status = await this._readStatus(reader);
    if (status.code === STATUS_CODE.OK && !outcome.success) {
      return { ...localResult(command, outcome.reason, outcome.message), bytes: outcome.bytesTransferred };
    }
    return { ...this._remoteResult(command, status), bytes: outcome.bytesTransferred };
  }

  private async _put(command: PutCommand): Promise<CommandResult> {
    const source = await resolvePath(command.source, this.cwd);
    if (source instanceof PathError) {
      return localResult(command, pathErrorStatus(source), source.message);
    }
    const opened = await openSource(source.path);
    if (opened instanceof TransferError) {
      return localResult(command, opened.code, opened.message);
    }

    try {
      const { reader, writer } = this._requireConnection();
      await writer.write(commandFrame(formatCommand(command)));
      const outcome = await streamFile(writer, opened, this._transferOptions(command));
      const status = await this._readStatus(reader);
      return { ...this._remoteResult(command, status), bytes: outcome.bytesTransferred };
    } finally {
      // streamFile closes it too; a second close is a no-op
      await opened.handle.close();
    }
  }

  private async _listLocal(command: ListCommand): Promise<CommandResult> {
    const dir = await resolvePath('.', this.cwd);
    const entries = dir instanceof PathError ? dir : await listDirectory(dir);
    if (entries instanceof PathError) {
      const code = entries.code === 'NOT_FOUND' ? 'DIRECTORY_NOT_FOUND' : pathErrorStatus(entries);
      return localResult(command, code, entries.message);
    }
    return { ...localResult(command, 'OK', `${entries.length} entries`), entries };
  }

  private async _listRemote(command: ListCommand): Promise<CommandResult> {
    const { reader, writer } = this._requireConnection();
    await writer.write(commandFrame(formatCommand(command)));

    const first = await reader.peek();
    if (first?.type === FRAME_TYPE.STATUS) {
      await reader.read();
      return this._remoteResult(command, first);
    }

    const entries = await receiveListing(reader);
    const status = await this._readStatus(reader);
    if (entries instanceof TransferError) {
      return this._remoteResult(command, status);
    }
    return { ...this._remoteResult(command, status), entries };
  }

  private _requireConnection(): Connection {
    const connection = this._connection;
    if (!connection || connection.transport.closed) {
      throw new Error('Not connected');
    }
    return connection;
  }

  private async _readStatus(reader: FrameReader): Promise<StatusFrame> {
    const frame = await reader.read();
    if (frame === null) {
      throw new ProtocolError('UNEXPECTED_EOF', 'Connection closed before the command status');
    }
    if (frame.type !== FRAME_TYPE.STATUS) {
      throw new ProtocolError(
        'OUT_OF_ORDER',
        `Expected a STATUS frame, got ${frameTypeName(frame.type)}`,
      );
    }
    return frame;
  }

  private _remoteResult(command: Command, status: StatusFrame): CommandResult {
    return {
      command,
      code: STATUS_NAME_BY_VALUE[status.code],
      message: status.message,
      local: false,
    };
  }

  private _transferOptions(command: Command): TransferOptions {
    return {
      chunkSize: this._chunkSize,
      step: (progress) => this.emit('progress', command, progress),
    };
  }
}
