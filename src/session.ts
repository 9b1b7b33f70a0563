/**
 * SFMP Server Session
 *
 * One Session serves one connection: it reads a command, resolves its paths
 * against the root, runs the transfer or listing and answers with a single
 * STATUS frame. Recoverable failures become a status and the session keeps
 * serving; protocol errors end it.
 */

import type { Transport } from './adapters/types.ts';
import { listDirectory } from './fs/lister.ts';
import { normalizePath, resolvePath } from './fs/paths.ts';
import { type Command, type GetCommand, type ListCommand, parseCommand, type PutCommand } from './protocol/command.ts';
import { DEFAULT_CHUNK_SIZE, FRAME_TYPE, STATUS_CODE, type StatusName } from './protocol/constants.ts';
import { CommandError, PathError, pathErrorStatus, ProtocolError, toError } from './protocol/errors.ts';
import { frameTypeName, statusFrame } from './protocol/frame.ts';
import { FrameReader, FrameWriter } from './protocol/stream.ts';
import {
  drainTransfer,
  receiveFile,
  sendFile,
  sendListing,
  type TransferOptions,
  type TransferOutcome,
} from './protocol/transfer.ts';
import { TimeoutError } from './utils/async.ts';
import { EventEmitter } from './utils/events.ts';

export type SessionState = 'awaiting-command' | 'resolving' | 'transferring' | 'closed';

/** `send`: server to client (GET), `receive`: client to server (PUT) */
export type TransferDirection = 'send' | 'receive';

export type SessionActivityDetail =
  | { type: 'command-received'; command: string }
  | { type: 'command-rejected'; command: string; code: StatusName; message: string }
  | { type: 'transfer-started'; direction: TransferDirection; path: string }
  | { type: 'transfer-completed'; direction: TransferDirection; path: string; bytes: number }
  | {
    type: 'transfer-failed';
    direction: TransferDirection;
    path: string;
    bytes: number;
    reason: StatusName;
    message: string;
  }
  | { type: 'listing-produced'; path: string; entries: number }
  | { type: 'idle-timeout'; timeout: number };

/** Something a session did, tagged with the session id */
export type SessionActivity = SessionActivityDetail & { session: string };

export interface SessionConfig {
  /** Directory every server-side path is confined to */
  root: string;
  /** Bytes per CHUNK frame sent */
  chunkSize?: number;
  /** Close the session after this many ms without a command (0/undefined: never) */
  idleTimeout?: number;
  /** Frame-level trace output */
  debug?: (msg: string) => void;
  id?: string;
}

export interface SessionEvents {
  activity: [SessionActivity];
  state: [SessionState];
  error: [Error];
  close: [];
}

let sessionCounter = 0;

export class Session extends EventEmitter<SessionEvents> {
  readonly id: string;
  readonly root: string;

  private _transport: Transport;
  private _reader: FrameReader;
  private _writer: FrameWriter;
  private _state: SessionState = 'awaiting-command';
  private _chunkSize: number;
  private _idleTimeout: number;
  private _running?: Promise<void>;
  private _finished = false;

  constructor(transport: Transport, config: SessionConfig) {
    super();
    this.id = config.id ?? `session-${++sessionCounter}`;
    this.root = config.root;
    this._transport = transport;
    this._chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
    this._idleTimeout = config.idleTimeout ?? 0;
    this._reader = new FrameReader(transport.readable, { debug: config.debug });
    this._writer = new FrameWriter(transport.writable, { debug: config.debug });
  }

  get state(): SessionState {
    return this._state;
  }

  get transport(): Transport {
    return this._transport;
  }

  /**
   * Serve commands until the peer disconnects, the idle timeout expires or
   * a protocol error occurs. Resolves once the session is closed; errors
   * are reported through the `error` event, never by rejecting.
   */
  run(): Promise<void> {
    this._running ??= this._serve();
    return this._running;
  }

  /**
   * Close the session and its transport. A transfer in flight is abandoned;
   * a partially received file is discarded.
   */
  close(): void {
    if (this._state === 'closed') return;
    this._setState('closed');
    this._transport.close();
    if (!this._running) this._finish();
  }

  private async _serve(): Promise<void> {
    try {
      while (this._state !== 'closed') {
        this._setState('awaiting-command');
        const frame = await this._reader.read(this._idleTimeout);
        if (frame === null) break;
        if (frame.type !== FRAME_TYPE.CMD) {
          throw new ProtocolError(
            'OUT_OF_ORDER',
            `Expected a CMD frame, got ${frameTypeName(frame.type)}`,
          );
        }
        await this._dispatch(frame.text);
      }
    } catch (err) {
      if (err instanceof TimeoutError) {
        this._activity({ type: 'idle-timeout', timeout: err.timeout });
      } else if (this._state !== 'closed') {
        this.emit('error', toError(err));
      }
    } finally {
      this._finish();
    }
  }

  private async _dispatch(text: string): Promise<void> {
    this._setState('resolving');
    this._activity({ type: 'command-received', command: text });

    const command = parseCommand(text);
    if (command instanceof CommandError) {
      await this._reject(text, 'BAD_COMMAND', `${command.message}\n${command.usage}`);
      return;
    }

    switch (command.type) {
      case 'GET':
        return await this._get(command, text);
      case 'PUT':
        return await this._put(command, text);
      case 'LS':
        return await this._list(command, text);
    }
  }

  private async _get(command: GetCommand, text: string): Promise<void> {
    const source = await resolvePath(command.source, this.root, { confine: true });
    if (source instanceof PathError) {
      return await this._reject(text, pathErrorStatus(source), source.message);
    }
    const destination = checkClientPath(command);
    if (destination) {
      return await this._reject(text, pathErrorStatus(destination), destination.message);
    }

    this._setState('transferring');
    this._activity({ type: 'transfer-started', direction: 'send', path: source.raw });
    const outcome = await sendFile(this._writer, source.path, this._transferOptions());
    await this._finishTransfer('send', source.raw, outcome);
  }

  private async _put(command: PutCommand, text: string): Promise<void> {
    // The client streams right after the command, so every rejection has
    // to consume that stream before the status goes out
    const destination = await resolvePath(command.destination, this.root, { confine: true });
    if (destination instanceof PathError) {
      return await this._rejectUpload(text, destination);
    }
    const invalid = checkClientPath(command);
    if (invalid) return await this._rejectUpload(text, invalid);

    this._setState('transferring');
    this._activity({ type: 'transfer-started', direction: 'receive', path: destination.raw });
    const outcome = await receiveFile(this._reader, destination.path, this._transferOptions());
    await this._finishTransfer('receive', destination.raw, outcome);
  }

  private async _list(command: ListCommand, text: string): Promise<void> {
    if (command.target === 'client') {
      return await this._reject(text, 'BAD_COMMAND', 'LS client is answered by the client');
    }

    const dir = await resolvePath('.', this.root, { confine: true });
    const entries = dir instanceof PathError ? dir : await listDirectory(dir);
    if (entries instanceof PathError) {
      const code = entries.code === 'NOT_FOUND' ? 'DIRECTORY_NOT_FOUND' : pathErrorStatus(entries);
      return await this._reject(text, code, entries.message);
    }

    this._setState('transferring');
    await sendListing(this._writer, entries);
    this._activity({ type: 'listing-produced', path: this.root, entries: entries.length });
    await this._status('OK', `${entries.length} entries`);
  }

  private async _finishTransfer(
    direction: TransferDirection,
    path: string,
    outcome: TransferOutcome,
  ): Promise<void> {
    if (outcome.success) {
      this._activity({
        type: 'transfer-completed',
        direction,
        path,
        bytes: outcome.bytesTransferred,
      });
      await this._status('OK', `Transferred ${outcome.bytesTransferred} bytes`);
      return;
    }

    this._activity({
      type: 'transfer-failed',
      direction,
      path,
      bytes: outcome.bytesTransferred,
      reason: outcome.reason,
      message: outcome.message,
    });
    await this._status(outcome.reason, outcome.message);
  }

  private async _reject(command: string, code: StatusName, message: string): Promise<void> {
    this._activity({ type: 'command-rejected', command, code, message });
    await this._status(code, message);
  }

  private async _rejectUpload(command: string, err: PathError): Promise<void> {
    await drainTransfer(this._reader);
    await this._reject(command, pathErrorStatus(err), err.message);
  }

  private async _status(code: StatusName, message: string): Promise<void> {
    await this._writer.write(statusFrame(STATUS_CODE[code], message));
  }

  private _transferOptions(): TransferOptions {
    return { chunkSize: this._chunkSize };
  }

  private _activity(detail: SessionActivityDetail): void {
    this.emit('activity', { ...detail, session: this.id });
  }

  private _setState(state: SessionState): void {
    if (this._state === state || this._state === 'closed') return;
    this._state = state;
    this.emit('state', state);
  }

  private _finish(): void {
    if (this._finished) return;
    this._finished = true;
    if (this._state !== 'closed') {
      this._state = 'closed';
      this.emit('state', 'closed');
    }
    this._transport.close();
    this.emit('close');
  }
}

/**
 * The client-side path of a command is only checked for syntax; the client
 * resolves it against its own directory.
 */
function checkClientPath(command: Command): PathError | undefined {
  if (command.type === 'LS') return undefined;
  const clientPath = command.type === 'GET' ? command.destination : command.source;
  const normalized = normalizePath(clientPath, '.');
  return normalized instanceof PathError ? normalized : undefined;
}
