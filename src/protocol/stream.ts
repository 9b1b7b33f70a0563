/**
 * Frame streams
 *
 * FrameReader and FrameWriter bind the frame codec to the Web Streams of a
 * transport. Both hold their stream lock for the lifetime of a connection.
 */

import { withTimeout } from '../utils/async.ts';
import { FRAME_TYPE, MAX_PAYLOAD_LENGTH } from './constants.ts';
import { ProtocolError } from './errors.ts';
import { encodeFrame, type Frame, FrameDecoder } from './frame.ts';

export interface FrameStreamOptions {
  /** Largest payload accepted or produced */
  maxPayloadLength?: number;
  /** Per-frame trace output */
  debug?: (msg: string) => void;
}

function describe(frame: Frame): string {
  switch (frame.type) {
    case FRAME_TYPE.CMD:
      return `CMD '${frame.text}'`;
    case FRAME_TYPE.STATUS:
      return `STATUS ${frame.code} '${frame.message}'`;
    case FRAME_TYPE.CHUNK:
      return `CHUNK (${frame.data.length} bytes)`;
    case FRAME_TYPE.END:
      return frame.abort === undefined ? 'END' : `END (aborted: ${frame.abort})`;
  }
}

/**
 * Reads whole frames from a byte stream.
 *
 * `read()` suspends until a complete frame is buffered. It resolves `null`
 * when the stream ends on a frame boundary and throws `UNEXPECTED_EOF` when
 * it ends inside a frame.
 */
export class FrameReader {
  private _reader: ReadableStreamDefaultReader<Uint8Array>;
  private _decoder: FrameDecoder;
  private _debug?: (msg: string) => void;
  private _peeked?: Frame;
  private _ended = false;

  constructor(readable: ReadableStream<Uint8Array>, options: FrameStreamOptions = {}) {
    this._reader = readable.getReader();
    this._decoder = new FrameDecoder(options.maxPayloadLength ?? MAX_PAYLOAD_LENGTH);
    this._debug = options.debug;
  }

  /**
   * Read the next frame. With `timeout`, waiting longer than that many
   * milliseconds for transport data rejects with a TimeoutError.
   */
  async read(timeout?: number): Promise<Frame | null> {
    const peeked = this._peeked;
    if (peeked) {
      this._peeked = undefined;
      return peeked;
    }
    return await this._next(timeout);
  }

  /**
   * Look at the next frame without consuming it
   */
  async peek(): Promise<Frame | null> {
    if (!this._peeked) {
      const frame = await this._next();
      if (frame === null) return null;
      this._peeked = frame;
    }
    return this._peeked;
  }

  private async _next(timeout?: number): Promise<Frame | null> {
    while (true) {
      const frame = this._decoder.next();
      if (frame) {
        this._debug?.(`Inbound: ${describe(frame)}`);
        return frame;
      }

      if (this._ended) {
        const leftover = this._decoder.buffered;
        if (leftover > 0) {
          this._decoder.clear();
          throw new ProtocolError(
            'UNEXPECTED_EOF',
            `Stream ended inside a frame (${leftover} bytes buffered)`,
          );
        }
        return null;
      }

      const pending = this._reader.read();
      const { done, value } = timeout && timeout > 0
        ? await withTimeout(pending, timeout, `No data within ${timeout}ms`)
        : await pending;

      if (done) {
        this._ended = true;
        continue;
      }
      this._decoder.push(value);
    }
  }
}

/**
 * Writes frames to a byte stream, one at a time in call order.
 */
export class FrameWriter {
  private _writer: WritableStreamDefaultWriter<Uint8Array>;
  private _maxPayloadLength: number;
  private _debug?: (msg: string) => void;

  constructor(writable: WritableStream<Uint8Array>, options: FrameStreamOptions = {}) {
    this._writer = writable.getWriter();
    this._maxPayloadLength = options.maxPayloadLength ?? MAX_PAYLOAD_LENGTH;
    this._debug = options.debug;
  }

  async write(frame: Frame): Promise<void> {
    const bytes = encodeFrame(frame, this._maxPayloadLength);
    this._debug?.(`Outbound: ${describe(frame)}`);
    await this._writer.write(bytes);
  }

  /** Flush and close the underlying stream */
  async close(): Promise<void> {
    await this._writer.close();
  }
}
