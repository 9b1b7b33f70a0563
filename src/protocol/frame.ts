/**
 * SFMP Frame Serialization and Parsing
 *
 * Handles binary encoding/decoding of protocol frames. Every frame is
 * self-delimiting, so the decoder can resume after any short read.
 */

import {
  allocBytes,
  byteToHex,
  concatBytes,
  EMPTY_BYTES,
  fromString,
  fromStringTruncated,
  readUInt32BE,
  toUtf8,
  writeUInt32BE,
} from '../utils/binary.ts';
import {
  FRAME_HEADER_LENGTH,
  FRAME_TYPE,
  FRAME_TYPE_BY_VALUE,
  type FrameType,
  isFrameType,
  isStatusCode,
  MAX_PAYLOAD_LENGTH,
  STATUS_CODE_STR,
  type StatusCode,
} from './constants.ts';
import { ProtocolError } from './errors.ts';

/** Status payload is one code byte plus the message */
const MAX_STATUS_MESSAGE_LENGTH = MAX_PAYLOAD_LENGTH - 1;

export interface CommandFrame {
  type: typeof FRAME_TYPE.CMD;
  text: string;
}

export interface StatusFrame {
  type: typeof FRAME_TYPE.STATUS;
  code: StatusCode;
  message: string;
}

export interface ChunkFrame {
  type: typeof FRAME_TYPE.CHUNK;
  data: Uint8Array;
}

/**
 * Terminates a transfer. `abort` is set when the sender gave up mid-stream;
 * the receiver must then discard what it got.
 */
export interface EndFrame {
  type: typeof FRAME_TYPE.END;
  abort?: string;
}

export type Frame = CommandFrame | StatusFrame | ChunkFrame | EndFrame;

export function commandFrame(text: string): CommandFrame {
  return { type: FRAME_TYPE.CMD, text };
}

/**
 * Messages longer than a payload can carry (they may quote user input) are
 * cut at a code point boundary, so every status stays sendable.
 */
export function statusFrame(code: StatusCode, message?: string): StatusFrame {
  const text = message || STATUS_CODE_STR[code];
  const bytes = fromStringTruncated(text, MAX_STATUS_MESSAGE_LENGTH);
  return { type: FRAME_TYPE.STATUS, code, message: toUtf8(bytes) };
}

export function chunkFrame(data: Uint8Array): ChunkFrame {
  return { type: FRAME_TYPE.CHUNK, data };
}

export function endFrame(abort?: string): EndFrame {
  if (abort === undefined) return { type: FRAME_TYPE.END };
  return { type: FRAME_TYPE.END, abort: abort || 'Transfer aborted' };
}

/** Frame type name for log and error messages */
export function frameTypeName(type: FrameType): string {
  return FRAME_TYPE_BY_VALUE[type];
}

function encodePayload(frame: Frame): Uint8Array {
  switch (frame.type) {
    case FRAME_TYPE.CMD:
      return fromString(frame.text);
    case FRAME_TYPE.STATUS: {
      const msgBytes = fromString(frame.message);
      const payload = allocBytes(1 + msgBytes.length);
      payload[0] = frame.code;
      payload.set(msgBytes, 1);
      return payload;
    }
    case FRAME_TYPE.CHUNK:
      return frame.data;
    case FRAME_TYPE.END:
      return frame.abort === undefined ? EMPTY_BYTES : fromString(frame.abort);
  }
}

/**
 * Serialize a frame into its wire representation
 */
export function encodeFrame(frame: Frame, maxPayloadLength = MAX_PAYLOAD_LENGTH): Uint8Array {
  const payload = encodePayload(frame);
  if (payload.length > maxPayloadLength) {
    throw new ProtocolError(
      'OVERSIZED_LENGTH',
      `${frameTypeName(frame.type)} payload of ${payload.length} bytes exceeds ${maxPayloadLength}`,
    );
  }

  const buf = allocBytes(FRAME_HEADER_LENGTH + payload.length);
  buf[0] = frame.type;
  writeUInt32BE(buf, payload.length, 1);
  buf.set(payload, FRAME_HEADER_LENGTH);
  return buf;
}

function decodePayload(type: FrameType, payload: Uint8Array): Frame {
  switch (type) {
    case FRAME_TYPE.CMD:
      return { type, text: toUtf8(payload) };
    case FRAME_TYPE.STATUS: {
      if (payload.length === 0) {
        throw new ProtocolError('MALFORMED_FRAME', 'STATUS frame without a status code');
      }
      const code = payload[0];
      if (!isStatusCode(code)) {
        throw new ProtocolError('MALFORMED_FRAME', `Unknown status code ${code}`);
      }
      return { type, code, message: toUtf8(payload.subarray(1)) };
    }
    case FRAME_TYPE.CHUNK:
      return { type, data: payload };
    case FRAME_TYPE.END:
      return payload.length === 0 ? { type } : { type, abort: toUtf8(payload) };
  }
}

/**
 * Incremental frame decoder
 *
 * Bytes are pushed as they arrive; `next()` yields a frame once all of it is
 * buffered and `undefined` until then. A bad tag or length throws as soon as
 * the header bytes that prove it are available.
 */
export class FrameDecoder {
  private _buffer: Uint8Array = EMPTY_BYTES;
  private _pos = 0;
  private _maxPayloadLength: number;

  constructor(maxPayloadLength = MAX_PAYLOAD_LENGTH) {
    this._maxPayloadLength = maxPayloadLength;
  }

  /** Bytes received but not yet consumed by a complete frame */
  get buffered(): number {
    return this._buffer.length - this._pos;
  }

  push(data: Uint8Array): void {
    if (data.length === 0) return;
    if (this.buffered === 0) {
      this._buffer = data;
    } else {
      this._buffer = concatBytes([this._buffer.subarray(this._pos), data]);
    }
    this._pos = 0;
  }

  next(): Frame | undefined {
    const available = this.buffered;
    if (available === 0) return undefined;

    const type = this._buffer[this._pos];
    if (!isFrameType(type)) {
      throw new ProtocolError('UNKNOWN_FRAME_TYPE', `Unknown frame type ${byteToHex(type)}`);
    }
    if (available < FRAME_HEADER_LENGTH) return undefined;

    const length = readUInt32BE(this._buffer, this._pos + 1);
    if (length > this._maxPayloadLength) {
      throw new ProtocolError(
        'OVERSIZED_LENGTH',
        `${frameTypeName(type)} frame announces ${length} bytes, limit is ${this._maxPayloadLength}`,
      );
    }
    if (available < FRAME_HEADER_LENGTH + length) return undefined;

    const start = this._pos + FRAME_HEADER_LENGTH;
    const payload = this._buffer.subarray(start, start + length);
    this._pos = start + length;

    return decodePayload(type, payload);
  }

  clear(): void {
    this._buffer = EMPTY_BYTES;
    this._pos = 0;
  }
}
