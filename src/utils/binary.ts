/**
 * Binary utilities for working with Uint8Array
 *
 * Frames are built and parsed as plain Uint8Arrays so the codec works on
 * whatever a Web Streams transport hands it.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Allocate a zero-filled Uint8Array of the given size */
export function allocBytes(size: number): Uint8Array {
  return new Uint8Array(size);
}

/** Create Uint8Array from a UTF-8 string */
export function fromString(str: string): Uint8Array {
  return encoder.encode(str);
}

/** Convert Uint8Array to UTF-8 string */
export function toUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/** Concatenate multiple Uint8Arrays into one */
export function concatBytes(arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * UTF-8 encoding of `str`, cut to at most `maxBytes` without splitting a
 * code point
 */
export function fromStringTruncated(str: string, maxBytes: number): Uint8Array {
  const bytes = encoder.encode(str);
  if (bytes.length <= maxBytes) return bytes;

  let end = maxBytes;
  // Continuation bytes are 0b10xxxxxx
  while (end > 0 && (bytes[end] & 0xc0) === 0x80) end--;
  return bytes.subarray(0, end);
}

/** Read unsigned 32-bit big-endian integer */
export function readUInt32BE(buf: Uint8Array, offset: number): number {
  return (
    ((buf[offset] << 24) >>> 0) +
    (buf[offset + 1] << 16) +
    (buf[offset + 2] << 8) +
    buf[offset + 3]
  );
}

/** Write unsigned 32-bit big-endian integer, returns new offset */
export function writeUInt32BE(buf: Uint8Array, value: number, offset: number): number {
  buf[offset] = (value >>> 24) & 0xff;
  buf[offset + 1] = (value >>> 16) & 0xff;
  buf[offset + 2] = (value >>> 8) & 0xff;
  buf[offset + 3] = value & 0xff;
  return offset + 4;
}

/** Two-digit hex rendering of a single byte, for diagnostics */
export function byteToHex(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}

/** Empty Uint8Array constant */
export const EMPTY_BYTES: Uint8Array = new Uint8Array(0);
