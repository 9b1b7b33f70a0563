/**
 * SFMP Transfer Engine
 *
 * Streams files as CHUNK frames terminated by END, and writes received chunk
 * streams to disk. Incoming data lands in a hidden temporary sibling of the
 * destination that is renamed into place only after a clean END, so a
 * destination is either absent, unchanged or complete.
 */

import { type FileHandle, open, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';

import { errorMessage, isMissingEntry, statOrUndefined, temporaryPathFor } from '../utils.ts';
import { allocBytes, fromString, toUtf8 } from '../utils/binary.ts';
import { DEFAULT_CHUNK_SIZE, FRAME_TYPE } from './constants.ts';
import { ProtocolError, TransferError, type TransferFailure } from './errors.ts';
import { type ChunkFrame, chunkFrame, type EndFrame, endFrame, frameTypeName } from './frame.ts';
import type { FrameReader, FrameWriter } from './stream.ts';

export type TransferOutcome =
  | { success: true; bytesTransferred: number }
  | { success: false; bytesTransferred: number; reason: TransferFailure; message: string };

export interface TransferProgress {
  /** Bytes moved so far, including this chunk */
  transferred: number;
  /** Size of this chunk */
  chunk: number;
  /** Source size, when the sending side knows it */
  total?: number;
}

export interface TransferOptions {
  /** Bytes per CHUNK frame */
  chunkSize?: number;
  /** Called after each chunk */
  step?: (progress: TransferProgress) => void;
}

/**
 * The part of a file handle a send reads through
 */
export interface ReadHandle {
  read(buffer: Uint8Array, offset: number, length: number, position: number): Promise<{ bytesRead: number }>;
  close(): Promise<void>;
}

/**
 * An opened regular file ready to be streamed
 */
export interface SourceFile {
  handle: ReadHandle;
  size: number;
}

function failed(err: TransferError, bytesTransferred = 0): TransferOutcome {
  return { success: false, bytesTransferred, reason: err.code, message: err.message };
}

/**
 * Open a file for sending. Missing entries and anything that is not a
 * regular file are FILE_NOT_FOUND.
 */
export async function openSource(path: string): Promise<SourceFile | TransferError> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    if (isMissingEntry(err)) {
      return new TransferError('FILE_NOT_FOUND', `No such file: ${path}`, { cause: err });
    }
    return new TransferError('IO_ERROR', `Cannot open '${path}': ${errorMessage(err)}`, { cause: err });
  }

  try {
    const stats = await handle.stat();
    if (!stats.isFile()) {
      await handle.close();
      return new TransferError('FILE_NOT_FOUND', `Not a regular file: ${path}`);
    }
    return { handle, size: stats.size };
  } catch (err) {
    await handle.close();
    return new TransferError('IO_ERROR', `Cannot stat '${path}': ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Lazy, finite sequence of a file's bytes in chunks of at most `chunkSize`.
 * Each chunk is a fresh buffer, so consumers may hold on to it.
 */
export async function* fileChunks(
  handle: ReadHandle,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): AsyncGenerator<Uint8Array, void, undefined> {
  let position = 0;
  while (true) {
    const buffer = allocBytes(chunkSize);
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, chunkSize, position));
    } catch (err) {
      throw new TransferError('IO_ERROR', `Read failed at offset ${position}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (bytesRead === 0) return;
    position += bytesRead;
    yield bytesRead === chunkSize ? buffer : buffer.subarray(0, bytesRead);
  }
}

/**
 * Send an opened file as CHUNK frames followed by END. A read failure
 * mid-stream still terminates the transfer, with an aborting END.
 * The handle is closed in every case.
 */
export async function streamFile(
  writer: FrameWriter,
  source: SourceFile,
  options: TransferOptions = {},
): Promise<TransferOutcome> {
  let transferred = 0;
  try {
    for await (const chunk of fileChunks(source.handle, options.chunkSize)) {
      await writer.write(chunkFrame(chunk));
      transferred += chunk.length;
      options.step?.({ transferred, chunk: chunk.length, total: source.size });
    }
  } catch (err) {
    if (!(err instanceof TransferError)) throw err;
    await writer.write(endFrame(err.message));
    return failed(err, transferred);
  } finally {
    await source.handle.close();
  }

  await writer.write(endFrame());
  return { success: true, bytesTransferred: transferred };
}

/**
 * Send the file at `path`. When it cannot be opened, nothing is written.
 */
export async function sendFile(
  writer: FrameWriter,
  path: string,
  options: TransferOptions = {},
): Promise<TransferOutcome> {
  const source = await openSource(path);
  if (source instanceof TransferError) return failed(source);
  return await streamFile(writer, source, options);
}

/**
 * Next frame of an inbound transfer. Anything other than CHUNK or END is out
 * of order; a closed stream is an unexpected EOF.
 */
async function nextTransferFrame(reader: FrameReader): Promise<ChunkFrame | EndFrame> {
  const frame = await reader.read();
  if (frame === null) {
    throw new ProtocolError('UNEXPECTED_EOF', 'Stream ended during a transfer');
  }
  if (frame.type === FRAME_TYPE.CHUNK || frame.type === FRAME_TYPE.END) return frame;
  throw new ProtocolError(
    'OUT_OF_ORDER',
    `Unexpected ${frameTypeName(frame.type)} frame during a transfer`,
  );
}

/**
 * Read and discard an inbound transfer up to its END. Returns the number of
 * bytes discarded.
 */
export async function drainTransfer(reader: FrameReader): Promise<number> {
  let discarded = 0;
  let frame = await nextTransferFrame(reader);
  while (frame.type === FRAME_TYPE.CHUNK) {
    discarded += frame.data.length;
    frame = await nextTransferFrame(reader);
  }
  return discarded;
}

async function writeAll(handle: FileHandle, data: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < data.length) {
    const { bytesWritten } = await handle.write(data, offset, data.length - offset);
    offset += bytesWritten;
  }
}

/**
 * Check that `path` can receive a file. Returns the failure to report, if any.
 */
async function checkDestination(path: string): Promise<TransferError | undefined> {
  const parent = dirname(path);
  try {
    const parentStats = await statOrUndefined(parent);
    if (!parentStats?.isDirectory()) {
      return new TransferError('DIRECTORY_NOT_FOUND', `No such directory: ${parent}`);
    }
    const existing = await statOrUndefined(path);
    if (existing?.isDirectory()) {
      return new TransferError('IO_ERROR', `'${path}' is a directory`);
    }
  } catch (err) {
    return new TransferError('IO_ERROR', `Cannot access '${path}': ${errorMessage(err)}`, { cause: err });
  }
  return undefined;
}

/**
 * Receive an inbound transfer into `path`.
 *
 * Chunks are written to a temporary file in the destination directory. On a
 * clean END it replaces `path`; on an aborting END, a write failure or a
 * dropped stream it is removed. A rejected destination still consumes the
 * transfer so the stream stays frame-aligned.
 */
export async function receiveFile(
  reader: FrameReader,
  path: string,
  options: TransferOptions = {},
): Promise<TransferOutcome> {
  const rejected = await checkDestination(path);
  if (rejected) {
    await drainTransfer(reader);
    return failed(rejected);
  }

  const tempPath = temporaryPathFor(path);
  let handle: FileHandle;
  try {
    handle = await open(tempPath, 'wx');
  } catch (err) {
    await drainTransfer(reader);
    return failed(
      new TransferError('IO_ERROR', `Cannot create '${tempPath}': ${errorMessage(err)}`, { cause: err }),
    );
  }

  let committed = false;
  let transferred = 0;
  let writeFailure: TransferError | undefined;

  try {
    let frame = await nextTransferFrame(reader);
    while (frame.type === FRAME_TYPE.CHUNK) {
      // After a write failure the rest of the stream is only consumed
      if (!writeFailure) {
        try {
          await writeAll(handle, frame.data);
          transferred += frame.data.length;
          options.step?.({ transferred, chunk: frame.data.length });
        } catch (err) {
          writeFailure = new TransferError('IO_ERROR', `Write failed: ${errorMessage(err)}`, {
            cause: err,
          });
        }
      }
      frame = await nextTransferFrame(reader);
    }

    if (frame.abort !== undefined) {
      return failed(new TransferError('IO_ERROR', `Sender aborted: ${frame.abort}`), transferred);
    }
    if (writeFailure) return failed(writeFailure, transferred);

    try {
      await handle.close();
      await rename(tempPath, path);
      committed = true;
    } catch (err) {
      return failed(
        new TransferError('IO_ERROR', `Cannot store '${path}': ${errorMessage(err)}`, { cause: err }),
        transferred,
      );
    }
    return { success: true, bytesTransferred: transferred };
  } finally {
    // A second close of a FileHandle is a no-op
    await handle.close();
    if (!committed) await rm(tempPath, { force: true });
  }
}

/**
 * Send a directory listing: one CHUNK per entry name, then END.
 */
export async function sendListing(writer: FrameWriter, entries: readonly string[]): Promise<void> {
  for (const name of entries) {
    await writer.write(chunkFrame(fromString(name)));
  }
  await writer.write(endFrame());
}

/**
 * Receive a directory listing sent by {@link sendListing}
 */
export async function receiveListing(reader: FrameReader): Promise<string[] | TransferError> {
  const entries: string[] = [];
  let frame = await nextTransferFrame(reader);
  while (frame.type === FRAME_TYPE.CHUNK) {
    entries.push(toUtf8(frame.data));
    frame = await nextTransferFrame(reader);
  }
  if (frame.abort !== undefined) {
    return new TransferError('IO_ERROR', `Listing aborted: ${frame.abort}`);
  }
  return entries;
}

