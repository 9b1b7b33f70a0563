/**
 * SFMP - minimal file transfer protocol client and server for Node.js
 *
 * Files move as length-prefixed frames over any reliable byte stream, with
 * every server-side path confined to a root directory.
 *
 * @module
 */

// ─── Core client / server ────────────────────────────────────────────────────
export * from './src/client.ts';
export * from './src/server.ts';
export * from './src/session.ts';

// ─── Paths and listings ──────────────────────────────────────────────────────
export { isInside, normalizePath, resolvePath } from './src/fs/paths.ts';
export type { EntryKind, ResolvedPath, ResolveOptions } from './src/fs/paths.ts';
export { listDirectory } from './src/fs/lister.ts';

// ─── Protocol (user-facing) ──────────────────────────────────────────────────
export {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PORT,
  FRAME_TYPE,
  MAX_CHUNK_SIZE,
  MAX_PAYLOAD_LENGTH,
  MIN_CHUNK_SIZE,
  STATUS_CODE,
  STATUS_CODE_STR,
} from './src/protocol/constants.ts';
export type { FrameType, StatusCode, StatusName } from './src/protocol/constants.ts';
export { CommandError, PathError, ProtocolError, TransferError } from './src/protocol/errors.ts';
export type { PathErrorCode, ProtocolErrorCode, TransferFailure } from './src/protocol/errors.ts';
export { formatCommand, parseCommand, USAGE } from './src/protocol/command.ts';
export type { Command, GetCommand, ListCommand, ListTarget, PutCommand } from './src/protocol/command.ts';
export type { TransferOutcome, TransferProgress } from './src/protocol/transfer.ts';

// ─── Program support ─────────────────────────────────────────────────────────
export { ConfigError, resolveClientConfig, resolveServerConfig } from './src/config.ts';
export type { ClientSettings, LogLevel, ServerSettings } from './src/config.ts';
export { createLogger, logActivity, logServerActivity } from './src/logger.ts';

// ─── Namespaced internals (for advanced / low-level use) ─────────────────────
export * as protocol from './src/protocol/mod.ts';
export * as adapters from './src/adapters/mod.ts';
