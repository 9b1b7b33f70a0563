/**
 * SFMP Protocol Constants
 *
 * Frame tags, status codes and size limits of the wire protocol.
 * Frame layout: `[1 byte tag][4 bytes big-endian length][length bytes payload]`.
 */

/**
 * Frame type tags
 */
export const FRAME_TYPE = {
  CMD: 0x01,
  STATUS: 0x02,
  CHUNK: 0x03,
  END: 0x04,
} as const;

export type FrameType = (typeof FRAME_TYPE)[keyof typeof FRAME_TYPE];

export type FrameTypeName = keyof typeof FRAME_TYPE;

export const FRAME_TYPE_BY_VALUE: Record<FrameType, FrameTypeName> = {
  [FRAME_TYPE.CMD]: 'CMD',
  [FRAME_TYPE.STATUS]: 'STATUS',
  [FRAME_TYPE.CHUNK]: 'CHUNK',
  [FRAME_TYPE.END]: 'END',
};

const VALID_FRAME_TYPES = new Set<number>(Object.values(FRAME_TYPE));

export function isFrameType(value: number): value is FrameType {
  return VALID_FRAME_TYPES.has(value);
}

/**
 * Status codes carried in the first payload byte of a STATUS frame
 */
export const STATUS_CODE = {
  OK: 0,
  BAD_COMMAND: 1,
  FILE_NOT_FOUND: 2,
  DIRECTORY_NOT_FOUND: 3,
  NOT_A_DIRECTORY: 4,
  OUTSIDE_ROOT: 5,
  IO_ERROR: 6,
} as const;

export type StatusCode = (typeof STATUS_CODE)[keyof typeof STATUS_CODE];

export type StatusName = keyof typeof STATUS_CODE;

export const STATUS_NAME_BY_VALUE: Record<StatusCode, StatusName> = {
  [STATUS_CODE.OK]: 'OK',
  [STATUS_CODE.BAD_COMMAND]: 'BAD_COMMAND',
  [STATUS_CODE.FILE_NOT_FOUND]: 'FILE_NOT_FOUND',
  [STATUS_CODE.DIRECTORY_NOT_FOUND]: 'DIRECTORY_NOT_FOUND',
  [STATUS_CODE.NOT_A_DIRECTORY]: 'NOT_A_DIRECTORY',
  [STATUS_CODE.OUTSIDE_ROOT]: 'OUTSIDE_ROOT',
  [STATUS_CODE.IO_ERROR]: 'IO_ERROR',
};

/**
 * Human-readable status code descriptions, used when a status carries no
 * message of its own
 */
export const STATUS_CODE_STR: Record<StatusCode, string> = {
  [STATUS_CODE.OK]: 'OK',
  [STATUS_CODE.BAD_COMMAND]: 'Bad command',
  [STATUS_CODE.FILE_NOT_FOUND]: 'No such file',
  [STATUS_CODE.DIRECTORY_NOT_FOUND]: 'No such directory',
  [STATUS_CODE.NOT_A_DIRECTORY]: 'Not a directory',
  [STATUS_CODE.OUTSIDE_ROOT]: 'Path is outside the server root',
  [STATUS_CODE.IO_ERROR]: 'I/O error',
};

const VALID_STATUS_CODES = new Set<number>(Object.values(STATUS_CODE));

export function isStatusCode(value: number): value is StatusCode {
  return VALID_STATUS_CODES.has(value);
}

/** Tag byte plus 32-bit length */
export const FRAME_HEADER_LENGTH = 5;

/** Largest payload the decoder accepts */
export const MAX_PAYLOAD_LENGTH = 64 * 1024;

/** Chunk size bounds for file transfers */
export const MIN_CHUNK_SIZE = 4 * 1024;
export const MAX_CHUNK_SIZE = MAX_PAYLOAD_LENGTH;
export const DEFAULT_CHUNK_SIZE = 32768;

/** 57005 */
export const DEFAULT_PORT = 0xdead;
