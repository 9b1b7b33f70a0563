/**
 * SFMP Protocol Module
 *
 * Wire constants, frame codec, command grammar and transfer engine.
 */

export * from './constants.ts';
export * from './errors.ts';
export * from './frame.ts';
export * from './stream.ts';
export * from './command.ts';
export * from './transfer.ts';
