/**
 * Logging
 *
 * The protocol core only emits events and `debug` strings; this module turns
 * them into pino records for the server program.
 */

import { type DestinationStream, type Logger, pino } from 'pino';

import type { LogLevel } from './config.ts';
import type { Server } from './server.ts';
import type { Session, SessionActivity } from './session.ts';

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? 'info',
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return options.destination ? pino(config, options.destination) : pino(config);
}

/**
 * Log one session activity. Received commands, transfers and listings are
 * `info`, rejected commands and failed transfers `warn`.
 */
export function logActivity(logger: Logger, activity: SessionActivity): void {
  const { session } = activity;
  switch (activity.type) {
    case 'command-received':
      logger.info({ session, command: activity.command }, 'command received');
      return;
    case 'command-rejected':
      logger.warn(
        { session, command: activity.command, code: activity.code, reason: activity.message },
        'command rejected',
      );
      return;
    case 'transfer-started':
      logger.info(
        { session, direction: activity.direction, path: activity.path },
        'transfer started',
      );
      return;
    case 'transfer-completed':
      logger.info(
        { session, direction: activity.direction, path: activity.path, bytes: activity.bytes },
        'transfer completed',
      );
      return;
    case 'transfer-failed':
      logger.warn(
        {
          session,
          direction: activity.direction,
          path: activity.path,
          bytes: activity.bytes,
          code: activity.reason,
          reason: activity.message,
        },
        'transfer failed',
      );
      return;
    case 'listing-produced':
      logger.info({ session, path: activity.path, entries: activity.entries }, 'listing produced');
      return;
    case 'idle-timeout':
      logger.info({ session, timeout: activity.timeout }, 'idle timeout');
      return;
  }
}

function peer(session: Session): string | undefined {
  const { remoteAddress, remotePort } = session.transport;
  if (remoteAddress === undefined) return undefined;
  return remotePort === undefined ? remoteAddress : `${remoteAddress}:${remotePort}`;
}

/**
 * Subscribe `logger` to every event of `server`
 */
export function logServerActivity(server: Server, logger: Logger): void {
  server.on('listening', () => {
    const address = server.address();
    logger.info({ ...address, root: server.root }, 'listening for connections');
  });
  server.on('connection', (session) => {
    logger.info(
      { session: session.id, peer: peer(session), connections: server.connections },
      'client connected',
    );
  });
  server.on('disconnect', (session) => {
    logger.info({ session: session.id, connections: server.connections }, 'client disconnected');
  });
  server.on('activity', (_session, activity) => logActivity(logger, activity));
  server.on('session-error', (session, err) => {
    logger.warn({ session: session.id, err }, 'session error');
  });
  server.on('error', (err) => {
    logger.error({ err }, 'server error');
  });
  server.on('close', () => {
    logger.info('server closed');
  });
}
