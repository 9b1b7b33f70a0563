/**
 * Logger Tests
 */

import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createLogger, logActivity } from '../src/logger.ts';

interface LogRecord {
  level: number;
  msg: string;
  [key: string]: unknown;
}

function capture(level: 'info' | 'debug' = 'info') {
  const records: LogRecord[] = [];
  const logger = createLogger({ level, destination: { write: (line) => records.push(JSON.parse(line)) } });
  return { records, logger };
}

/** Drop the timestamp so records compare by value */
function withoutTime({ time, ...rest }: LogRecord): Omit<LogRecord, 'time'> {
  assert.equal(typeof time, 'string');
  return rest;
}

test('createLogger: records carry an ISO timestamp and no pid or hostname', () => {
  const { records, logger } = capture();

  logger.info({ port: 57005 }, 'hello');

  assert.equal(records.length, 1);
  assert.match(String(records[0].time), /^\d{4}-\d{2}-\d{2}T/);
  assert.deepEqual(withoutTime(records[0]), { level: 30, port: 57005, msg: 'hello' });
});

test('createLogger: records below the level are dropped', () => {
  const { records, logger } = capture('info');

  logger.debug('hidden');
  logger.warn('shown');

  assert.deepEqual(records.map((r) => r.msg), ['shown']);
});

test('logActivity: completed transfers are info with the byte count', () => {
  const { records, logger } = capture();

  logActivity(logger, {
    type: 'transfer-completed',
    session: 'session-1',
    direction: 'send',
    path: 'mytext.txt',
    bytes: 5,
  });

  assert.deepEqual(records.map(withoutTime), [
    {
      level: 30,
      session: 'session-1',
      direction: 'send',
      path: 'mytext.txt',
      bytes: 5,
      msg: 'transfer completed',
    },
  ]);
});

test('logActivity: rejected commands and failed transfers are warnings', () => {
  const { records, logger } = capture();

  logActivity(logger, {
    type: 'command-rejected',
    session: 'session-2',
    command: 'GET ../x y',
    code: 'OUTSIDE_ROOT',
    message: "Path '../x' is outside the server root",
  });
  logActivity(logger, {
    type: 'transfer-failed',
    session: 'session-2',
    direction: 'receive',
    path: 'a/b.txt',
    bytes: 0,
    reason: 'DIRECTORY_NOT_FOUND',
    message: 'No such directory: /srv/a',
  });

  assert.deepEqual(records.map(withoutTime), [
    {
      level: 40,
      session: 'session-2',
      command: 'GET ../x y',
      code: 'OUTSIDE_ROOT',
      reason: "Path '../x' is outside the server root",
      msg: 'command rejected',
    },
    {
      level: 40,
      session: 'session-2',
      direction: 'receive',
      path: 'a/b.txt',
      bytes: 0,
      code: 'DIRECTORY_NOT_FOUND',
      reason: 'No such directory: /srv/a',
      msg: 'transfer failed',
    },
  ]);
});

test('logActivity: received commands are info', () => {
  const { records, logger } = capture();

  logActivity(logger, { type: 'command-received', session: 'session-3', command: 'LS server' });

  assert.deepEqual(records.map(withoutTime), [
    { level: 30, session: 'session-3', command: 'LS server', msg: 'command received' },
  ]);
});
