/**
 * SFMP server program
 *
 * Usage: server [port] [--host addr] [--root dir] [--chunk-size n]
 *               [--idle-timeout ms] [--max-connections n] [--log-level level]
 */

import process from 'node:process';

import { ConfigError, resolveServerConfig } from '../config.ts';
import { createLogger, logServerActivity } from '../logger.ts';
import { Server } from '../server.ts';

async function main(): Promise<void> {
  const settings = resolveServerConfig();
  const logger = createLogger({ level: settings.logLevel });

  const server = new Server({
    root: settings.root,
    chunkSize: settings.chunkSize,
    idleTimeout: settings.idleTimeout || undefined,
    maxConnections: settings.maxConnections || undefined,
    debug: logger.isLevelEnabled('trace') ? (msg) => logger.trace(msg) : undefined,
  });
  logServerActivity(server, logger);

  await server.listen(settings.port, settings.host);

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  console.error(err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
