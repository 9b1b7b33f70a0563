/**
 * SFMP client program
 *
 * Usage: client [host] [port] [--cwd dir] [--chunk-size n] [--timeout ms]
 */

import process from 'node:process';

import { Client } from '../client.ts';
import { ConfigError, resolveClientConfig } from '../config.ts';
import { Shell } from './shell.ts';

async function main(): Promise<void> {
  const settings = resolveClientConfig();
  const { host, port } = settings;

  const client = new Client({ cwd: settings.cwd, chunkSize: settings.chunkSize });

  console.log(`Connecting to ${host} on port ${port}...`);
  await client.connect({ host, port, timeout: settings.timeout || undefined });
  console.log(`Successfully connected to ${host} on port ${port}`);

  const shell = new Shell(client, (text) => console.log(text));
  try {
    await shell.run(process.stdin, process.stdout);
  } finally {
    client.end();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof ConfigError ? err.message : err);
  process.exit(1);
});
