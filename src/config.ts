/**
 * Configuration for the server and client programs
 *
 * Values come from `SFMP_*` environment variables, overridden by
 * command-line options, and are validated with zod.
 */

import { resolve } from 'node:path';
import process from 'node:process';
import { parseArgs } from 'node:util';

import { z } from 'zod';

import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_PORT,
  MAX_CHUNK_SIZE,
  MIN_CHUNK_SIZE,
} from './protocol/constants.ts';
import { errorMessage } from './utils.ts';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Largest delay setTimeout accepts */
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

type Env = Record<string, string | undefined>;

const intField = (fallback: number, min: number, max: number) =>
  z.union([z.string(), z.number(), z.undefined()]).transform((value, ctx): number => {
    if (value === undefined) return fallback;
    if (typeof value === 'string' && !value.trim()) return fallback;

    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be an integer between ${min} and ${max}`,
      });
      return z.NEVER;
    }
    return parsed;
  });

const stringField = (fallback: string) =>
  z.union([z.string(), z.undefined()]).transform((value): string => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
    return fallback;
  });

const logLevelField = stringField('info')
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(LOG_LEVELS));

const serverSchema = z.object({
  host: stringField('0.0.0.0'),
  port: intField(DEFAULT_PORT, 0, 65535),
  root: stringField('.'),
  chunkSize: intField(DEFAULT_CHUNK_SIZE, MIN_CHUNK_SIZE, MAX_CHUNK_SIZE),
  idleTimeout: intField(0, 0, MAX_TIMEOUT_MS),
  maxConnections: intField(0, 0, Number.MAX_SAFE_INTEGER),
  logLevel: logLevelField,
});

const clientSchema = z.object({
  host: stringField('localhost'),
  port: intField(DEFAULT_PORT, 1, 65535),
  cwd: stringField('.'),
  chunkSize: intField(DEFAULT_CHUNK_SIZE, MIN_CHUNK_SIZE, MAX_CHUNK_SIZE),
  timeout: intField(10000, 0, MAX_TIMEOUT_MS),
});

export interface ServerSettings {
  host: string;
  port: number;
  /** Absolute path of the served directory */
  root: string;
  chunkSize: number;
  /** 0 disables the idle timeout */
  idleTimeout: number;
  /** 0 means unlimited */
  maxConnections: number;
  logLevel: LogLevel;
}

export interface ClientSettings {
  host: string;
  port: number;
  /** Absolute path client-side paths are resolved against */
  cwd: string;
  chunkSize: number;
  /** Connection timeout in ms, 0 for none */
  timeout: number;
}

/**
 * Invalid configuration. `issues` holds one `field: problem` line per
 * rejected value.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: Record<string, unknown>): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }
  return result.data;
}

/** First defined value, so command-line options win over the environment */
function pick(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined);
}

/** Run parseArgs, reporting unknown or malformed options as a ConfigError */
function commandLine<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    throw new ConfigError([errorMessage(err)]);
  }
}

/**
 * Server settings from `argv` (without the program name) and `env`.
 *
 * Options: `--host`, `--port`/`-p`, `--root`/`-r`, `--chunk-size`,
 * `--idle-timeout`, `--max-connections`, `--log-level`. A single positional
 * argument is taken as the port.
 */
export function resolveServerConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
): ServerSettings {
  const { values, positionals } = commandLine(() =>
    parseArgs({
      args: argv,
      options: {
        host: { type: 'string' },
        port: { type: 'string', short: 'p' },
        root: { type: 'string', short: 'r' },
        'chunk-size': { type: 'string' },
        'idle-timeout': { type: 'string' },
        'max-connections': { type: 'string' },
        'log-level': { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );
  if (positionals.length > 1) {
    throw new ConfigError([`unexpected arguments: ${positionals.slice(1).join(' ')}`]);
  }

  const settings = parseWith(serverSchema, {
    host: pick(values.host, env.SFMP_HOST),
    port: pick(values.port, positionals[0], env.SFMP_PORT),
    root: pick(values.root, env.SFMP_ROOT),
    chunkSize: pick(values['chunk-size'], env.SFMP_CHUNK_SIZE),
    idleTimeout: pick(values['idle-timeout'], env.SFMP_IDLE_TIMEOUT_MS),
    maxConnections: pick(values['max-connections'], env.SFMP_MAX_CONNECTIONS),
    logLevel: pick(values['log-level'], env.SFMP_LOG_LEVEL),
  });

  return { ...settings, root: resolve(settings.root) };
}

/**
 * Client settings. Positionals are `[host] [port]`; `--cwd`, `--chunk-size`
 * and `--timeout` are options.
 */
export function resolveClientConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
): ClientSettings {
  const { values, positionals } = commandLine(() =>
    parseArgs({
      args: argv,
      options: {
        cwd: { type: 'string' },
        'chunk-size': { type: 'string' },
        timeout: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );
  if (positionals.length > 2) {
    throw new ConfigError([`unexpected arguments: ${positionals.slice(2).join(' ')}`]);
  }

  const settings = parseWith(clientSchema, {
    host: pick(positionals[0], env.SFMP_HOST),
    port: pick(positionals[1], env.SFMP_PORT),
    cwd: values.cwd,
    chunkSize: pick(values['chunk-size'], env.SFMP_CHUNK_SIZE),
    timeout: values.timeout,
  });

  return { ...settings, cwd: resolve(settings.cwd) };
}
