/**
 * Command grammar
 *
 * `GET <src> <dst>` | `PUT <src> <dst>` | `LS client` | `LS server`
 *
 * The command word and the LS target are case-insensitive and arguments are
 * separated by runs of whitespace. Paths therefore cannot contain spaces.
 */

import { CommandError } from './errors.ts';

export type ListTarget = 'client' | 'server';

export interface GetCommand {
  readonly type: 'GET';
  /** Path on the server */
  readonly source: string;
  /** Path on the client */
  readonly destination: string;
}

export interface PutCommand {
  readonly type: 'PUT';
  /** Path on the client */
  readonly source: string;
  /** Path on the server */
  readonly destination: string;
}

export interface ListCommand {
  readonly type: 'LS';
  readonly target: ListTarget;
}

export type Command = GetCommand | PutCommand | ListCommand;

export type CommandName = Command['type'];

export const USAGE: Record<CommandName, string> = {
  GET: 'Usage: GET remote-path local-path',
  PUT: 'Usage: PUT local-path remote-path',
  LS: 'Usage: LS client|server',
};

/** Every usage line, one per command */
export const ALL_USAGE = Object.values(USAGE).join('\n');

export function isCommandName(word: string): word is CommandName {
  return Object.hasOwn(USAGE, word);
}

/**
 * Parse command text. Malformed input yields a CommandError, never a
 * partially filled Command.
 */
export function parseCommand(text: string): Command | CommandError {
  const args = text.trim().split(/\s+/).filter((arg) => arg.length > 0);
  if (args.length === 0) {
    return new CommandError('Empty command', ALL_USAGE);
  }

  const header = args[0].toUpperCase();
  if (!isCommandName(header)) {
    return new CommandError(`Unknown command '${args[0]}'`, ALL_USAGE);
  }

  switch (header) {
    case 'GET':
    case 'PUT': {
      if (args.length !== 3) {
        return new CommandError(
          `${header} takes 2 arguments, got ${args.length - 1}`,
          USAGE[header],
        );
      }
      const [, source, destination] = args;
      return header === 'GET'
        ? Object.freeze<GetCommand>({ type: 'GET', source, destination })
        : Object.freeze<PutCommand>({ type: 'PUT', source, destination });
    }
    case 'LS': {
      if (args.length !== 2) {
        return new CommandError(`LS takes 1 argument, got ${args.length - 1}`, USAGE.LS);
      }
      const target = args[1].toLowerCase();
      if (target !== 'client' && target !== 'server') {
        return new CommandError(`Unknown LS target '${args[1]}'`, USAGE.LS);
      }
      return Object.freeze<ListCommand>({ type: 'LS', target });
    }
  }
}

/**
 * Render a command back into its wire text
 */
export function formatCommand(command: Command): string {
  switch (command.type) {
    case 'GET':
    case 'PUT':
      return `${command.type} ${command.source} ${command.destination}`;
    case 'LS':
      return `LS ${command.target}`;
  }
}
