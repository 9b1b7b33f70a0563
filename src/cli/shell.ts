/**
 * Interactive client shell
 *
 * Reads one command per line, runs it through a Client and prints the
 * outcome. `quit` leaves the shell.
 */

import { createInterface } from 'node:readline/promises';

import type { Client, CommandResult } from '../client.ts';
import type { ListTarget } from '../protocol/command.ts';
import { CommandError } from '../protocol/errors.ts';
import { errorMessage } from '../utils.ts';

export const PROMPT = 'Enter an SFMP command: ';

const RULE = '-'.repeat(20);

/**
 * Framed block printed for a directory listing
 */
export function formatListing(target: ListTarget, entries: readonly string[]): string {
  return [`\nCurrent files in ${target}'s directory:`, RULE, ...entries, `${RULE}\n`].join('\n');
}

export class Shell {
  private _client: Client;
  private _print: (text: string) => void;

  constructor(client: Client, print: (text: string) => void) {
    this._client = client;
    this._print = print;
  }

  /**
   * Handle one input line. Resolves false once the shell should stop,
   * either on `quit` or after the connection broke.
   */
  async handleLine(line: string): Promise<boolean> {
    const text = line.trim();
    if (text === '') return true;
    if (text === 'quit') return false;

    let result: CommandResult | CommandError;
    try {
      result = await this._client.run(text);
    } catch (err) {
      this._print(`There was a problem communicating with the server: ${errorMessage(err)}`);
      return false;
    }

    if (result instanceof CommandError) {
      this._print('Please select a valid command.\n');
      this._print(`${result.usage}\n`);
      return true;
    }

    this._printResult(result);
    return true;
  }

  /**
   * Prompt for commands on `input` until `quit` or end of input
   */
  async run(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<void> {
    const rl = createInterface({ input, output, prompt: PROMPT });
    try {
      rl.prompt();
      for await (const line of rl) {
        if (!(await this.handleLine(line))) break;
        rl.prompt();
      }
    } finally {
      rl.close();
    }
  }

  private _printResult(result: CommandResult): void {
    const { command } = result;
    if (command.type === 'LS' && result.code === 'OK' && result.entries) {
      this._print(formatListing(command.target, result.entries));
      return;
    }
    this._print(result.message);
  }
}
