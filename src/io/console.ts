/**
 * Line-oriented console port used by the engine
 */

import * as readline from 'readline';

export interface ConsoleIO {
  /** Write one line of story output */
  writeLine(text: string): void;
  /** Read one line, without its line ending; null once input has ended */
  readLine(): Promise<string | null>;
  close(): void;
}

export interface StdConsoleOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Console over stdin/stdout
 * The readline interface is created on the first read so scripts without
 * prompts never hold stdin open
 */
export function createStdConsole(options: StdConsoleOptions = {}): ConsoleIO {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  let rl: readline.Interface | null = null;
  let lines: AsyncIterator<string> | null = null;

  function iterator(): AsyncIterator<string> {
    if (!lines) {
      rl = readline.createInterface({ input, crlfDelay: Infinity });
      lines = rl[Symbol.asyncIterator]();
    }
    return lines;
  }

  return {
    writeLine(text: string): void {
      output.write(text + '\n');
    },
    async readLine(): Promise<string | null> {
      const next = await iterator().next();
      return next.done ? null : next.value;
    },
    close(): void {
      rl?.close();
    },
  };
}

/**
 * Remove a trailing CR/LF pair or either alone
 */
export function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$|\r$/, '');
}
