/**
 * Menu and input prompts - the only places the engine waits on the user
 */

import { type ConsoleIO, stripLineEnding } from '../io/console.js';
import { errorAt } from '../script/errors.js';
import type { InputMode } from '../script/types.js';
import {
  INPUT_NOT_A_NUMBER,
  MENU_NOT_A_NUMBER,
  MENU_OUT_OF_RANGE,
} from '../utils/constants.js';

export interface Choice {
  prompt: string;
  label: string;
}

const ALPHABETIC = /\p{Alphabetic}/u;
const UNSIGNED_INTEGER = /^\+?\d+$/;

export function containsAlphabetic(text: string): boolean {
  return ALPHABETIC.test(text);
}

async function readRequired(io: ConsoleIO, index: number): Promise<string> {
  const line = await io.readLine();
  if (line === null) {
    throw errorAt(
      'InputClosed',
      index,
      'Input ended while waiting for an answer'
    );
  }
  return stripLineEnding(line);
}

/**
 * Parse a menu answer
 * @returns 1-based choice, or the message to show before asking again
 */
export function parseMenuAnswer(
  answer: string,
  count: number
): number | string {
  if (containsAlphabetic(answer)) {
    return MENU_NOT_A_NUMBER(count);
  }
  if (!UNSIGNED_INTEGER.test(answer)) {
    return MENU_OUT_OF_RANGE(count);
  }
  const selected = Number(answer);
  if (selected < 1 || selected > count) {
    return MENU_OUT_OF_RANGE(count);
  }
  return selected;
}

/**
 * Print numbered choices and wait for a valid selection
 *
 * @param index - Line index of the first choice, for errors
 * @returns The chosen entry
 */
export async function promptChoice(
  io: ConsoleIO,
  choices: readonly Choice[],
  index: number
): Promise<Choice> {
  for (const [i, choice] of choices.entries()) {
    io.writeLine(`${i + 1}. ${choice.prompt}`);
  }

  // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition -- re-asks until valid
  while (true) {
    const answer = await readRequired(io, index);
    const parsed = parseMenuAnswer(answer, choices.length);
    if (typeof parsed === 'string') {
      io.writeLine(parsed);
      continue;
    }
    const choice = choices[parsed - 1];
    if (choice) {
      return choice;
    }
  }
}

/**
 * Ask for a value
 * Number mode repeats until the answer has no alphabetic characters;
 * text mode accepts the first line
 */
export async function promptInput(
  io: ConsoleIO,
  mode: InputMode,
  prompt: string,
  index: number
): Promise<string> {
  // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition -- re-asks until valid
  while (true) {
    io.writeLine('');
    io.writeLine(prompt);
    const answer = await readRequired(io, index);

    if (mode === 'number' && containsAlphabetic(answer)) {
      io.writeLine(INPUT_NOT_A_NUMBER);
      continue;
    }
    return answer;
  }
}
