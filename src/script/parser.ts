/**
 * Script line parser
 *
 * Each line is classified once by its leading sigil:
 * - :label                    label declaration
 * - @name=expr                assignment (other @ lines are text)
 * - !left==right:then[:else]  conditional
 * - #label                    goto
 * - ?prompt:#label            menu choice
 * - ^i prompt:@var / ^s ...   input request
 * - |                         blank output line
 * - *comment                  ignored
 * - anything else             text
 */

import type { Branch, DirectiveName, Instruction, InputMode } from './types.js';

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

function malformed(directive: DirectiveName, reason: string): Instruction {
  return { type: 'malformed', directive, reason };
}

/**
 * Split into exactly two parts, or null when the separator count differs
 */
export function splitPair(
  text: string,
  separator: string
): [string, string] | null {
  const parts = text.split(separator);
  const [left, right] = parts;
  if (parts.length !== 2 || left === undefined || right === undefined) {
    return null;
  }
  return [left, right];
}

/**
 * Remove the leading # characters from a goto target
 */
export function stripGotoMarker(text: string): string {
  return text.replace(/^#+/, '');
}

/**
 * Parse the text of a conditional branch (already trimmed)
 */
export function parseBranch(text: string): Branch {
  const sigil = charAt(text, 0);

  if (sigil === '') {
    return { type: 'invalid', reason: 'branch text is empty' };
  }

  if (sigil === '#') {
    return { type: 'goto', label: stripGotoMarker(text) };
  }

  if (sigil === '@') {
    const pair = splitPair(text, '=');
    if (!pair) {
      return {
        type: 'invalid',
        reason: `assignment '${text}' must contain exactly one '='`,
      };
    }
    return { type: 'assign', name: pair[0].slice(1), expression: pair[1] };
  }

  return { type: 'print', text };
}

/**
 * Parse a conditional: !<expression>:<then>[:<else>]
 */
export function parseConditional(line: string): Instruction {
  const parts = line.slice(1).split(':');

  if (parts.length < 2 || parts.length > 3) {
    return malformed(
      'conditional',
      `conditional must have 2 or 3 parts separated by ':' but has ${parts.length}`
    );
  }

  const [condition = '', thenText = '', elseText] = parts;

  return {
    type: 'conditional',
    condition,
    then: parseBranch(thenText.trim()),
    otherwise: elseText === undefined ? null : parseBranch(elseText.trim()),
  };
}

/**
 * Parse a menu choice: ?<prompt>:<label>
 */
export function parseChoice(line: string): Instruction {
  const pair = splitPair(line, ':');
  if (!pair) {
    return malformed(
      'choice',
      `choice must have a prompt and a label separated by one ':'`
    );
  }

  return {
    type: 'choice',
    prompt: pair[0].slice(1),
    label: stripGotoMarker(pair[1]),
  };
}

function parseInputMode(char: string): InputMode | null {
  if (char === 'i') return 'number';
  if (char === 's') return 'text';
  return null;
}

/**
 * Parse an input request: ^<mode><prompt>:@<variable>
 */
export function parseInput(line: string): Instruction {
  const pair = splitPair(line, ':');
  if (!pair) {
    return malformed(
      'input',
      `input must have a prompt and a variable separated by one ':'`
    );
  }

  const [left, right] = pair;
  const modeChar = charAt(left, 1);
  const mode = parseInputMode(modeChar);

  if (!mode) {
    const found = modeChar === '' ? 'nothing' : `'${modeChar}'`;
    return malformed(
      'input',
      `input mode must be 'i' or 's' right after '^' but found ${found}`
    );
  }

  if (charAt(right, 0) !== '@') {
    return malformed(
      'input',
      `input target must be a variable like @name but found '${right}'`
    );
  }

  return {
    type: 'input',
    mode,
    prompt: left.slice(2),
    variable: right.slice(1),
  };
}

/**
 * Parse an @ line: an assignment when it splits on '=' into two parts,
 * text with variable references otherwise
 */
export function parseVariableLine(line: string): Instruction {
  const pair = splitPair(line, '=');
  if (!pair) {
    return { type: 'text', text: line };
  }
  return { type: 'assignment', name: pair[0].slice(1), expression: pair[1] };
}

/**
 * Parse a single script line
 */
export function parseLine(line: string): Instruction {
  switch (charAt(line, 0)) {
    case '':
    case '\r':
    case '\n':
      return { type: 'blank' };
    case ':':
      return { type: 'label', name: line.slice(1) };
    case '*':
      return { type: 'comment' };
    case '|':
      return { type: 'newline' };
    case '#':
      return { type: 'goto', label: stripGotoMarker(line) };
    case '!':
      return parseConditional(line);
    case '@':
      return parseVariableLine(line);
    case '?':
      return parseChoice(line);
    case '^':
      return parseInput(line);
    default:
      return { type: 'text', text: line };
  }
}

/**
 * Split file content into script lines
 * Accepts LF and CRLF; a final newline does not add an empty line
 */
export function splitScriptLines(content: string): string[] {
  const body = content.startsWith('\uFEFF') ? content.slice(1) : content;
  if (body === '') {
    return [];
  }

  const lines = body.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
