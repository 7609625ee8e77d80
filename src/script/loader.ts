/**
 * Script file loading
 */

import * as fs from 'fs';

import { errorAt } from './errors.js';
import { parseLine, splitScriptLines } from './parser.js';
import type { Script } from './types.js';

/**
 * Build a script from in-memory content
 */
export function createScript(content: string, path = '<memory>'): Script {
  const lines = splitScriptLines(content);
  return {
    path,
    lines,
    instructions: lines.map((line) => parseLine(line)),
  };
}

/**
 * Load and parse a script file
 *
 * @param scriptFile - Path to the script file
 * @returns Script with raw lines and one parsed instruction per line
 */
export function loadScript(scriptFile: string): Script {
  if (!fs.existsSync(scriptFile)) {
    throw errorAt('LoadFailure', null, `Script not found: ${scriptFile}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(scriptFile, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw errorAt('LoadFailure', null, `Cannot read ${scriptFile}: ${msg}`);
  }

  return createScript(content, scriptFile);
}
