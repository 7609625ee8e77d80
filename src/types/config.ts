/**
 * Interpreter configuration and CLI types
 */

import { DEFAULT_LOG_DIR } from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

/**
 * Interpreter configuration
 */
export interface InterpreterConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  /** Duplicate labels and malformed declarations stop the run */
  strict: boolean;
  /** Validate the script and exit without running it */
  checkOnly: boolean;
}

/**
 * Default interpreter configuration
 */
export const DEFAULT_CONFIG: InterpreterConfig = {
  verbosity: 'normal',
  enableLog: false,
  logDir: DEFAULT_LOG_DIR,
  strict: false,
  checkOnly: false,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  /** Script file path */
  scriptFile: string;
  config: Partial<InterpreterConfig>;
}
