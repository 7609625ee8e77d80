/**
 * Centralized constants for the interpreter
 */

// === Defaults ===
/** Directory for event logs when --log is given without --log-dir */
export const DEFAULT_LOG_DIR = 'logs';

// === Exit Codes ===
export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

// === Console Messages ===
/** Menu answer contained letters */
export const MENU_NOT_A_NUMBER = (count: number): string =>
  `You must enter a NUMBER between 1 and ${count}`;
/** Menu answer was not a whole number in range */
export const MENU_OUT_OF_RANGE = (count: number): string =>
  `You must enter a number between 1 and ${count}`;
/** Numeric input contained letters */
export const INPUT_NOT_A_NUMBER =
  'You may only enter in a Number. Please try again.';

// === Display Limits ===
/** Truncation length for line previews in logs */
export const TRUNCATE_PREVIEW = 50;
