/**
 * Script module - loading, parsing, pre-scan and variable management
 */

// Types
export type {
  Branch,
  DirectiveName,
  InputMode,
  Instruction,
  InstructionType,
  LabelTable,
  Script,
  VariableStore,
} from './types.js';

// Errors
export type { Diagnostic, ScriptErrorKind, Severity } from './errors.js';
export {
  diagnosticToError,
  errorAt,
  formatDiagnostic,
  formatScriptError,
  ScriptError,
} from './errors.js';

// Loader
export { createScript, loadScript } from './loader.js';

// Parser (for direct use if needed)
export { parseBranch, parseLine, splitScriptLines } from './parser.js';

// Pre-scan and static check
export type { ScanOptions, ScanResult } from './scanner.js';
export { scanScript } from './scanner.js';
export { checkScript, hasErrors } from './checker.js';

// Variables
export {
  assignVariable,
  createVariableStore,
  declareVariable,
  findVariableReferences,
  substituteVariables,
} from './variables.js';
