/**
 * Script error taxonomy and diagnostic formatting
 */

export type ScriptErrorKind =
  | 'LoadFailure'
  | 'MalformedDirective'
  | 'UndeclaredVariableReference'
  | 'MissingLabel'
  | 'NonNumericOrderingComparison'
  | 'InputClosed'
  | 'DuplicateLabel'
  | 'MalformedDeclaration';

export type Severity = 'error' | 'warning';

/**
 * Fatal condition raised while loading, scanning or running a script
 */
export class ScriptError extends Error {
  readonly kind: ScriptErrorKind;
  /** 0-based line index, or null when no line applies */
  readonly index: number | null;

  constructor(kind: ScriptErrorKind, index: number | null, message: string) {
    super(message);
    this.name = 'ScriptError';
    this.kind = kind;
    this.index = index;
  }
}

/**
 * A finding from the pre-scan or the static checker
 */
export interface Diagnostic {
  kind: ScriptErrorKind;
  severity: Severity;
  index: number;
  message: string;
}

export function errorAt(
  kind: ScriptErrorKind,
  index: number | null,
  message: string
): ScriptError {
  return new ScriptError(kind, index, message);
}

/**
 * Format a script error for the terminal: "MissingLabel at line 4: ..."
 */
export function formatScriptError(error: ScriptError): string {
  if (error.index === null) {
    return `${error.kind}: ${error.message}`;
  }
  return `${error.kind} at line ${error.index + 1}: ${error.message}`;
}

export function formatDiagnostic(file: string, diagnostic: Diagnostic): string {
  return `${file}:${diagnostic.index + 1}: ${diagnostic.severity} ${diagnostic.kind}: ${diagnostic.message}`;
}

export function diagnosticToError(diagnostic: Diagnostic): ScriptError {
  return new ScriptError(diagnostic.kind, diagnostic.index, diagnostic.message);
}
