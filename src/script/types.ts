/**
 * Types for loaded scripts and parsed script lines
 */

/**
 * Target of a conditional branch: `#label`, `@name=expr` or plain text
 */
export type Branch =
  | { type: 'goto'; label: string }
  | { type: 'assign'; name: string; expression: string }
  | { type: 'print'; text: string }
  /** Fails with the reason only when the branch is taken */
  | { type: 'invalid'; reason: string };

export type InputMode = 'number' | 'text';

/**
 * Which directive a malformed line was meant to be
 */
export type DirectiveName = 'conditional' | 'choice' | 'input';

/**
 * One parsed script line, selected by its leading sigil
 */
export type Instruction =
  | { type: 'blank' }
  | { type: 'label'; name: string }
  | { type: 'comment' }
  | { type: 'newline' }
  | { type: 'goto'; label: string }
  | {
      type: 'conditional';
      condition: string;
      then: Branch;
      otherwise: Branch | null;
    }
  | { type: 'assignment'; name: string; expression: string }
  | { type: 'choice'; prompt: string; label: string }
  | { type: 'input'; mode: InputMode; prompt: string; variable: string }
  | { type: 'text'; text: string }
  | { type: 'malformed'; directive: DirectiveName; reason: string };

export type InstructionType = Instruction['type'];

/**
 * A loaded script: raw lines and their parse, index for index
 */
export interface Script {
  path: string;
  lines: readonly string[];
  instructions: readonly Instruction[];
}

/** Label name -> line index */
export type LabelTable = Map<string, number>;

/** Variable name -> current text value */
export type VariableStore = Map<string, string>;
