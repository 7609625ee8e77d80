/**
 * Pre-scan: builds the label table and declares variables before execution
 */

import { type Diagnostic, diagnosticToError } from './errors.js';
import { createVariableStore, declareVariable } from './variables.js';
import type { LabelTable, Script, VariableStore } from './types.js';

export interface ScanResult {
  labels: LabelTable;
  variables: VariableStore;
  /** Anomalies that do not stop a default run */
  diagnostics: Diagnostic[];
}

export interface ScanOptions {
  /** Raise the first anomaly as a ScriptError */
  strict?: boolean;
}

/**
 * Scan every line once so forward references resolve during execution
 *
 * Labels: last declaration wins. Variables: every assignment line declares
 * its target with the value "0". An @ line that splits on '=' into more than
 * two parts declares nothing.
 */
export function scanScript(
  script: Script,
  options: ScanOptions = {}
): ScanResult {
  const labels: LabelTable = new Map();
  const variables = createVariableStore();
  const diagnostics: Diagnostic[] = [];

  for (const [index, instruction] of script.instructions.entries()) {
    if (instruction.type === 'label') {
      const previous = labels.get(instruction.name);
      if (previous !== undefined) {
        diagnostics.push({
          kind: 'DuplicateLabel',
          severity: 'warning',
          index,
          message: `Label '${instruction.name}' is already declared on line ${previous + 1}; this declaration wins`,
        });
      }
      labels.set(instruction.name, index);
    } else if (instruction.type === 'assignment') {
      declareVariable(variables, instruction.name);
    } else if (instruction.type === 'text') {
      const line = script.lines[index] ?? '';
      if (line.startsWith('@') && line.includes('=')) {
        diagnostics.push({
          kind: 'MalformedDeclaration',
          severity: 'warning',
          index,
          message: `'${line}' has ${line.split('=').length - 1} '=' signs and declares no variable`,
        });
      }
    }
  }

  const [first] = diagnostics;
  if (options.strict && first) {
    throw diagnosticToError(first);
  }

  return { labels, variables, diagnostics };
}
