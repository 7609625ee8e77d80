/**
 * Static check of a scanned script without running it
 */

import type { Diagnostic } from './errors.js';
import type { ScanResult } from './scanner.js';
import type { Branch, Instruction, Script } from './types.js';
import { findUndeclared } from './variables.js';

type Report = (diagnostic: Omit<Diagnostic, 'severity' | 'index'>) => void;

function checkLabel(label: string, scan: ScanResult, report: Report): void {
  if (!scan.labels.has(label)) {
    report({ kind: 'MissingLabel', message: `Label '${label}' does not exist` });
  }
}

function checkReferences(text: string, scan: ScanResult, report: Report): void {
  for (const name of findUndeclared(text, scan.variables)) {
    report({
      kind: 'UndeclaredVariableReference',
      message: `Variable @${name} is not declared`,
    });
  }
}

function checkTarget(name: string, scan: ScanResult, report: Report): void {
  if (!scan.variables.has(name)) {
    report({
      kind: 'UndeclaredVariableReference',
      message: `Variable @${name} is assigned but never declared`,
    });
  }
}

function checkBranch(branch: Branch, scan: ScanResult, report: Report): void {
  switch (branch.type) {
    case 'goto':
      checkLabel(branch.label, scan, report);
      break;
    case 'assign':
      checkTarget(branch.name, scan, report);
      checkReferences(branch.expression, scan, report);
      break;
    case 'invalid':
      report({ kind: 'MalformedDirective', message: branch.reason });
      break;
    case 'print':
      break;
  }
}

function checkInstruction(
  instruction: Instruction,
  scan: ScanResult,
  report: Report
): void {
  switch (instruction.type) {
    case 'malformed':
      report({ kind: 'MalformedDirective', message: instruction.reason });
      break;
    case 'goto':
    case 'choice':
      checkLabel(instruction.label, scan, report);
      break;
    case 'conditional':
      checkReferences(instruction.condition, scan, report);
      checkBranch(instruction.then, scan, report);
      if (instruction.otherwise) {
        checkBranch(instruction.otherwise, scan, report);
      }
      break;
    case 'assignment':
      checkReferences(instruction.expression, scan, report);
      break;
    case 'input':
      checkTarget(instruction.variable, scan, report);
      break;
    case 'text':
      checkReferences(instruction.text, scan, report);
      break;
    case 'blank':
    case 'label':
    case 'comment':
    case 'newline':
      break;
  }
}

/**
 * Report every problem a run could hit, plus the scan warnings, by line
 */
export function checkScript(script: Script, scan: ScanResult): Diagnostic[] {
  const diagnostics: Diagnostic[] = [...scan.diagnostics];

  for (const [index, instruction] of script.instructions.entries()) {
    checkInstruction(instruction, scan, (finding) => {
      diagnostics.push({ ...finding, severity: 'error', index });
    });
  }

  return diagnostics.sort((a, b) => a.index - b.index);
}

export function hasErrors(diagnostics: Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
