/**
 * Comparison of condition operands
 */

import type { ExpressionEvaluator } from '../expr/evaluator.js';

export type ComparisonOperator = '!=' | '==' | '<=' | '>=' | '<' | '>';

export interface Comparison {
  left: string;
  operator: ComparisonOperator;
  right: string;
}

export type ComparisonOutcome =
  | { ok: true; value: boolean }
  | { ok: false; error: string };

/** Leftmost operator wins; at one position the longer operators are tried first */
const OPERATOR_PATTERN = /!=|==|<=|>=|<|>/;

function isComparisonOperator(value: string): value is ComparisonOperator {
  return ['!=', '==', '<=', '>=', '<', '>'].includes(value);
}

/**
 * Split condition text into its operands around the first operator found
 * Returns null when there is no operator or the operator occurs again
 */
export function splitComparison(text: string): Comparison | null {
  const match = OPERATOR_PATTERN.exec(text);
  const operator = match?.[0];
  if (operator === undefined || !isComparisonOperator(operator)) {
    return null;
  }

  const parts = text.split(operator);
  const [left, right] = parts;
  if (parts.length !== 2 || left === undefined || right === undefined) {
    return null;
  }

  return { left, operator, right };
}

function compareNumbers(
  left: number,
  operator: ComparisonOperator,
  right: number
): boolean {
  switch (operator) {
    case '==':
      return left === right;
    case '!=':
      return left !== right;
    case '<=':
      return left <= right;
    case '>=':
      return left >= right;
    case '<':
      return left < right;
    case '>':
      return left > right;
  }
}

/**
 * Compare numerically when both operands evaluate, by exact text otherwise
 * Ordering operators on text fail
 */
export function evaluateComparison(
  comparison: Comparison,
  evaluate: ExpressionEvaluator
): ComparisonOutcome {
  const { left, operator, right } = comparison;
  const leftValue = evaluate(left);
  const rightValue = evaluate(right);

  if (leftValue.ok && rightValue.ok) {
    return {
      ok: true,
      value: compareNumbers(leftValue.value, operator, rightValue.value),
    };
  }

  if (operator === '==') return { ok: true, value: left === right };
  if (operator === '!=') return { ok: true, value: left !== right };

  return {
    ok: false,
    error: `Text cannot be compared with ${operator} ('${left}' ${operator} '${right}')`,
  };
}
