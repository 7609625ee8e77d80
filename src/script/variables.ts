/**
 * Variable store, @name substitution and assignment
 */

import {
  type ExpressionEvaluator,
  formatNumber,
} from '../expr/evaluator.js';
import { errorAt } from './errors.js';
import type { VariableStore } from './types.js';

/** Initial value of every declared variable */
export const DECLARED_VALUE = '0';

/**
 * @name where name runs up to a space, NUL or one of + - < > = ( ) . ! # : ; ^ / \ @
 */
const VARIABLE_PATTERN = /@([^ \u0000+\-<>=().!#:;^/\\@]+)/g;

/**
 * Create an empty variable store
 */
export function createVariableStore(): VariableStore {
  return new Map();
}

/**
 * Declare a variable with the initial value, overwriting any current value
 */
export function declareVariable(store: VariableStore, name: string): void {
  store.set(name, DECLARED_VALUE);
}

/**
 * Names referenced as @name in the text, distinct, in discovery order
 */
export function findVariableReferences(text: string): string[] {
  const names: string[] = [];
  for (const match of text.matchAll(VARIABLE_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !names.includes(name)) {
      names.push(name);
    }
  }
  return names;
}

/**
 * Names referenced in the text that the store does not hold
 */
export function findUndeclared(text: string, store: VariableStore): string[] {
  return findVariableReferences(text).filter((name) => !store.has(name));
}

/**
 * Replace every @name with the variable's value
 * Throws UndeclaredVariableReference before substituting anything
 *
 * @param index - Line index reported on failure
 */
export function substituteVariables(
  text: string,
  store: VariableStore,
  index: number
): string {
  const [missing] = findUndeclared(text, store);
  if (missing !== undefined) {
    throw errorAt(
      'UndeclaredVariableReference',
      index,
      `Variable @${missing} is not declared. Declare it with a top-level @${missing}=... line.`
    );
  }

  return text.replace(
    VARIABLE_PATTERN,
    (match, name: string) => store.get(name) ?? match
  );
}

/**
 * Assign the result of an expression to a declared variable
 * The expression is substituted, then evaluated; non-numeric text is stored as-is
 *
 * @returns The stored value
 */
export function assignVariable(
  store: VariableStore,
  name: string,
  expression: string,
  evaluate: ExpressionEvaluator,
  index: number
): string {
  if (!store.has(name)) {
    throw errorAt(
      'UndeclaredVariableReference',
      index,
      `Variable @${name} must be declared with a top-level @${name}=... line before it is assigned.`
    );
  }

  const substituted = substituteVariables(expression, store, index);
  const result = evaluate(substituted);
  const value = result.ok ? formatNumber(result.value) : substituted;
  store.set(name, value);
  return value;
}
