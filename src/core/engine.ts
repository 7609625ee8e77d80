/**
 * Execution engine - program-counter driven dispatch over parsed script lines
 */

import {
  evaluateExpression,
  type ExpressionEvaluator,
} from '../expr/evaluator.js';
import type { ConsoleIO } from '../io/console.js';
import { truncate } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { errorAt, ScriptError } from '../script/errors.js';
import type { ScanResult } from '../script/scanner.js';
import type {
  Branch,
  Instruction,
  LabelTable,
  Script,
  VariableStore,
} from '../script/types.js';
import { assignVariable, substituteVariables } from '../script/variables.js';
import { TRUNCATE_PREVIEW } from '../utils/constants.js';
import { evaluateComparison, splitComparison } from './conditions.js';
import { type Choice, promptChoice, promptInput } from './prompts.js';

/**
 * All state of one running script
 */
export interface EngineContext {
  script: Script;
  labels: LabelTable;
  variables: VariableStore;
  /** Index of the line being interpreted; the run ends at script length */
  pc: number;
  /** Instructions executed so far */
  steps: number;
}

export interface EngineOptions {
  io: ConsoleIO;
  logger: Logger;
  /** Numeric evaluation for assignments and conditions */
  evaluate?: ExpressionEvaluator | undefined;
}

export type RunResult =
  | { status: 'ok'; steps: number }
  | { status: 'error'; steps: number; error: ScriptError };

interface Env {
  io: ConsoleIO;
  logger: Logger;
  evaluate: ExpressionEvaluator;
}

/**
 * Create the engine context from a script and its pre-scan
 */
export function createEngineContext(
  script: Script,
  scan: ScanResult
): EngineContext {
  return {
    script,
    labels: scan.labels,
    variables: scan.variables,
    pc: 0,
    steps: 0,
  };
}

function instructionAt(script: Script, pc: number): Instruction {
  const instruction = script.instructions[pc];
  if (!instruction) {
    throw new RangeError(`No instruction at line ${pc + 1}`);
  }
  return instruction;
}

/**
 * Resolve a label to the line it was declared on
 */
function jump(ctx: EngineContext, env: Env, label: string): number {
  const target = ctx.labels.get(label);
  if (target === undefined) {
    throw errorAt('MissingLabel', ctx.pc, `Label '${label}' does not exist`);
  }
  env.logger.logEvent({
    event: 'jump',
    line: ctx.pc + 1,
    label,
    target: target + 1,
  });
  return target;
}

function assign(
  ctx: EngineContext,
  env: Env,
  name: string,
  expression: string
): number {
  const value = assignVariable(
    ctx.variables,
    name,
    expression,
    env.evaluate,
    ctx.pc
  );
  env.logger.logEvent({
    event: 'assign',
    line: ctx.pc + 1,
    name,
    value: truncate(value, TRUNCATE_PREVIEW),
  });
  return ctx.pc + 1;
}

function executeBranch(ctx: EngineContext, env: Env, branch: Branch): number {
  switch (branch.type) {
    case 'goto':
      return jump(ctx, env, branch.label);
    case 'assign':
      return assign(ctx, env, branch.name, branch.expression);
    case 'print':
      env.io.writeLine(branch.text);
      return ctx.pc + 1;
    case 'invalid':
      throw errorAt('MalformedDirective', ctx.pc, branch.reason);
  }
}

function executeConditional(
  ctx: EngineContext,
  env: Env,
  instruction: Extract<Instruction, { type: 'conditional' }>
): number {
  const condition = substituteVariables(
    instruction.condition,
    ctx.variables,
    ctx.pc
  );

  const comparison = splitComparison(condition);
  if (!comparison) {
    throw errorAt(
      'MalformedDirective',
      ctx.pc,
      `Condition '${condition}' must have a left side, one comparison operator and a right side`
    );
  }

  const outcome = evaluateComparison(comparison, env.evaluate);
  if (!outcome.ok) {
    throw errorAt('NonNumericOrderingComparison', ctx.pc, outcome.error);
  }

  const branch = outcome.value ? instruction.then : instruction.otherwise;
  if (!branch) {
    return ctx.pc + 1;
  }
  return executeBranch(ctx, env, branch);
}

/**
 * Gather the run of ? lines starting at the program counter
 */
function collectChoices(ctx: EngineContext): Choice[] {
  const { lines } = ctx.script;
  const choices: Choice[] = [];

  for (let i = ctx.pc; i < lines.length && lines[i]?.startsWith('?'); i++) {
    const instruction = instructionAt(ctx.script, i);
    if (instruction.type === 'malformed') {
      throw errorAt('MalformedDirective', i, instruction.reason);
    }
    if (instruction.type === 'choice') {
      choices.push({ prompt: instruction.prompt, label: instruction.label });
    }
  }

  return choices;
}

async function executeMenu(ctx: EngineContext, env: Env): Promise<number> {
  const choices = collectChoices(ctx);
  const choice = await promptChoice(env.io, choices, ctx.pc);
  env.logger.logEvent({
    event: 'choice',
    line: ctx.pc + 1,
    selected: choices.indexOf(choice) + 1,
    label: choice.label,
  });
  return jump(ctx, env, choice.label);
}

async function executeInput(
  ctx: EngineContext,
  env: Env,
  instruction: Extract<Instruction, { type: 'input' }>
): Promise<number> {
  const { variable, mode, prompt } = instruction;
  if (!ctx.variables.has(variable)) {
    throw errorAt(
      'UndeclaredVariableReference',
      ctx.pc,
      `Variable @${variable} must be declared with a top-level @${variable}=... line before it receives input.`
    );
  }

  const value = await promptInput(env.io, mode, prompt, ctx.pc);
  ctx.variables.set(variable, value);
  env.logger.logEvent({
    event: 'input',
    line: ctx.pc + 1,
    name: variable,
    value: truncate(value, TRUNCATE_PREVIEW),
  });
  return ctx.pc + 1;
}

/**
 * Execute the instruction at the program counter
 * @returns The next program counter
 */
async function step(ctx: EngineContext, env: Env): Promise<number> {
  const instruction = instructionAt(ctx.script, ctx.pc);

  switch (instruction.type) {
    case 'blank':
    case 'label':
    case 'comment':
      return ctx.pc + 1;
    case 'newline':
      env.io.writeLine('');
      return ctx.pc + 1;
    case 'text':
      env.io.writeLine(
        substituteVariables(instruction.text, ctx.variables, ctx.pc)
      );
      return ctx.pc + 1;
    case 'goto':
      return jump(ctx, env, instruction.label);
    case 'conditional':
      return executeConditional(ctx, env, instruction);
    case 'assignment':
      return assign(ctx, env, instruction.name, instruction.expression);
    case 'choice':
      return executeMenu(ctx, env);
    case 'input':
      return executeInput(ctx, env, instruction);
    case 'malformed':
      throw errorAt('MalformedDirective', ctx.pc, instruction.reason);
  }
}

/**
 * Run until the program counter reaches the end of the script
 * Script errors end the run and are returned; other errors propagate
 */
export async function runScript(
  ctx: EngineContext,
  options: EngineOptions
): Promise<RunResult> {
  const env: Env = {
    io: options.io,
    logger: options.logger,
    evaluate: options.evaluate ?? evaluateExpression,
  };
  const length = ctx.script.instructions.length;

  env.logger.logEvent({
    event: 'run_start',
    file: ctx.script.path,
    lines: length,
  });

  try {
    while (ctx.pc < length) {
      ctx.pc = await step(ctx, env);
      ctx.steps++;
    }
  } catch (error) {
    if (error instanceof ScriptError) {
      env.logger.logEvent({
        event: 'run_error',
        kind: error.kind,
        line: error.index === null ? null : error.index + 1,
        error: error.message,
      });
      return { status: 'error', steps: ctx.steps, error };
    }
    throw error;
  }

  env.logger.logEvent({ event: 'run_complete', steps: ctx.steps });
  return { status: 'ok', steps: ctx.steps };
}
