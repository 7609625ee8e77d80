/**
 * Numeric expression evaluation for assignments and conditions
 *
 * Grammar (loosest binding first):
 *   expr   := term (('+' | '-') term)*
 *   term   := factor (('*' | '/' | '%') factor)*
 *   factor := power ('^' power)*          left associative
 *   power  := ('+' | '-')* base           so -2^2 is (-2)^2
 *   base   := number | constant | name '(' args ')' | '(' expr ')'
 */

export type EvalResult =
  | { ok: true; value: number }
  | { ok: false; error: string };

/**
 * Contract consumed by the engine: evaluate text as a number or report failure
 */
export type ExpressionEvaluator = (text: string) => EvalResult;

type NumericFn = (...args: number[]) => number;

function factorial(n: number): number {
  if (n < 0 || !Number.isInteger(n)) return NaN;
  let result = 1;
  for (let i = 2; i <= n; i++) result *= i;
  return result;
}

function combinations(n: number, r: number): number {
  return factorial(n) / (factorial(r) * factorial(n - r));
}

function permutations(n: number, r: number): number {
  return factorial(n) / factorial(n - r);
}

const CONSTANTS: Readonly<Record<string, number>> = {
  pi: Math.PI,
  e: Math.E,
};

const FUNCTIONS: Readonly<Record<string, { arity: number; fn: NumericFn }>> = {
  abs: { arity: 1, fn: Math.abs },
  acos: { arity: 1, fn: Math.acos },
  asin: { arity: 1, fn: Math.asin },
  atan: { arity: 1, fn: Math.atan },
  atan2: { arity: 2, fn: Math.atan2 },
  ceil: { arity: 1, fn: Math.ceil },
  cos: { arity: 1, fn: Math.cos },
  cosh: { arity: 1, fn: Math.cosh },
  exp: { arity: 1, fn: Math.exp },
  fac: { arity: 1, fn: factorial },
  floor: { arity: 1, fn: Math.floor },
  ln: { arity: 1, fn: Math.log },
  log: { arity: 1, fn: Math.log10 },
  log10: { arity: 1, fn: Math.log10 },
  ncr: { arity: 2, fn: combinations },
  npr: { arity: 2, fn: permutations },
  pow: { arity: 2, fn: Math.pow },
  sin: { arity: 1, fn: Math.sin },
  sinh: { arity: 1, fn: Math.sinh },
  sqrt: { arity: 1, fn: Math.sqrt },
  tan: { arity: 1, fn: Math.tan },
  tanh: { arity: 1, fn: Math.tanh },
};

const NUMBER_PATTERN = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const NAME_PATTERN = /^[a-z_][a-z0-9_]*/;

class EvalError extends Error {}

class ExpressionParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): number {
    const value = this.expr();
    this.skipWhitespace();
    if (this.pos < this.input.length) {
      throw new EvalError(
        `Unexpected '${this.peek()}' at position ${this.pos}`
      );
    }
    return value;
  }

  private peek(): string {
    return this.input[this.pos] ?? '';
  }

  private skipWhitespace(): void {
    while (/\s/.test(this.peek())) this.pos++;
  }

  /** Consume the next non-space character if it is one of the given ones */
  private accept(chars: string): string | null {
    this.skipWhitespace();
    const char = this.peek();
    if (char !== '' && chars.includes(char)) {
      this.pos++;
      return char;
    }
    return null;
  }

  private expect(char: string): void {
    if (!this.accept(char)) {
      const found = this.peek() || 'end of input';
      throw new EvalError(`Expected '${char}' but found '${found}'`);
    }
  }

  private expr(): number {
    let value = this.term();
    let op: string | null;
    while ((op = this.accept('+-')) !== null) {
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.factor();
    let op: string | null;
    while ((op = this.accept('*/%')) !== null) {
      const right = this.factor();
      if (op === '*') value *= right;
      else if (op === '/') value /= right;
      else value %= right;
    }
    return value;
  }

  private factor(): number {
    let value = this.power();
    while (this.accept('^') !== null) {
      value = Math.pow(value, this.power());
    }
    return value;
  }

  private power(): number {
    let sign = 1;
    let op: string | null;
    while ((op = this.accept('+-')) !== null) {
      if (op === '-') sign = -sign;
    }
    return sign * this.base();
  }

  private base(): number {
    this.skipWhitespace();
    const rest = this.input.slice(this.pos);

    const numberMatch = NUMBER_PATTERN.exec(rest);
    if (numberMatch) {
      this.pos += numberMatch[0].length;
      return Number(numberMatch[0]);
    }

    const nameMatch = NAME_PATTERN.exec(rest);
    if (nameMatch) {
      const name = nameMatch[0];
      this.pos += name.length;
      return this.named(name);
    }

    if (this.accept('(') !== null) {
      const value = this.expr();
      this.expect(')');
      return value;
    }

    const found = this.peek() || 'end of input';
    throw new EvalError(`Expected a number but found '${found}'`);
  }

  private named(name: string): number {
    const constant = CONSTANTS[name];
    if (constant !== undefined) {
      return constant;
    }

    const definition = FUNCTIONS[name];
    if (!definition) {
      throw new EvalError(`Unknown name '${name}'`);
    }

    this.expect('(');
    const args = [this.expr()];
    while (this.accept(',') !== null) {
      args.push(this.expr());
    }
    this.expect(')');

    if (args.length !== definition.arity) {
      throw new EvalError(
        `${name}() takes ${definition.arity} argument(s) but got ${args.length}`
      );
    }
    return definition.fn(...args);
  }
}

/**
 * Evaluate text as a numeric expression
 * Results that are not finite numbers count as failures
 */
export function evaluateExpression(text: string): EvalResult {
  try {
    const value = new ExpressionParser(text).parse();
    if (!Number.isFinite(value)) {
      return { ok: false, error: `'${text}' is not a finite number` };
    }
    return { ok: true, value };
  } catch (error) {
    if (error instanceof EvalError) {
      return { ok: false, error: error.message };
    }
    throw error;
  }
}

const EXPONENT_FORM = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Text form of a numeric result as stored in a variable
 * Plain decimal digits, never exponent notation
 */
export function formatNumber(value: number): string {
  if (Object.is(value, -0)) {
    return '0';
  }

  const text = String(value);
  const match = EXPONENT_FORM.exec(text);
  if (!match) {
    return text;
  }

  const [, sign = '', lead = '', fraction = '', exponent = '0'] = match;
  const digits = lead + fraction;
  // Position of the decimal point within digits
  const point = 1 + Number(exponent);

  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length);
  }
  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
