import { invalidArgument } from '../errors';

export type UnaryOperator<T> = (a: T) => T;

export type BinaryOperator<T> = {
  apply: (a: T, b: T) => T;
  /** 0 binds loosest. Operators of equal precedence associate to the left. */
  precedence: number;
};

export type ParserDefinition<T> = {
  isOperand: (token: string) => boolean;
  evalOperand: (token: string) => T;
  unary?: Record<string, UnaryOperator<T>>;
  binary?: Record<string, BinaryOperator<T>>;
};

type Cursor = { tokens: ReadonlyArray<string>; at: number };

/**
 * Recursive-descent evaluator over user-defined operands and operators.
 * Operators are matched lazily in lexicographic order, so operators that
 * are prefixes of one another may tokenize ambiguously.
 */
export class ExpressionParser<T> {
  private readonly unary: Map<string, UnaryOperator<T>>;
  private readonly binary: Map<string, BinaryOperator<T>>;
  private readonly operators: string[];
  private readonly maxPrecedence: number;

  constructor(private readonly definition: ParserDefinition<T>) {
    this.unary = new Map(Object.entries(definition.unary ?? {}));
    this.binary = new Map(Object.entries(definition.binary ?? {}));
    const names = new Set([...this.unary.keys(), ...this.binary.keys()]);
    for (const name of names) {
      if (name.length === 0 || name.includes('(') || name.includes(')')) {
        throw invalidArgument(`operator ${JSON.stringify(name)} must be non-empty and free of parentheses`);
      }
    }
    this.operators = [...names].sort();
    this.maxPrecedence = Math.max(0, ...[...this.binary.values()].map((op) => op.precedence));
  }

  split(expression: string): string[] {
    const tokens: string[] = [];
    const s = expression;
    for (let i = 0; i < s.length; i += 1) {
      if (s[i] === ' ') continue;
      let nextParen = s.length;
      for (let j = i; j < s.length; j += 1) {
        if (s[j] === '(' || s[j] === ')') {
          nextParen = j;
          break;
        }
      }
      while (i < nextParen) {
        let found = nextParen;
        let foundOp = '';
        for (let j = i; j < nextParen && found === nextParen; j += 1) {
          const op = this.operators.find((candidate) => s.startsWith(candidate, j));
          if (op !== undefined) {
            found = j;
            foundOp = op;
          }
        }
        const term = s.slice(i, found).trim();
        if (term.length > 0) {
          if (!this.definition.isOperand(term)) throw invalidArgument(`failed to split term ${JSON.stringify(term)}`);
          tokens.push(term);
        }
        if (found < nextParen) {
          tokens.push(foundOp);
          i = found + foundOp.length;
        } else {
          i = nextParen;
        }
      }
      if (nextParen < s.length) tokens.push(s[nextParen]);
    }
    return tokens;
  }

  evaluate(expression: string): T {
    return this.evaluateTokens(this.split(expression));
  }

  evaluateTokens(tokens: ReadonlyArray<string>): T {
    const cursor: Cursor = { tokens, at: 0 };
    const value = this.binaryLevel(cursor, 0);
    if (cursor.at !== tokens.length) {
      throw invalidArgument(`unexpected token ${JSON.stringify(tokens[cursor.at])} at ${cursor.at}`);
    }
    return value;
  }

  private peek(cursor: Cursor): string {
    if (cursor.at >= cursor.tokens.length) throw invalidArgument('unexpected end of expression');
    return cursor.tokens[cursor.at];
  }

  private unaryLevel(cursor: Cursor): T {
    const token = this.peek(cursor);
    if (this.definition.isOperand(token)) {
      cursor.at += 1;
      return this.definition.evalOperand(token);
    }
    const op = this.unary.get(token);
    if (op !== undefined) {
      cursor.at += 1;
      return op(this.unaryLevel(cursor));
    }
    if (token !== '(') throw invalidArgument(`expected "(" at token ${cursor.at}, got ${JSON.stringify(token)}`);
    cursor.at += 1;
    const value = this.binaryLevel(cursor, 0);
    if (this.peek(cursor) !== ')') throw invalidArgument(`expected ")" at token ${cursor.at}`);
    cursor.at += 1;
    return value;
  }

  private binaryLevel(cursor: Cursor, precedence: number): T {
    if (precedence > this.maxPrecedence) return this.unaryLevel(cursor);
    let value = this.binaryLevel(cursor, precedence + 1);
    while (cursor.at < cursor.tokens.length) {
      const op = this.binary.get(cursor.tokens[cursor.at]);
      if (op === undefined || op.precedence !== precedence) return value;
      cursor.at += 1;
      value = op.apply(value, this.binaryLevel(cursor, precedence + 1));
    }
    return value;
  }
}

const NUMBER = /^(\d+\.?\d*|\.\d+)$/;

/** Floating-point arithmetic with `+ - * / ^` and unary `+ -`. */
export function createArithmeticParser(): ExpressionParser<number> {
  return new ExpressionParser<number>({
    isOperand: (token) => NUMBER.test(token),
    evalOperand: (token) => Number(token),
    unary: { '+': (a) => a, '-': (a) => -a },
    binary: {
      '+': { apply: (a, b) => a + b, precedence: 0 },
      '-': { apply: (a, b) => a - b, precedence: 0 },
      '*': { apply: (a, b) => a * b, precedence: 1 },
      '/': { apply: (a, b) => a / b, precedence: 1 },
      '^': { apply: (a, b) => a ** b, precedence: 2 },
    },
  });
}
