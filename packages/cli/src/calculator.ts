import { defineTool } from "@tether/core";
import { z } from "zod";

type Token = { kind: "number"; value: number } | { kind: "name"; value: string } | { kind: "op"; value: string };

const FUNCTIONS = new Map<string, (...args: number[]) => number>([
  ["abs", Math.abs],
  ["ceil", Math.ceil],
  ["cos", Math.cos],
  ["exp", Math.exp],
  ["floor", Math.floor],
  ["ln", Math.log],
  ["log", Math.log10],
  ["max", Math.max],
  ["min", Math.min],
  ["round", Math.round],
  ["sin", Math.sin],
  ["sqrt", Math.sqrt],
  ["tan", Math.tan],
]);

const CONSTANTS = new Map<string, number>([
  ["pi", Math.PI],
  ["e", Math.E],
]);

export class ExpressionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExpressionError";
  }
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /\s*(?:(\d+(?:\.\d*)?(?:[eE][+-]?\d+)?|\.\d+)|([A-Za-z_]\w*)|(\*\*|[-+*/%^(),]))/y;
  let offset = 0;
  while (offset < source.length) {
    const skip = source.slice(offset).search(/\S/);
    if (skip === -1) break;
    pattern.lastIndex = offset;
    const match = pattern.exec(source);
    if (!match) throw new ExpressionError(`Unexpected character at position ${offset + skip + 1}`);
    const [whole, num, name, op] = match;
    if (num !== undefined) tokens.push({ kind: "number", value: Number(num) });
    else if (name !== undefined) tokens.push({ kind: "name", value: name.toLowerCase() });
    else if (op !== undefined) tokens.push({ kind: "op", value: op === "^" ? "**" : op });
    offset += whole.length;
  }
  return tokens;
}

/**
 * Recursive-descent evaluator for arithmetic.
 *
 *   expr   := term (("+" | "-") term)*
 *   term   := unary (("*" | "/" | "%") unary)*
 *   unary  := ("+" | "-") unary | power
 *   power  := atom ("**" unary)?
 *   atom   := number | constant | name "(" expr ("," expr)* ")" | "(" expr ")"
 */
class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    if (this.tokens.length === 0) throw new ExpressionError("Empty expression");
    const value = this.expr();
    const rest = this.peek();
    if (rest) throw new ExpressionError(`Unexpected "${rest.value}"`);
    return value;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private takeOp(...ops: string[]): string | undefined {
    const token = this.peek();
    if (token?.kind === "op" && ops.includes(token.value)) {
      this.pos++;
      return token.value;
    }
    return undefined;
  }

  private expect(op: string): void {
    if (!this.takeOp(op)) throw new ExpressionError(`Expected "${op}"`);
  }

  private expr(): number {
    let value = this.term();
    for (let op = this.takeOp("+", "-"); op; op = this.takeOp("+", "-")) {
      const right = this.term();
      value = op === "+" ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.takeOp("*", "/", "%"); op; op = this.takeOp("*", "/", "%")) {
      const right = this.unary();
      if (op !== "*" && right === 0) throw new ExpressionError("Division by zero");
      value = op === "*" ? value * right : op === "/" ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const op = this.takeOp("+", "-");
    if (op) {
      const value = this.unary();
      return op === "-" ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.atom();
    // Right-associative: 2 ** 3 ** 2 = 2 ** 9
    return this.takeOp("**") ? base ** this.unary() : base;
  }

  private atom(): number {
    const token = this.peek();
    if (!token) throw new ExpressionError("Unexpected end of expression");
    this.pos++;

    if (token.kind === "number") return token.value;
    if (token.kind === "op") {
      if (token.value !== "(") throw new ExpressionError(`Unexpected "${token.value}"`);
      const value = this.expr();
      this.expect(")");
      return value;
    }

    const fn = FUNCTIONS.get(token.value);
    if (fn) {
      this.expect("(");
      const args = [this.expr()];
      while (this.takeOp(",")) args.push(this.expr());
      this.expect(")");
      return fn(...args);
    }
    const constant = CONSTANTS.get(token.value);
    if (constant !== undefined) return constant;
    throw new ExpressionError(`Unknown name "${token.value}"`);
  }
}

/** @throws ExpressionError on malformed input or a non-finite result. */
export function evaluateExpression(source: string): number {
  const value = new Parser(tokenize(source)).parse();
  if (!Number.isFinite(value)) throw new ExpressionError("Result is not a finite number");
  return value;
}

export function createCalculatorTool() {
  return defineTool({
    name: "calculator",
    doc: `Evaluate an arithmetic expression.
Supports + - * / % and ** (or ^), parentheses, the constants pi and e, and
abs, ceil, cos, exp, floor, ln, log, max, min, round, sin, sqrt, tan.

@param expression - The expression, such as "2 + 3 * 4"`,
    parameters: z.object({ expression: z.string().min(1) }),
    execute({ expression }) {
      return `${expression} = ${evaluateExpression(expression)}`;
    },
  });
}
