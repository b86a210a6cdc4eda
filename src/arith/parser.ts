/**
 * Purpose: Evaluate tokenized arithmetic expressions.
 * Intent: Keep calculator percent semantics (`A + P%` means `A * (1 + P)`) inside a fixed precedence ladder.
 */

import { ParseError } from "../errors.js";
import { callFunction } from "./functions.js";
import { type ArithOp, type Token, TokenStream, tokenToString, tokenize } from "./tokenizer.js";

export interface ArithValue {
  value: number;
  /** Set while the value is still a bare percent literal (possibly negated or parenthesized). */
  isPercent: boolean;
}

/** Maps a 1-based line number to its numeric value; throws when it cannot. */
export type RefResolver = (lineNumber: number) => number;

type ComparisonOp = Extract<ArithOp, ">" | "<" | ">=" | "<=" | "==" | "!=">;

const comparisonOps: ReadonlySet<ArithOp> = new Set<ArithOp>([">", "<", ">=", "<=", "==", "!="]);

function isComparisonOp(op: ArithOp): op is ComparisonOp {
  return comparisonOps.has(op);
}

function compare(op: ComparisonOp, a: number, b: number): boolean {
  switch (op) {
    case ">":
      return a > b;
    case "<":
      return a < b;
    case ">=":
      return a >= b;
    case "<=":
      return a <= b;
    case "==":
      return a === b;
    case "!=":
      return a !== b;
    default: {
      const _exhaustive: never = op;
      return _exhaustive;
    }
  }
}

function plain(value: number): ArithValue {
  return { value, isPercent: false };
}

class ArithParser {
  private readonly t: TokenStream;

  constructor(
    tokens: readonly Token[],
    private readonly resolve: RefResolver | undefined
  ) {
    this.t = new TokenStream(tokens);
  }

  parse(): ArithValue {
    const result = this.parseComparison();
    const tail = this.t.peek();
    if (tail.type !== "eof") {
      throw new ParseError("LP_PARSE_UNEXPECTED_TOKEN", `Unexpected trailing token: ${tokenToString(tail)}`);
    }
    return result;
  }

  private peekOp(): ArithOp | null {
    const tok = this.t.peek();
    return tok.type === "op" ? tok.value : null;
  }

  private parseComparison(): ArithValue {
    let left = this.parseAdditive();
    while (true) {
      const op = this.peekOp();
      if (op === null || !isComparisonOp(op)) return left;
      this.t.next();
      const right = this.parseAdditive();
      left = plain(compare(op, left.value, right.value) ? 1 : 0);
    }
  }

  private parseAdditive(): ArithValue {
    let left = this.parseMultiplicative();
    while (true) {
      const op = this.peekOp();
      if (op !== "+" && op !== "-") return left;
      this.t.next();
      const right = this.parseMultiplicative();
      if (right.isPercent) {
        left = plain(op === "+" ? left.value * (1 + right.value) : left.value * (1 - right.value));
      } else {
        left = plain(op === "+" ? left.value + right.value : left.value - right.value);
      }
    }
  }

  private parseMultiplicative(): ArithValue {
    let left = this.parsePower();
    while (true) {
      const op = this.peekOp();
      if (op !== "*" && op !== "/") return left;
      this.t.next();
      const right = this.parsePower();
      left = plain(op === "*" ? left.value * right.value : left.value / right.value);
    }
  }

  // Right-associative: 2^3^2 = 2^9.
  private parsePower(): ArithValue {
    const base = this.parseUnary();
    if (this.peekOp() !== "^") return base;
    this.t.next();
    const exponent = this.parsePower();
    return plain(Math.pow(base.value, exponent.value));
  }

  private parseUnary(): ArithValue {
    const op = this.peekOp();
    if (op === "-") {
      this.t.next();
      const inner = this.parseUnary();
      return { value: -inner.value, isPercent: inner.isPercent };
    }
    if (op === "+") {
      this.t.next();
      return this.parseUnary();
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ArithValue {
    const tok = this.t.next();
    switch (tok.type) {
      case "number":
        return { value: tok.value, isPercent: tok.percent };
      case "ref":
        if (!this.resolve) {
          throw new ParseError("LP_PARSE_NO_RESOLVER", `Reference ${tok.text} used without a resolver`);
        }
        return plain(this.resolve(tok.line));
      case "identifier": {
        this.expectPunct("(", `Expected '(' after ${tok.value}`);
        const arg = this.parseComparison();
        this.expectPunct(")", `Expected ')' to close ${tok.value}(`);
        return plain(callFunction(tok.value, arg.value));
      }
      case "punct":
        if (tok.value === "(") {
          const inner = this.parseComparison();
          this.expectPunct(")", "Expected ')'");
          return inner;
        }
        break;
      case "eof":
        throw new ParseError("LP_PARSE_UNEXPECTED_END", "Unexpected end of expression");
      default:
        break;
    }
    throw new ParseError("LP_PARSE_UNEXPECTED_TOKEN", `Unexpected token: ${tokenToString(tok)}`);
  }

  private expectPunct(value: "(" | ")", message: string): void {
    const tok = this.t.next();
    if (tok.type === "punct" && tok.value === value) return;
    const code = tok.type === "eof" ? "LP_PARSE_UNEXPECTED_END" : "LP_PARSE_EXPECTED_TOKEN";
    throw new ParseError(code, message);
  }
}

export function parseTokens(tokens: readonly Token[], resolve?: RefResolver): ArithValue {
  return new ArithParser(tokens, resolve).parse();
}

export function evaluateExpression(expr: string, resolve?: RefResolver): number {
  return parseTokens(tokenize(expr), resolve).value;
}

/** True when any comparison operator appears, so the result renders as a boolean. */
export function hasComparison(tokens: readonly Token[]): boolean {
  return tokens.some((tok) => tok.type === "op" && isComparisonOp(tok.value));
}
