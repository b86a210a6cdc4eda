/**
 * Purpose: Split arithmetic line expressions into tokens.
 * Intent: Normalize calculator spellings (unicode operators, `x` as times, `$`, `%`, `\N`) before parsing.
 */

import { LexError } from "../errors.js";

export type ArithOp = "+" | "-" | "*" | "/" | "^" | ">" | "<" | ">=" | "<=" | "==" | "!=";

export type Token =
  | { type: "number"; value: number; percent: boolean; currency: boolean; text: string; pos: number }
  | { type: "ref"; line: number; text: string; pos: number }
  | { type: "identifier"; value: string; pos: number }
  | { type: "op"; value: ArithOp; pos: number }
  | { type: "punct"; value: "(" | ")"; pos: number }
  | { type: "eof"; pos: number };

const unicodeOperators: ReadonlyArray<[string, string]> = [
  ["×", "*"],
  ["−", "-"],
  ["–", "-"],
  ["—", "-"],
];

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= "0" && ch <= "9";
const isLetter = (ch: string | undefined): boolean => ch !== undefined && /\p{L}/u.test(ch);
const isSpace = (ch: string | undefined): boolean => ch !== undefined && /\s/.test(ch);

function prevNonSpace(s: string, idx: number): string | undefined {
  for (let i = idx - 1; i >= 0; i--) {
    if (!isSpace(s[i])) return s[i];
  }
  return undefined;
}

function nextNonSpace(s: string, idx: number): string | undefined {
  for (let i = idx; i < s.length; i++) {
    if (!isSpace(s[i])) return s[i];
  }
  return undefined;
}

function isMulContext(s: string, idx: number): boolean {
  const left = prevNonSpace(s, idx);
  const right = nextNonSpace(s, idx + 1);
  if (left === undefined || right === undefined) return false;

  const leftOk = isDigit(left) || left === ")" || left === "%" || left === "$" || left === ".";
  const rightOk =
    isDigit(right) || right === "(" || right === "$" || right === "." || right === "\\" || isLetter(right);
  return leftOk && rightOk;
}

/** Trims, folds unicode operators, and rewrites `x`/`X` used as a binary operator to `*`. */
export function normalizeExpression(expr: string): string {
  let s = expr.trim();
  for (const [from, to] of unicodeOperators) s = s.split(from).join(to);

  let out = "";
  for (let i = 0; i < s.length; i++) {
    const ch = s[i] ?? "";
    out += (ch === "x" || ch === "X") && isMulContext(s, i) ? "*" : ch;
  }
  return out;
}

// Digits with `,` grouping and at most one `.`.
function scanNumber(s: string, start: number): number {
  let i = start;
  let dotSeen = false;
  while (i < s.length) {
    const ch = s[i];
    if (isDigit(ch) || ch === ",") {
      i++;
      continue;
    }
    if (ch === "." && !dotSeen) {
      dotSeen = true;
      i++;
      continue;
    }
    break;
  }
  return i;
}

function numberValue(text: string, pos: number): number {
  const n = Number(text.split(",").join(""));
  if (!Number.isFinite(n)) throw new LexError("LP_LEX_UNEXPECTED_CHAR", `Invalid number: ${text}`, pos);
  return n;
}

export function tokenize(expr: string): Token[] {
  const s = normalizeExpression(expr);
  const tokens: Token[] = [];
  let i = 0;

  const push = (tok: Token): void => {
    tokens.push(tok);
  };

  while (i < s.length) {
    const ch = s[i] ?? "";
    if (isSpace(ch)) {
      i++;
      continue;
    }

    const pos = i;
    const next = s[i + 1];

    switch (ch) {
      case "+":
      case "-":
      case "*":
      case "/":
      case "^":
        push({ type: "op", value: ch, pos });
        i++;
        continue;
      case ">":
      case "<":
        if (next === "=") {
          push({ type: "op", value: ch === ">" ? ">=" : "<=", pos });
          i += 2;
        } else {
          push({ type: "op", value: ch, pos });
          i++;
        }
        continue;
      case "=":
        if (next === "=") {
          push({ type: "op", value: "==", pos });
          i += 2;
        } else {
          // The line's result separator, not an operator.
          i++;
        }
        continue;
      case "!":
        if (next !== "=") throw new LexError("LP_LEX_UNEXPECTED_CHAR", "Unexpected '!'", pos);
        push({ type: "op", value: "!=", pos });
        i += 2;
        continue;
      case "(":
      case ")":
        push({ type: "punct", value: ch, pos });
        i++;
        continue;
      case "\\": {
        let end = i + 1;
        while (isDigit(s[end])) end++;
        if (end === i + 1) throw new LexError("LP_LEX_DANGLING_REF", "Expected line number after '\\'", pos);
        const digits = s.slice(i + 1, end);
        push({ type: "ref", line: Number(digits), text: `\\${digits}`, pos });
        i = end;
        continue;
      }
      case "$": {
        if (!(isDigit(next) || next === ".")) {
          throw new LexError("LP_LEX_DANGLING_CURRENCY", "Expected amount after '$'", pos);
        }
        const end = scanNumber(s, i + 1);
        const text = s.slice(i + 1, end);
        push({ type: "number", value: numberValue(text, pos), percent: false, currency: true, text: `$${text}`, pos });
        i = end;
        continue;
      }
      default:
        break;
    }

    if (isDigit(ch) || ch === ".") {
      const end = scanNumber(s, i);
      const text = s.slice(i, end);
      const value = numberValue(text, pos);
      if (s[end] === "%") {
        push({ type: "number", value: value / 100, percent: true, currency: false, text: `${text}%`, pos });
        i = end + 1;
      } else {
        push({ type: "number", value, percent: false, currency: false, text, pos });
        i = end;
      }
      continue;
    }

    if (isLetter(ch)) {
      let end = i + 1;
      while (end < s.length && (isLetter(s[end]) || isDigit(s[end]) || s[end] === "_")) end++;
      push({ type: "identifier", value: s.slice(i, end).toLowerCase(), pos });
      i = end;
      continue;
    }

    throw new LexError("LP_LEX_UNEXPECTED_CHAR", `Unexpected character: ${JSON.stringify(ch)}`, pos);
  }

  tokens.push({ type: "eof", pos: s.length });
  return tokens;
}

export function tokenToString(tok: Token): string {
  switch (tok.type) {
    case "eof":
      return "end of expression";
    case "op":
    case "punct":
      return `'${tok.value}'`;
    case "identifier":
      return `identifier ${tok.value}`;
    case "number":
      return `number ${tok.text}`;
    case "ref":
      return `reference ${tok.text}`;
    default: {
      const _exhaustive: never = tok;
      return String(_exhaustive);
    }
  }
}

export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: readonly Token[]) {}

  peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1] ?? { type: "eof", pos: 0 };
  }

  next(): Token {
    const tok = this.peek();
    if (this.index < this.tokens.length) this.index++;
    return tok;
  }
}
