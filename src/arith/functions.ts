/**
 * Purpose: Provide the single-argument math functions callable from arithmetic lines.
 */

import { ParseError } from "../errors.js";

export type MathFunction = (x: number) => number;

const functions: ReadonlyMap<string, MathFunction> = new Map<string, MathFunction>([
  ["sin", Math.sin],
  ["cos", Math.cos],
  ["tan", Math.tan],
  ["asin", Math.asin],
  ["acos", Math.acos],
  ["atan", Math.atan],
  ["sqrt", Math.sqrt],
  ["abs", Math.abs],
  ["ln", Math.log],
  // base 10
  ["log", Math.log10],
]);

export function functionNames(): string[] {
  return [...functions.keys()];
}

export function callFunction(name: string, arg: number): number {
  const fn = functions.get(name.toLowerCase());
  if (!fn) throw new ParseError("LP_PARSE_UNKNOWN_FUNCTION", `Unknown function: ${name}`);
  return fn(arg);
}
