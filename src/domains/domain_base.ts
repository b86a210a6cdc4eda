/**
 * Purpose: Convert integers between decimal, hexadecimal, octal, and binary.
 */

import { DomainError } from "../errors.js";
import type { DomainEvaluator } from "../types.js";
import { HandlerChain, claimed, createChainEvaluator, regexHandler } from "./domain_shared.js";

const MAX_INT64 = 2n ** 63n - 1n;

const BASE_CONVERSION =
  /^(0x[0-9a-f]+|0b[01]+|0o[0-7]+|\d+)\s+in\s+(dec|decimal|hex|hexadecimal|oct|octal|bin|binary)$/;

export function isBaseConversion(expr: string): boolean {
  return /\s+in\s+(?:dec|hex|oct|bin)/.test(expr.toLowerCase());
}

export function convertBase(literal: string, target: string): string {
  // BigInt reads 0x, 0o and 0b prefixes itself.
  const value = BigInt(literal);
  if (value > MAX_INT64) {
    throw new DomainError("base", "LP_DOMAIN_INVALID_NUMBER", `number out of range: ${literal}`);
  }
  switch (target) {
    case "hex":
    case "hexadecimal":
      return `0x${value.toString(16).toUpperCase()}`;
    case "oct":
    case "octal":
      return `0o${value.toString(8)}`;
    case "bin":
    case "binary":
      return `0b${value.toString(2)}`;
    default:
      return value.toString(10);
  }
}

export function createBaseEvaluator(): DomainEvaluator {
  return createChainEvaluator({
    name: "base",
    matches: isBaseConversion,
    chain: new HandlerChain([
      regexHandler("convert", BASE_CONVERSION, (m) => claimed(convertBase(m[1] ?? "", m[2] ?? ""))),
    ]),
  });
}
