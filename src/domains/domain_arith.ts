/**
 * Purpose: Evaluate plain arithmetic lines, the fallback domain.
 * Intent: Resolve `\N` only against earlier numeric results and carry the currency flag through references.
 */

import { formatBoolean, formatResult } from "../arith/format.js";
import { hasComparison, parseTokens, type RefResolver } from "../arith/parser.js";
import { tokenize } from "../arith/tokenizer.js";
import { referencedLines } from "../document_lines.js";
import { ParseError } from "../errors.js";
import type { DomainEvaluator, LineContext } from "../types.js";

export function referencesCurrency(expr: string, ctx: LineContext): boolean {
  return referencedLines(expr).some((n) => n < ctx.lineNumber && ctx.lookup(n)?.isCurrency === true);
}

function makeResolver(ctx: LineContext): RefResolver {
  return (n) => {
    if (n < 1) throw new ParseError("LP_PARSE_BAD_REFERENCE", `bad reference \\${n}`);
    if (n === ctx.lineNumber) throw new ParseError("LP_PARSE_SELF_REFERENCE", `self reference \\${n}`);
    if (n > ctx.lineNumber) throw new ParseError("LP_PARSE_FORWARD_REFERENCE", `forward reference \\${n}`);
    const line = ctx.lookup(n);
    if (!line || !line.hasResult || line.value === undefined) {
      throw new ParseError("LP_PARSE_UNRESOLVED_REFERENCE", `unresolved reference \\${n}`);
    }
    return line.value;
  };
}

export function createArithmeticEvaluator(): DomainEvaluator {
  return {
    name: "arithmetic",
    matches: () => true,
    evaluate(expr, ctx) {
      const tokens = tokenize(expr);
      const { value } = parseTokens(tokens, makeResolver(ctx));
      const isCurrency = expr.includes("$") || referencesCurrency(expr, ctx);
      const text = hasComparison(tokens) ? formatBoolean(value) : formatResult(value, isCurrency);
      return { text, value, isCurrency };
    },
  };
}
