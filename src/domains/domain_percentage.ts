/**
 * Purpose: Evaluate everyday percentage phrasings such as tips, bill splits, and percent change.
 */

import { formatResult } from "../arith/format.js";
import { DomainError } from "../errors.js";
import type { DomainEvaluator } from "../types.js";
import {
  HandlerChain,
  NOT_MINE,
  claimed,
  createChainEvaluator,
  defineHandler,
  parseDecimal,
  regexHandler,
  type Handler,
  type HandlerResult,
} from "./domain_shared.js";

const PREFILTER = [
  /what\s+is\s+[\d.]+%?\s+of/,
  /[\d.]+\s+is\s+what\s+(?:%|percent|percentage)/,
  /increase\s+[\d.]+\s+by/,
  /decrease\s+[\d.]+\s+by/,
  /percent\s+change/,
  /tip\s+[\d.]+%?\s+on/,
  /split\s+\$?[\d.]+/,
];

export function isPercentageExpression(expr: string): boolean {
  const lower = expr.toLowerCase();
  return PREFILTER.some((re) => re.test(lower));
}

function divisionByZero(): DomainError {
  return new DomainError("percentage", "LP_DOMAIN_DIVISION_BY_ZERO", "undefined (division by zero)");
}

function scale(name: string, keyword: string, patterns: RegExp[], factor: (percent: number) => number): Handler {
  return defineHandler(name, (_expr, lower) => {
    if (!lower.includes(keyword)) return NOT_MINE;
    for (const re of patterns) {
      const m = re.exec(lower);
      if (!m) continue;
      const value = parseDecimal(m[1]);
      const percent = parseDecimal(m[2]);
      if (value === null || percent === null) return NOT_MINE;
      return claimed(formatResult(value * factor(percent), false));
    }
    return NOT_MINE;
  });
}

function splitBill(m: RegExpExecArray): HandlerResult {
  const amount = parseDecimal(m[1]);
  const ways = Number(m[2]);
  const tipPercent = m[3] === undefined ? 0 : parseDecimal(m[3]);
  if (amount === null || tipPercent === null || ways === 0) return NOT_MINE;

  const tip = (amount * tipPercent) / 100;
  const total = amount + tip;
  const perPerson = (total / ways).toFixed(2);
  if (tipPercent > 0) {
    return claimed(`Total: $${total.toFixed(2)} (incl. $${tip.toFixed(2)} tip), Per person: $${perPerson}`);
  }
  return claimed(`Per person: $${perPerson}`);
}

export function createPercentageHandlers(): Handler[] {
  return [
    regexHandler("percent-of", /(?:what\s+is\s+)?([\d.]+)\s*%?\s+of\s+([\d.]+)/, (m) => {
      const percent = parseDecimal(m[1]);
      const value = parseDecimal(m[2]);
      if (percent === null || value === null) return NOT_MINE;
      return claimed(formatResult((value * percent) / 100, false));
    }),
    regexHandler("what-percent", /([\d.]+)\s+is\s+what\s+(?:%|percent|percentage)\s+of\s+([\d.]+)/, (m) => {
      const part = parseDecimal(m[1]);
      const whole = parseDecimal(m[2]);
      if (part === null || whole === null) return NOT_MINE;
      if (whole === 0) throw divisionByZero();
      return claimed(`${((part / whole) * 100).toFixed(2)}%`);
    }),
    scale(
      "decrease",
      "decrease",
      [/decrease\s+([\d.]+)\s+by\s+([\d.]+)\s*%/, /([\d.]+)\s+decreased\s+by\s+([\d.]+)\s*%/],
      (p) => 1 - p / 100
    ),
    scale(
      "increase",
      "increase",
      [/increase\s+([\d.]+)\s+by\s+([\d.]+)\s*%/, /([\d.]+)\s+increased\s+by\s+([\d.]+)\s*%/],
      (p) => 1 + p / 100
    ),
    regexHandler("percent-change", /(?:percent(?:age)?\s+change\s+)?(?:from\s+)?([\d.]+)\s+to\s+([\d.]+)/, (m, expr) => {
      if (!expr.toLowerCase().includes("percent")) return NOT_MINE;
      const from = parseDecimal(m[1]);
      const to = parseDecimal(m[2]);
      if (from === null || to === null) return NOT_MINE;
      if (from === 0) throw divisionByZero();
      const change = ((to - from) / from) * 100;
      return claimed(`${change > 0 ? "+" : ""}${change.toFixed(2)}%`);
    }),
    regexHandler("tip", /(?:tip\s+)?([\d.]+)\s*%\s*(?:tip\s+)?on\s+\$?([\d.]+)/, (m) => {
      const percent = parseDecimal(m[1]);
      const amount = parseDecimal(m[2]);
      if (percent === null || amount === null) return NOT_MINE;
      const tip = (amount * percent) / 100;
      return claimed(`Tip: $${tip.toFixed(2)}, Total: $${(amount + tip).toFixed(2)}`);
    }),
    defineHandler("split-bill", (_expr, lower) => {
      const m =
        /(?:split\s+)?\$?([\d.]+)\s+split\s+(\d+)\s+ways?(?:\s+with\s+([\d.]+)\s*%\s*tip)?/.exec(lower) ??
        /split\s+\$?([\d.]+)\s+(\d+)\s+ways?(?:\s+with\s+([\d.]+)\s*%\s*tip)?/.exec(lower);
      return m ? splitBill(m) : NOT_MINE;
    }),
  ];
}

export function createPercentageEvaluator(): DomainEvaluator {
  return createChainEvaluator({
    name: "percentage",
    matches: isPercentageExpression,
    chain: new HandlerChain(createPercentageHandlers()),
  });
}
