/**
 * Purpose: Provide the handler-chain building blocks shared by phrase-based domain evaluators.
 * Intent: Keep each grammar an explicit ordered list of handlers where the first claim wins.
 */

import type { DomainEvaluator, DomainResult, LineContext } from "../types.js";

export type HandlerResult = { kind: "claimed"; text: string } | { kind: "notMine" };

export const NOT_MINE: HandlerResult = Object.freeze({ kind: "notMine" });

export function claimed(text: string): HandlerResult {
  return { kind: "claimed", text };
}

export interface Handler {
  readonly name: string;
  /** `exprLower` is the trimmed, lower-cased expression; throws DomainError when a recognised phrase fails. */
  handle(expr: string, exprLower: string): HandlerResult;
}

export function defineHandler(name: string, handle: (expr: string, exprLower: string) => HandlerResult): Handler {
  return { name, handle };
}

/** Handler for a single regex; `onMatch` sees the lower-cased match. */
export function regexHandler(
  name: string,
  pattern: RegExp,
  onMatch: (m: RegExpExecArray, expr: string) => HandlerResult
): Handler {
  return defineHandler(name, (expr, exprLower) => {
    const m = pattern.exec(exprLower);
    return m ? onMatch(m, expr) : NOT_MINE;
  });
}

export class HandlerChain {
  constructor(private readonly handlers: readonly Handler[]) {}

  get names(): string[] {
    return this.handlers.map((h) => h.name);
  }

  run(expr: string): HandlerResult {
    const trimmed = expr.trim();
    const lower = trimmed.toLowerCase();
    for (const handler of this.handlers) {
      const result = handler.handle(trimmed, lower);
      if (result.kind === "claimed") return result;
    }
    return NOT_MINE;
  }
}

export interface ChainEvaluatorOptions {
  name: string;
  matches(expr: string): boolean;
  chain: HandlerChain;
  /** Rewrites the expression before the chain runs (reference substitution). */
  prepare?(expr: string, ctx: LineContext): string;
  toResult?(text: string): DomainResult;
}

export function createChainEvaluator(options: ChainEvaluatorOptions): DomainEvaluator {
  return {
    name: options.name,
    matches: (expr) => options.matches(expr),
    evaluate(expr, ctx) {
      const input = options.prepare ? options.prepare(expr, ctx) : expr;
      const result = options.chain.run(input);
      if (result.kind === "notMine") return null;
      return options.toResult ? options.toResult(result.text) : { text: result.text };
    },
  };
}

/** Parses a decimal captured by `[\d.]+`; returns null for inputs such as `1.2.3`. */
export function parseDecimal(text: string | undefined): number | null {
  if (text === undefined || text === "") return null;
  const n = Number(text.split(",").join(""));
  return Number.isFinite(n) ? n : null;
}
