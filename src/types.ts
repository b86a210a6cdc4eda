/**
 * Purpose: Declare shared linepad document and evaluation types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

import type { ErrorInfo } from "./errors.js";

export interface EvaluatedLine {
  output: string;
  /** Numeric result; set only when the arithmetic evaluator produced the line. */
  value?: number;
  hasResult: boolean;
  isCurrency: boolean;
  isDateTime: boolean;
  /** Formatted timestamp other date/time lines can chain from. */
  dateTimeRef?: string;
  /** Name of the domain evaluator that claimed the line. */
  domain?: string;
  error?: ErrorInfo;
}

export interface LineRecord {
  lineNumber: number; // 1-based, after stale-output cleanup
  input: string;
  output: string;
}

/** A domain evaluator's successful result for one expression. */
export interface DomainResult {
  /** May span several lines; the orchestrator adds continuation prefixes. */
  text: string;
  value?: number;
  isCurrency?: boolean;
  dateTime?: string;
}

/** Read-only view of the current pass, handed to domain evaluators. */
export interface LineContext {
  lineNumber: number;
  /** Returns an already evaluated line, or undefined for anything at or after `lineNumber`. */
  lookup(lineNumber: number): EvaluatedLine | undefined;
}

export interface DomainEvaluator {
  readonly name: string;
  /** Cheap "looks like mine" pre-filter. */
  matches(expr: string): boolean;
  /** Returns null when no handler claims the expression; throws on a claimed-but-failed attempt. */
  evaluate(expr: string, ctx: LineContext): DomainResult | null;
}
