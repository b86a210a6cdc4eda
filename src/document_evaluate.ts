/**
 * Purpose: Evaluate a whole document line by line.
 * Intent: Rebuild every line's state on each pass; a line only reads results of lines above it.
 */

import { formatResult } from "./arith/format.js";
import { type EngineOptions, resolveEngineConfig } from "./config.js";
import { Dispatcher, createDefaultEvaluators } from "./domains/dispatch.js";
import {
  REFERENCE_PATTERN,
  cleanOutputLines,
  findResultEquals,
  formatExpression,
  isBlankLine,
  isCommentLine,
  splitInlineComment,
} from "./document_lines.js";
import { errorInfo } from "./errors.js";
import { createServiceLogger } from "./logger.js";
import type { DomainResult, EvaluatedLine, LineContext, LineRecord } from "./types.js";

const logger = createServiceLogger("orchestrator");

function passThrough(line: string): EvaluatedLine {
  return { output: line, hasResult: false, isCurrency: false, isDateTime: false };
}

function renderResult(display: string, text: string, comment: string): string {
  const [first = "", ...rest] = text.split("\n");
  return [`${display} = ${first}${comment}`, ...rest.map((line) => `> ${line}`)].join("\n");
}

function resultLine(display: string, comment: string, evaluator: string, result: DomainResult): EvaluatedLine {
  const out: EvaluatedLine = {
    output: renderResult(display, result.text, comment),
    hasResult: true,
    isCurrency: result.isCurrency ?? false,
    isDateTime: result.dateTime !== undefined,
    domain: evaluator,
  };
  if (result.value !== undefined) out.value = result.value;
  if (result.dateTime !== undefined) out.dateTimeRef = result.dateTime;
  return out;
}

/**
 * Evaluates each line in order. Continuation lines (`> ...`) from an earlier pass are dropped
 * first, so `\N` counts lines of the cleaned document.
 */
export function evaluateDocument(lines: readonly string[], options: EngineOptions = {}): EvaluatedLine[] {
  const config = resolveEngineConfig(options);
  const dispatcher = new Dispatcher(options.evaluators ?? createDefaultEvaluators(config));
  const cleaned = cleanOutputLines(lines);
  const results: EvaluatedLine[] = [];

  cleaned.forEach((line, index) => {
    const lineNumber = index + 1;
    if (isBlankLine(line) || isCommentLine(line)) {
      results.push(passThrough(line));
      return;
    }

    const { body, comment } = splitInlineComment(line);
    const eq = findResultEquals(body);
    const expr = eq === -1 ? "" : body.slice(0, eq).trim();
    if (!expr) {
      results.push(passThrough(line));
      return;
    }

    const display = config.activeLine === lineNumber ? expr : formatExpression(expr);
    const ctx: LineContext = {
      lineNumber,
      lookup: (n) => (n >= 1 && n < lineNumber ? results[n - 1] : undefined),
    };

    const outcome = dispatcher.dispatch(expr, ctx);
    if (outcome.ok) {
      results.push(resultLine(display, comment, outcome.evaluator, outcome.result));
      return;
    }

    const error = errorInfo(outcome.error);
    logger.debug("line failed", { line: lineNumber, expr, code: error.code, message: error.message });
    results.push({ ...passThrough(`${display} = ERR${comment}`), error });
  });

  return results;
}

export function renderDocument(evaluated: readonly EvaluatedLine[]): string {
  return evaluated.map((line) => line.output).join("\n");
}

export function evaluateText(text: string, options: EngineOptions = {}): string {
  return renderDocument(evaluateDocument(text.split("\n"), options));
}

export function toLineRecords(lines: readonly string[], options: EngineOptions = {}): LineRecord[] {
  const cleaned = cleanOutputLines(lines);
  return evaluateDocument(cleaned, options).map((line, i) => ({
    lineNumber: i + 1,
    input: cleaned[i] ?? "",
    output: line.output,
  }));
}

/** Formatted value of every line with a numeric result, keyed by 1-based line number. */
export function lineValues(lines: readonly string[], options: EngineOptions = {}): Map<number, string> {
  const values = new Map<number, string>();
  evaluateDocument(lines, options).forEach((line, i) => {
    if (line.hasResult && line.value !== undefined) values.set(i + 1, formatResult(line.value, line.isCurrency));
  });
  return values;
}

/** Replaces each `\N` that has a numeric result with that value; others stay as typed. */
export function replaceReferencesWithValues(text: string, options: EngineOptions = {}): string {
  const values = lineValues(text.split("\n"), options);
  return text.replace(REFERENCE_PATTERN, (whole, digits: string) => values.get(Number(digits)) ?? whole);
}
