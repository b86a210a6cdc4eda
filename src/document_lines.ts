/**
 * Purpose: Line-level text helpers: result separator, inline comments, output lines, display spacing.
 */

/** Index of the `=` that separates expression and result, or -1; skips `=` inside `>=`, `<=`, `==`, `!=`. */
export function findResultEquals(line: string): number {
  for (let i = 0; i < line.length; i++) {
    if (line[i] !== "=") continue;
    const prev = line[i - 1];
    const next = line[i + 1];
    if (prev === ">" || prev === "<" || prev === "!" || prev === "=") continue;
    if (next === "=") {
      i++;
      continue;
    }
    return i;
  }
  return -1;
}

export interface SplitComment {
  /** Text before the first `#`. */
  body: string;
  /** `" #..."` as typed, or "" when the line has none. */
  comment: string;
}

export function splitInlineComment(line: string): SplitComment {
  const hash = line.indexOf("#");
  if (hash === -1) return { body: line, comment: "" };
  return { body: line.slice(0, hash), comment: ` ${line.slice(hash)}` };
}

/** Comment text after the result `=`, with a leading space, or "". */
export function extractInlineComment(line: string): string {
  const eq = findResultEquals(line);
  if (eq === -1) return "";
  const hash = line.indexOf("#", eq + 1);
  return hash === -1 ? "" : ` ${line.slice(hash)}`;
}

export function isBlankLine(line: string): boolean {
  return line.trim() === "";
}

export function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith("#");
}

/** Continuation line written under a multi-line result. */
export function isOutputLine(line: string): boolean {
  return /^\s*>(?:\s|$)/.test(line);
}

export function cleanOutputLines(lines: readonly string[]): string[] {
  return lines.filter((line) => !isOutputLine(line));
}

/** Keeps the expression, `=` and any inline comment: `2 + 3 = 5 # note` becomes `2 + 3 = # note`. */
export function stripResult(line: string): string {
  const eq = findResultEquals(line);
  if (eq === -1) return line;
  const head = line.slice(0, eq + 1);
  const hash = line.indexOf("#", eq + 1);
  return hash === -1 ? head : `${head} ${line.slice(hash).trimStart()}`;
}

export function hasResult(line: string): boolean {
  const eq = findResultEquals(line);
  if (eq === -1) return false;
  const after = line.slice(eq + 1).trim();
  return after !== "" && !after.startsWith("#");
}

// Spans that look like operators but are not: dates, addresses, clock times, hex literals.
const PROTECTED =
  /\d{4}-\d{1,2}-\d{1,2}|\d{1,2}\/\d{1,2}\/\d{2,4}|\d{1,3}(?:\.\d{1,3}){3}(?:\/\d{1,2})?|\d{1,2}:\d{2}(?::\d{2})?|\b0x[0-9a-f]+\b/gi;
const PLACEHOLDER_BASE = 0xe100;

const SPACING_RULES: ReadonlyArray<[RegExp, string]> = [
  [/(?<=\S)\s*×\s*(?=\S)/g, " × "],
  [/(?<=\S)\s*÷\s*(?=\S)/g, " ÷ "],
  [/(?<=[\d)%])\s*x\s*(?=\d)/g, " x "],
  [/(?<=\d)\s*\*\s*(?=\d)/g, " * "],
  [/(?<=\d)\s*\^\s*(?=\d)/g, " ^ "],
  [/(?<=[\d)%])\s*\+\s*(?=\S)/g, " + "],
  [/(?<=[\d)%])\s*-\s*(?=\S)/g, " - "],
  // A short divisor is more likely a CIDR prefix than a division.
  [/(?<=\d)\s*\/\s*(?=\d{3,})/g, " / "],
];

/** Cosmetic operator spacing for display: `2+3` becomes `2 + 3`. */
export function formatExpression(expr: string): string {
  const spans: string[] = [];
  let masked = expr.replace(/\s+/g, " ").replace(PROTECTED, (span) => {
    spans.push(span);
    return String.fromCharCode(PLACEHOLDER_BASE + spans.length - 1);
  });

  for (const [pattern, replacement] of SPACING_RULES) masked = masked.replace(pattern, replacement);

  return masked.replace(/[\uE100-\uEFFF]/g, (ch) => spans[ch.charCodeAt(0) - PLACEHOLDER_BASE] ?? ch);
}

export const REFERENCE_PATTERN = /\\(\d+)/g;

export function referencedLines(text: string): number[] {
  return [...text.matchAll(REFERENCE_PATTERN)].map((m) => Number(m[1]));
}
