/**
 * Purpose: Keep positional `\N` references pointing at the same lines across edits.
 * Intent: Detect one contiguous insert or delete by diffing line lists, then shift the affected references.
 */

import { REFERENCE_PATTERN, cleanOutputLines, referencedLines } from "./document_lines.js";

export type LineEdit =
  | { kind: "none" }
  | { kind: "insert"; at: number; count: number }
  | { kind: "delete"; at: number; count: number };

/** 1-based index of the first line that differs, or one past the shorter list. */
export function firstDivergentLine(a: readonly string[], b: readonly string[]): number {
  const common = Math.min(a.length, b.length);
  for (let i = 0; i < common; i++) {
    if (a[i] !== b[i]) return i + 1;
  }
  return common + 1;
}

export function detectLineEdit(oldLines: readonly string[], newLines: readonly string[]): LineEdit {
  const delta = newLines.length - oldLines.length;
  if (delta === 0) return { kind: "none" };
  const at = firstDivergentLine(oldLines, newLines);
  return delta > 0 ? { kind: "insert", at, count: delta } : { kind: "delete", at, count: -delta };
}

function rewriteReferences(text: string, map: (n: number) => number): string {
  return text.replace(REFERENCE_PATTERN, (whole, digits: string) => {
    const n = Number(digits);
    const next = map(n);
    return next === n ? whole : `\\${next}`;
  });
}

export function adjustReferencesForInsert(text: string, insertAt: number, count: number): string {
  return rewriteReferences(text, (n) => (n >= insertAt ? n + count : n));
}

/** References into the deleted block are left dangling; later ones move up. */
export function adjustReferencesForDelete(text: string, deleteAt: number, count: number): string {
  const end = deleteAt + count;
  return rewriteReferences(text, (n) => (n >= end ? n - count : n));
}

/** Line positions are counted without `> ` continuation lines, the same numbering `\N` uses. */
export function adjustReferences(oldText: string, newText: string): string {
  const edit = detectLineEdit(cleanOutputLines(oldText.split("\n")), cleanOutputLines(newText.split("\n")));
  switch (edit.kind) {
    case "none":
      return newText;
    case "insert":
      return adjustReferencesForInsert(newText, edit.at, edit.count);
    case "delete":
      return adjustReferencesForDelete(newText, edit.at, edit.count);
    default: {
      const _exhaustive: never = edit;
      return _exhaustive;
    }
  }
}

export interface DependentLineOptions {
  /** Follow references of references. */
  transitive?: boolean;
}

/** 1-based numbers of lines whose text references `changedLine`, sorted ascending; continuation lines are not counted. */
export function findDependentLines(
  lines: readonly string[],
  changedLine: number,
  options: DependentLineOptions = {}
): number[] {
  const refsByLine = cleanOutputLines(lines).map((line) => new Set(referencedLines(line)));
  const found = new Set<number>();
  const queue = [changedLine];

  while (queue.length > 0) {
    const target = queue.shift();
    if (target === undefined) break;
    refsByLine.forEach((refs, i) => {
      const lineNumber = i + 1;
      if (found.has(lineNumber) || !refs.has(target)) return;
      found.add(lineNumber);
      if (options.transitive) queue.push(lineNumber);
    });
  }

  return [...found].sort((a, b) => a - b);
}
