import { describe, expect, it } from "vitest";
import {
  extractInlineComment,
  findResultEquals,
  formatExpression,
  hasResult,
  isOutputLine,
  referencedLines,
  splitInlineComment,
  stripResult,
} from "./document_lines.js";

describe("findResultEquals", () => {
  it("finds the first bare =", () => {
    expect(findResultEquals("2 + 3 =")).toBe(6);
    expect(findResultEquals("1 >= 1 =")).toBe(7);
    expect(findResultEquals("1 == 1 = true")).toBe(7);
  });

  it("returns -1 without a separator", () => {
    expect(findResultEquals("a != b")).toBe(-1);
    expect(findResultEquals("no equals")).toBe(-1);
  });
});

describe("inline comments", () => {
  it("splits at the first #", () => {
    expect(splitInlineComment("2+3= # note")).toEqual({ body: "2+3= ", comment: " # note" });
    expect(splitInlineComment("2+3=")).toEqual({ body: "2+3=", comment: "" });
  });

  it("extracts the comment after the result", () => {
    expect(extractInlineComment("2 + 3 = 5 # note")).toBe(" # note");
    expect(extractInlineComment("2 + 3 = 5")).toBe("");
  });
});

describe("results", () => {
  it("strips the result and keeps the comment", () => {
    expect(stripResult("2 + 3 = 5 # my note")).toBe("2 + 3 = # my note");
    expect(stripResult("2 + 3 = 5")).toBe("2 + 3 =");
    expect(stripResult("no result")).toBe("no result");
  });

  it("detects a written result", () => {
    expect(hasResult("2 + 3 = 5")).toBe(true);
    expect(hasResult("2 + 3 =")).toBe(false);
    expect(hasResult("2 + 3 = # note")).toBe(false);
    expect(hasResult("text")).toBe(false);
  });

  it("recognises continuation lines", () => {
    expect(isOutputLine("> Mask: 255.255.255.0")).toBe(true);
    expect(isOutputLine("  > x")).toBe(true);
    expect(isOutputLine(">5")).toBe(false);
    expect(isOutputLine("3 > 2 =")).toBe(false);
  });
});

describe("formatExpression", () => {
  it("spaces binary operators", () => {
    expect(formatExpression("2+3")).toBe("2 + 3");
    expect(formatExpression("2  +   3")).toBe("2 + 3");
    expect(formatExpression("$100-20%")).toBe("$100 - 20%");
    expect(formatExpression("2*3")).toBe("2 * 3");
    expect(formatExpression("2^10")).toBe("2 ^ 10");
    expect(formatExpression("3×4")).toBe("3 × 4");
    expect(formatExpression("10x5")).toBe("10 x 5");
  });

  it("leaves a leading sign alone", () => {
    expect(formatExpression("-5+3")).toBe("-5 + 3");
  });

  it("spaces division only before long divisors", () => {
    expect(formatExpression("1/1000")).toBe("1 / 1000");
    expect(formatExpression("10/24")).toBe("10/24");
  });

  it("does not touch dates, addresses, times or hex literals", () => {
    expect(formatExpression("10.100.0.0/24")).toBe("10.100.0.0/24");
    expect(formatExpression("2025-01-01 10:00 - 2 hours")).toBe("2025-01-01 10:00 - 2 hours");
    expect(formatExpression("0xff in dec")).toBe("0xff in dec");
  });
});

describe("referencedLines", () => {
  it("lists every reference", () => {
    expect(referencedLines("\\1 + \\12")).toEqual([1, 12]);
    expect(referencedLines("2 + 3")).toEqual([]);
  });
});
