import { describe, expect, it } from "vitest";
import { DomainError } from "../errors.js";
import type { EvaluatedLine, LineContext } from "../types.js";
import { createDateTimeEvaluator, isDateTimeExpression, substituteDateTimeRefs } from "./domain_datetime.js";

const env = { now: () => new Date("2025-03-10T15:30:00Z"), timeZone: "UTC" };
const datetime = createDateTimeEvaluator(env);
const ctx: LineContext = { lineNumber: 1, lookup: () => undefined };

function run(expr: string, context: LineContext = ctx): string | undefined {
  return datetime.evaluate(expr, context)?.text;
}

function contextWith(lines: EvaluatedLine[]): LineContext {
  return { lineNumber: lines.length + 1, lookup: (n) => lines[n - 1] };
}

describe("isDateTimeExpression", () => {
  it("recognises keywords, dates and references", () => {
    expect(isDateTimeExpression("now")).toBe(true);
    expect(isDateTimeExpression("2025-01-01")).toBe(true);
    expect(isDateTimeExpression("\\1 + 2")).toBe(true);
    expect(isDateTimeExpression("2 + 3")).toBe(false);
  });
});

describe("datetime evaluator", () => {
  it("reads the configured clock", () => {
    expect(run("now")).toBe("2025-03-10 15:30 UTC");
    expect(run("today")).toBe("2025-03-10");
  });

  it("shows now in another zone", () => {
    expect(run("now in tokyo")).toBe("2025-03-11 00:30 GMT+9");
  });

  it("fails on an unknown zone", () => {
    expect(() => run("now in atlantis")).toThrow(DomainError);
  });

  it("converts a time between places", () => {
    expect(run("9am london in tokyo")).toBe("2025-03-10 18:00 GMT+9");
  });

  it("converts a timestamp between zones", () => {
    expect(run("2025-09-25 19:00 EST in tokyo")).toBe("2025-09-26 08:00 GMT+9");
  });

  it("converts durations", () => {
    expect(run("861.5 hours in days")).toBe("35.90 days");
    expect(run("48 hours in days")).toBe("2 days");
  });

  it("adds and subtracts durations", () => {
    expect(run("today + 3 days")).toBe("2025-03-13 00:00 UTC");
    expect(run("2025-01-01 10:00 - 2 hours")).toBe("2025-01-01 08:00 UTC");
    expect(run("2025-01-15 09:00 PST + 1 hours")).toBe("2025-01-15 10:00 PST");
  });

  it("counts days in a range", () => {
    expect(run("dec 6 till march 11")).toBe("95 days");
  });

  it("multiplies durations", () => {
    expect(run("13 x 3 min")).toBe("39.00 minutes");
    expect(run("8 hours x 5")).toBe("1 days 16.0 hours");
    expect(run("(8 hours x 5 x 2) x 2")).toBe("6 days 16.0 hours");
  });

  it("chains from an earlier timestamp line", () => {
    const earlier: EvaluatedLine = {
      output: "now = 2025-03-10 15:30 UTC",
      hasResult: true,
      isCurrency: false,
      isDateTime: true,
      dateTimeRef: "2025-03-10 15:30 UTC",
    };
    expect(run("\\1 + 2 hours", contextWith([earlier]))).toBe("2025-03-10 17:30 UTC");
  });

  it("returns the text as the chainable timestamp", () => {
    expect(datetime.evaluate("now", ctx)).toEqual({ text: "2025-03-10 15:30 UTC", dateTime: "2025-03-10 15:30 UTC" });
  });
});

describe("substituteDateTimeRefs", () => {
  it("leaves references that are not earlier date lines", () => {
    const numeric: EvaluatedLine = { output: "5 = 5", value: 5, hasResult: true, isCurrency: false, isDateTime: false };
    const context = contextWith([numeric]);
    expect(substituteDateTimeRefs("\\1 + 1", context)).toBe("\\1 + 1");
    expect(substituteDateTimeRefs("\\3 + 1", context)).toBe("\\3 + 1");
  });
});
