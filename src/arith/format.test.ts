import { describe, expect, it } from "vitest";
import { addThousandsSeparators, formatBoolean, formatResult } from "./format.js";

describe("formatResult", () => {
  it("trims plain numbers to significant decimals", () => {
    expect(formatResult(5, false)).toBe("5");
    expect(formatResult(0.1 + 0.2, false)).toBe("0.3");
    expect(formatResult(1 / 3, false)).toBe("0.3333333333");
    expect(formatResult(1234567.5, false)).toBe("1,234,567.5");
    expect(formatResult(-1234, false)).toBe("-1,234");
  });

  it("does not print a negative zero", () => {
    expect(formatResult(-1e-12, false)).toBe("0");
  });

  it("writes very large values without exponent notation", () => {
    expect(formatResult(2.5e21, false)).toBe("2,500,000,000,000,000,000,000");
  });

  it("formats currency with two decimals", () => {
    expect(formatResult(80, true)).toBe("$80.00");
    expect(formatResult(1234.5, true)).toBe("$1,234.50");
    expect(formatResult(-5, true)).toBe("$-5.00");
  });

  it("carries rounded cents into the whole part", () => {
    expect(formatResult(0.999, true)).toBe("$1.00");
  });

  it("renders non-finite values as NaN", () => {
    expect(formatResult(Number.NaN, false)).toBe("NaN");
    expect(formatResult(Infinity, true)).toBe("NaN");
  });
});

describe("formatBoolean", () => {
  it("is true only for exactly 1", () => {
    expect(formatBoolean(1)).toBe("true");
    expect(formatBoolean(0)).toBe("false");
    expect(formatBoolean(2)).toBe("false");
  });
});

describe("addThousandsSeparators", () => {
  it("groups by three from the right", () => {
    expect(addThousandsSeparators("1234567")).toBe("1,234,567");
    expect(addThousandsSeparators("-1000")).toBe("-1,000");
    expect(addThousandsSeparators("999")).toBe("999");
  });
});
