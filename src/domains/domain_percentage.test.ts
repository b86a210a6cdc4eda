import { describe, expect, it } from "vitest";
import { DomainError } from "../errors.js";
import type { LineContext } from "../types.js";
import { createPercentageEvaluator, isPercentageExpression } from "./domain_percentage.js";

const ctx: LineContext = { lineNumber: 1, lookup: () => undefined };
const percentage = createPercentageEvaluator();

function run(expr: string): string | undefined {
  return percentage.evaluate(expr, ctx)?.text;
}

describe("isPercentageExpression", () => {
  it("matches percentage phrasing only", () => {
    expect(isPercentageExpression("What is 15% of 200")).toBe(true);
    expect(isPercentageExpression("$150 split 4 ways")).toBe(true);
    expect(isPercentageExpression("100 + 20%")).toBe(false);
  });
});

describe("percentage evaluator", () => {
  it("takes a percent of a value", () => {
    expect(run("what is 15% of 200")).toBe("30");
  });

  it("finds what percent one value is of another", () => {
    expect(run("50 is what % of 200")).toBe("25.00%");
  });

  it("increases and decreases by a percent", () => {
    expect(run("increase 100 by 20%")).toBe("120");
    expect(run("decrease 500 by 15%")).toBe("425");
  });

  it("signs percent change", () => {
    expect(run("percent change from 50 to 75")).toBe("+50.00%");
    expect(run("percent change from 80 to 60")).toBe("-25.00%");
  });

  it("computes tips", () => {
    expect(run("tip 20% on $85.50")).toBe("Tip: $17.10, Total: $102.60");
  });

  it("splits bills with and without a tip", () => {
    expect(run("$150 split 4 ways")).toBe("Per person: $37.50");
    expect(run("$200 split 4 ways with 20% tip")).toBe("Total: $240.00 (incl. $40.00 tip), Per person: $60.00");
  });

  it("fails on a zero base", () => {
    expect(() => run("50 is what % of 0")).toThrow(DomainError);
    expect(() => run("percent change from 0 to 5")).toThrow(DomainError);
  });
});
