import { describe, expect, it } from "vitest";
import { DomainError, ParseError } from "../errors.js";
import type { DomainEvaluator, LineContext } from "../types.js";
import { Dispatcher, createDefaultEvaluators } from "./dispatch.js";

const ctx: LineContext = { lineNumber: 1, lookup: () => undefined };

function stub(name: string, behaviour: "decline" | "domain-error" | "parse-error" | "claim"): DomainEvaluator {
  return {
    name,
    matches: () => true,
    evaluate() {
      if (behaviour === "domain-error") throw new DomainError(name, "LP_DOMAIN_INVALID_CIDR", `${name} failed`);
      if (behaviour === "parse-error") throw new ParseError("LP_PARSE_UNEXPECTED_TOKEN", `${name} failed`);
      return behaviour === "claim" ? { text: name } : null;
    },
  };
}

describe("Dispatcher", () => {
  it("lists the default order", () => {
    const config = { now: () => new Date(0), timeZone: "UTC" };
    expect(new Dispatcher(createDefaultEvaluators(config)).names).toEqual([
      "network",
      "datetime",
      "percentage",
      "base",
      "arithmetic",
    ]);
  });

  it("falls through failures to the first claim", () => {
    const outcome = new Dispatcher([stub("a", "domain-error"), stub("b", "decline"), stub("c", "claim")]).dispatch(
      "x",
      ctx
    );
    expect(outcome).toEqual({ ok: true, evaluator: "c", result: { text: "c" } });
  });

  it("skips evaluators whose pre-filter does not match", () => {
    const picky: DomainEvaluator = { ...stub("picky", "claim"), matches: () => false };
    const outcome = new Dispatcher([picky, stub("d", "claim")]).dispatch("x", ctx);
    expect(outcome.ok && outcome.evaluator).toBe("d");
  });

  it("reports the first domain error over later parse errors", () => {
    const outcome = new Dispatcher([stub("a", "domain-error"), stub("b", "parse-error")]).dispatch("x", ctx);
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.error).toBeInstanceOf(DomainError);
  });

  it("reports the last error when no domain error occurred", () => {
    const outcome = new Dispatcher([stub("a", "decline"), stub("b", "parse-error")]).dispatch("x", ctx);
    if (outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toBeInstanceOf(ParseError);
  });

  it("reports an unrecognized expression when nothing matched", () => {
    const outcome = new Dispatcher([stub("a", "decline")]).dispatch("x", ctx);
    if (outcome.ok) throw new Error("expected a failure");
    expect(outcome.error).toMatchObject({ code: "LP_DOMAIN_UNRECOGNIZED" });
  });
});
