import { describe, expect, it } from "vitest";
import { evaluateText } from "./document_evaluate.js";
import { adjustReferences, detectLineEdit, findDependentLines } from "./document_refs.js";

const join = (lines: string[]): string => lines.join("\n");

describe("detectLineEdit", () => {
  it("locates a single insert or delete", () => {
    expect(detectLineEdit(["a", "b"], ["a", "x", "b"])).toEqual({ kind: "insert", at: 2, count: 1 });
    expect(detectLineEdit(["a", "b", "c"], ["a"])).toEqual({ kind: "delete", at: 2, count: 2 });
    expect(detectLineEdit(["a"], ["b"])).toEqual({ kind: "none" });
  });
});

describe("adjustReferences", () => {
  it("shifts references at or below an inserted line", () => {
    const before = join(["100 =", "50 =", "\\2 + 5 ="]);
    const after = join(["100 =", "", "50 =", "\\2 + 5 ="]);
    expect(adjustReferences(before, after)).toBe(join(["100 =", "", "50 =", "\\3 + 5 ="]));
  });

  it("shifts by the number of lines inserted", () => {
    const before = join(["5 =", "\\1 * 2 ="]);
    const after = join(["", "", "5 =", "\\1 * 2 ="]);
    expect(adjustReferences(before, after)).toBe(join(["", "", "5 =", "\\3 * 2 ="]));
  });

  it("keeps references above an insert", () => {
    const before = join(["1 =", "\\1 ="]);
    const after = join(["1 =", "\\1 =", ""]);
    expect(adjustReferences(before, after)).toBe(after);
  });

  it("moves references below a deleted line up", () => {
    const before = join(["100 =", "", "50 =", "\\3 + 5 ="]);
    const after = join(["100 =", "50 =", "\\3 + 5 ="]);
    expect(adjustReferences(before, after)).toBe(join(["100 =", "50 =", "\\2 + 5 ="]));
  });

  it("leaves references into a deleted line dangling", () => {
    const before = join(["a =", "b =", "\\2 + 1 ="]);
    const after = join(["a =", "\\2 + 1 ="]);
    expect(adjustReferences(before, after)).toBe(after);
  });

  it("counts lines without the continuation lines of a multi-line result", () => {
    const rendered = evaluateText(join(["10.0.0.0/24 =", "100 =", "\\2 * 2 ="]));
    const lines = rendered.split("\n");
    const edited = join([...lines.slice(0, -2), "", ...lines.slice(-2)]);

    const adjusted = adjustReferences(rendered, edited);
    expect(adjusted.split("\n").at(-1)).toBe("\\3 * 2 = 200");
    expect(evaluateText(adjusted).split("\n").at(-1)).toBe("\\3 * 2 = 200");
  });

  it("moves references up after a delete below a multi-line result", () => {
    const rendered = evaluateText(join(["10.0.0.0/24 =", "", "100 =", "\\3 * 2 ="]));
    const edited = rendered
      .split("\n")
      .filter((line, i, all) => !(line === "" && all[i + 1] === "100 = 100"))
      .join("\n");
    expect(adjustReferences(rendered, edited).split("\n").at(-1)).toBe("\\2 * 2 = 200");
  });

  it("changes nothing when the line count is unchanged", () => {
    expect(adjustReferences(join(["1 =", "\\1 ="]), join(["2 =", "\\1 ="]))).toBe(join(["2 =", "\\1 ="]));
  });
});

describe("findDependentLines", () => {
  const lines = ["1 =", "\\1 + 1 =", "\\2 + 1 =", "\\1 * 3 ="];

  it("returns direct dependents by default", () => {
    expect(findDependentLines(lines, 1)).toEqual([2, 4]);
  });

  it("follows chains when transitive", () => {
    expect(findDependentLines(lines, 1, { transitive: true })).toEqual([2, 3, 4]);
  });

  it("returns nothing for an unreferenced line", () => {
    expect(findDependentLines(lines, 4)).toEqual([]);
  });

  it("numbers lines without continuation lines", () => {
    const rendered = evaluateText(join(["10.0.0.0/24 =", "100 =", "\\2 * 2 ="])).split("\n");
    expect(rendered).toHaveLength(7);
    expect(findDependentLines(rendered, 2)).toEqual([3]);
  });

  it("terminates on cycles", () => {
    expect(findDependentLines(["\\2 =", "\\1 ="], 1, { transitive: true })).toEqual([1, 2]);
  });
});
