import { describe, expect, it } from "vitest";
import { DEFAULT_IDENTIFIER_SUFFIX, diffAgainstKnown, withIdentifierSuffix } from "../src/diff/identifiers";
import type { RegulationDto } from "../src/registry/models";

function regulation(identifier: string): RegulationDto {
  return {
    identifier,
    category: "permanentRegulation",
    status: "draft",
    subject: "other",
    title: identifier,
    other_category_text: "Circulation",
    measures: []
  };
}

describe("identifier diff", () => {
  it("appends the suffix without touching other fields", () => {
    const original = regulation("A");
    const suffixed = withIdentifierSuffix(original, DEFAULT_IDENTIFIER_SUFFIX);

    expect(suffixed.identifier).toBe("A-0");
    expect(suffixed.title).toBe("A");
    expect(original.identifier).toBe("A");
  });

  it("keeps only unknown identifiers in build order", () => {
    const result = diffAgainstKnown([regulation("C-0"), regulation("A-0"), regulation("B-0")], ["A-0"]);

    expect(result.map((item) => item.identifier)).toEqual(["C-0", "B-0"]);
  });

  it("compares identifiers as exact strings", () => {
    const result = diffAgainstKnown([regulation("a-0"), regulation("A-0 ")], ["A-0"]);

    expect(result.map((item) => item.identifier)).toEqual(["a-0", "A-0 "]);
  });
});
