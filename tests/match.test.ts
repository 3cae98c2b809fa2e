import { describe, expect, it } from "vitest";

import { ValidationError } from "../src/errors.js";
import { detectColumns } from "../src/table/layout.js";
import { describeMatchSpec, exclude, include, matches, validateMatchSpec } from "../src/table/match.js";
import { parseMatchSpec } from "../src/validation.js";

const podA = ["ns1", "pod-a", "Running"];
const podB = ["ns1", "pod-b", "Pending"];

describe("matches", () => {
  it("keeps rows whose column matches an include pattern", () => {
    const spec = new Map([[3, include(/Running/)]]);
    expect([podA, podB].filter((row) => matches(row, spec))).toEqual([podA]);
  });

  it("drops rows whose column matches an exclude pattern", () => {
    const spec = new Map([[3, exclude(/Running/)]]);
    expect([podA, podB].filter((row) => matches(row, spec))).toEqual([podB]);
  });

  it("searches anywhere in the field", () => {
    expect(matches(podA, new Map([[3, include(/unn/)]]))).toBe(true);
  });

  it("requires every pattern to hold", () => {
    const spec = new Map([
      [1, include(/ns1/)],
      [2, include(/-b$/)],
    ]);
    expect(matches(podA, spec)).toBe(false);
    expect(matches(podB, spec)).toBe(true);
  });

  it("keeps every row without patterns", () => {
    expect(matches(podA, new Map())).toBe(true);
  });

  it("treats a missing field as empty", () => {
    expect(matches(podA, new Map([[5, exclude(/x/)]]))).toBe(true);
    expect(matches(podA, new Map([[5, include(/x/)]]))).toBe(false);
  });
});

describe("validateMatchSpec", () => {
  const columns = detectColumns("NAMESPACE   NAME    STATUS");

  it("accepts indices within the column count", () => {
    expect(() => validateMatchSpec(new Map([[3, include(/a/)]]), columns)).not.toThrow();
  });

  it("rejects an index beyond the column count", () => {
    expect(() => validateMatchSpec(new Map([[4, include(/a/)]]), columns)).toThrow(
      new ValidationError(
        "Filter column 4 is out of range: the listing has 3 column(s) (1=NAMESPACE, 2=NAME, 3=STATUS)"
      )
    );
  });
});

describe("describeMatchSpec", () => {
  it("renders patterns back to INDEX=REGEX form", () => {
    expect(describeMatchSpec(parseMatchSpec(["2=web,3=!Running"]))).toBe("2=web,3=!Running");
  });
});
