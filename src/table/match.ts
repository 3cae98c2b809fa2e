/**
 * Column filters applied to decoded rows.
 */

import { ValidationError } from "../errors.js";
import type { ColumnDescriptor, Row } from "./layout.js";

/** A row survives an Include when the regex finds a match in the column. */
export interface IncludePattern {
  readonly kind: "include";
  readonly regex: RegExp;
}

/** A row survives an Exclude when the regex finds no match in the column. */
export interface ExcludePattern {
  readonly kind: "exclude";
  readonly regex: RegExp;
}

export type ColumnPattern = IncludePattern | ExcludePattern;

/** 1-based column index → pattern, evaluated in insertion order. */
export type MatchSpec = ReadonlyMap<number, ColumnPattern>;

export const EMPTY_MATCH_SPEC: MatchSpec = new Map();

export function include(regex: RegExp): IncludePattern {
  return { kind: "include", regex };
}

export function exclude(regex: RegExp): ExcludePattern {
  return { kind: "exclude", regex };
}

/**
 * Test one field against one pattern (unanchored search).
 */
export function patternAccepts(pattern: ColumnPattern, value: string): boolean {
  const found = pattern.regex.test(value);
  switch (pattern.kind) {
    case "include":
      return found;
    case "exclude":
      return !found;
  }
}

/**
 * True when the row satisfies every pattern in the match spec.
 */
export function matches(row: Row, spec: MatchSpec): boolean {
  for (const [index, pattern] of spec) {
    if (!patternAccepts(pattern, row[index - 1] ?? "")) {
      return false;
    }
  }
  return true;
}

/**
 * Check that every filtered column exists in the layout.
 *
 * @throws ValidationError for an index beyond the column count.
 */
export function validateMatchSpec(spec: MatchSpec, columns: readonly ColumnDescriptor[]): void {
  for (const index of spec.keys()) {
    if (index > columns.length) {
      const names = columns.map((c, i) => `${i + 1}=${c.name}`).join(", ");
      throw new ValidationError(
        `Filter column ${index} is out of range: the listing has ${columns.length} column(s) (${names})`
      );
    }
  }
}

/** Render a match spec back to INDEX=REGEX form for debug output. */
export function describeMatchSpec(spec: MatchSpec): string {
  return [...spec]
    .map(([index, pattern]) => `${index}=${pattern.kind === "exclude" ? "!" : ""}${pattern.regex.source}`)
    .join(",");
}
