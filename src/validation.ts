/**
 * Input validation utilities for kubefilter.
 *
 * Parses column filter expressions given on the command line.
 *
 * Dependency direction:
 *   This module imports from: errors.ts, table/match.ts
 *   It should NOT import from: cli, commands
 */

import { ValidationError } from "./errors.js";
import { exclude, include, type ColumnPattern, type MatchSpec } from "./table/match.js";

/** INDEX=REGEX or INDEX=!REGEX */
const FILTER_PATTERN = /^(\d+)=(!?)(.*)$/s;

/**
 * Split a filter argument on commas, keeping `\,` as a literal comma.
 *
 * Other backslash sequences are left for the regex engine.
 */
export function splitFilterList(arg: string): string[] {
  const parts: string[] = [];
  let current = "";

  for (let i = 0; i < arg.length; i++) {
    const ch = arg[i];
    if (ch === "\\" && arg[i + 1] === ",") {
      current += ",";
      i++;
    } else if (ch === ",") {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts.filter((part) => part !== "");
}

/**
 * Parse and validate a single INDEX=REGEX expression.
 *
 * @throws ValidationError if the format, index or regex is invalid.
 */
export function parseFilterExpression(expr: string): { index: number; pattern: ColumnPattern } {
  const match = FILTER_PATTERN.exec(expr);
  if (match === null) {
    throw new ValidationError(`Invalid filter '${expr}'. Expected INDEX=REGEX or INDEX=!REGEX`);
  }
  const [, indexText = "", bang = "", source = ""] = match;

  const index = parseInt(indexText, 10);
  if (index < 1) {
    throw new ValidationError(`Invalid filter '${expr}'. Column indices start at 1`);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid regex in filter '${expr}': ${reason}`);
  }

  return { index, pattern: bang === "!" ? exclude(regex) : include(regex) };
}

/**
 * Build a MatchSpec from filter arguments, each a comma-separated list.
 * A repeated index replaces the earlier pattern.
 *
 * @throws ValidationError on the first invalid expression.
 */
export function parseMatchSpec(args: readonly string[]): MatchSpec {
  const spec = new Map<number, ColumnPattern>();
  for (const arg of args) {
    for (const expr of splitFilterList(arg)) {
      const { index, pattern } = parseFilterExpression(expr);
      spec.delete(index);
      spec.set(index, pattern);
    }
  }
  return spec;
}
