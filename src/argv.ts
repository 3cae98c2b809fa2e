/**
 * Splitting argv around `--`.
 *
 * Everything after the first `--` is the command `kf shell` runs in the
 * container; commander never sees it.
 */

import { ValidationError } from "./errors.js";

/** Subcommand that takes a trailing command. */
export const TAIL_COMMAND = "shell";

export function splitAtDoubleDash(argv: readonly string[]): { head: string[]; tail: string[] } {
  const index = argv.indexOf("--");
  if (index === -1) {
    return { head: [...argv], tail: [] };
  }
  return { head: argv.slice(0, index), tail: argv.slice(index + 1) };
}

/**
 * The trailing command for a subcommand: shell gets it, any other
 * subcommand must not have one.
 *
 * @throws ValidationError when a tail was given to a subcommand that ignores it.
 */
export function tailFor(subcommand: string, tail: readonly string[]): string[] {
  if (subcommand === TAIL_COMMAND || tail.length === 0) {
    return [...tail];
  }
  throw new ValidationError(
    `Unexpected arguments after --: ${tail.join(" ")} (only '${TAIL_COMMAND}' takes a command there)`
  );
}
