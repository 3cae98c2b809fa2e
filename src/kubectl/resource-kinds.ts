/**
 * Resource kind alias resolution.
 *
 * `kubectl api-resources` is itself a fixed-width table, so it is read with
 * the same layout detector as the listings being filtered.
 */

import { ConfigError } from "../errors.js";
import { createLayout } from "../table/layout.js";

/** Lower-cased alias, plural or singular → canonical plural. */
export type KindAliasTable = ReadonlyMap<string, string>;

/** Kind whose rows can be reconciled with flux. */
export const RECONCILABLE_KIND = "kustomizations";

/**
 * Build the alias table from `kubectl api-resources` output.
 *
 * Column 1 is the plural name, column 2 the comma-separated short names, and
 * a KIND column (when present) gives the singular. The first resource to
 * claim a key keeps it.
 */
export function parseResourceKinds(listing: string): KindAliasTable {
  const lines = listing.split(/\r?\n/).filter((line) => line.trim() !== "");
  const [header, ...rows] = lines;
  const table = new Map<string, string>();
  if (header === undefined) {
    return table;
  }

  const layout = createLayout(header);
  const kindIndex = layout.columns.findIndex((column) => column.name === "KIND");

  const claim = (alias: string, plural: string): void => {
    const key = alias.trim().toLowerCase();
    if (key !== "" && !table.has(key)) {
      table.set(key, plural);
    }
  };

  for (const line of rows) {
    const row = layout.decode(line);
    const plural = (row[0] ?? "").trim();
    if (plural === "") {
      continue;
    }
    claim(plural, plural);
    if (layout.columns.length > 1) {
      for (const shortName of (row[1] ?? "").split(",")) {
        claim(shortName, plural);
      }
    }
    if (kindIndex > 0) {
      claim(row[kindIndex] ?? "", plural);
    }
  }

  return table;
}

/**
 * Resolve a user-supplied kind to its canonical plural.
 *
 * Group-qualified names (containing '.') that are not in the table are
 * passed through for kubectl to resolve.
 *
 * @throws ConfigError for an unknown kind.
 */
export function resolveKind(table: KindAliasTable, requested: string): string {
  const plural = table.get(requested.toLowerCase());
  if (plural !== undefined) {
    return plural;
  }
  if (requested.includes(".")) {
    return requested;
  }
  throw new ConfigError(`Unknown resource kind '${requested}'`);
}
