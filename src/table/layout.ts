/**
 * Fixed-width column layout detection.
 *
 * kubectl sizes every column of a table from its widest value, so the widths
 * change from run to run. The header line is the only place the current
 * widths are visible: each column spans its name plus the padding after it.
 * The last column has no fixed width and runs to the end of the line.
 */

import { LayoutError } from "../errors.js";

/** Width of the final column. */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

/** Name of the first column in a namespaced listing. */
export const NAMESPACE_COLUMN = "NAMESPACE";

/** One fixed-width field of a table. */
export interface ColumnDescriptor {
  readonly name: string;
  /** Name length plus trailing padding; UNBOUNDED for the last column. */
  readonly width: number;
}

/** Decoded fields of one line, one per column. */
export type Row = readonly string[];

export interface Layout {
  readonly columns: readonly ColumnDescriptor[];
  /** True when the first column is NAMESPACE. */
  readonly namespaced: boolean;
  decode(line: string): Row;
  encode(row: Row): string;
}

/** Header token: a column name and the padding after it, or the end of the line. */
const HEADER_TOKEN = /^[-A-Z0-9_]+(?: +|$)/;

const LINE_TERMINATOR = /\r?\n$/;

export function stripLineTerminator(line: string): string {
  return line.replace(LINE_TERMINATOR, "");
}

/**
 * Detect column descriptors from a header line.
 *
 * Tokens are matched and stripped from the front of the header until none
 * remains; any left-over text is ignored.
 *
 * @throws LayoutError if the header yields no columns.
 */
export function detectColumns(header: string): ColumnDescriptor[] {
  let rest = stripLineTerminator(header);
  const columns: ColumnDescriptor[] = [];

  let match = HEADER_TOKEN.exec(rest);
  while (match !== null) {
    const token = match[0];
    columns.push({ name: token.trimEnd(), width: token.length });
    rest = rest.slice(token.length);
    match = rest.length > 0 ? HEADER_TOKEN.exec(rest) : null;
  }

  const last = columns.pop();
  if (last === undefined) {
    throw new LayoutError(`No columns found in header line: '${stripLineTerminator(header)}'`);
  }
  columns.push({ name: last.name, width: UNBOUNDED });
  return columns;
}

/**
 * Split a line into one field per column.
 *
 * Non-final fields take exactly `width` characters with trailing spaces
 * removed. The final field is the rest of the line, verbatim. Fields past the
 * end of a short line are empty strings.
 */
export function decodeLine(columns: readonly ColumnDescriptor[], line: string): string[] {
  const text = stripLineTerminator(line);
  const lastIndex = columns.length - 1;
  const fields: string[] = [];
  let offset = 0;

  columns.forEach((column, index) => {
    if (index === lastIndex) {
      fields.push(text.slice(offset));
      return;
    }
    fields.push(text.slice(offset, offset + column.width).replace(/ +$/, ""));
    offset += column.width;
  });

  return fields;
}

/**
 * Join fields back into a fixed-width line using the column widths.
 *
 * Non-final fields are padded to their width (and cut when longer); the
 * final field is appended as is.
 */
export function encodeRow(columns: readonly ColumnDescriptor[], row: Row): string {
  const lastIndex = columns.length - 1;
  return columns
    .map((column, index) => {
      const value = row[index] ?? "";
      if (index === lastIndex) {
        return value;
      }
      return value.slice(0, column.width).padEnd(column.width);
    })
    .join("");
}

/**
 * Build a layout (columns plus codec) from a header line.
 *
 * @throws LayoutError if the header yields no columns.
 */
export function createLayout(header: string): Layout {
  const columns = Object.freeze(detectColumns(header));
  return Object.freeze({
    columns,
    namespaced: columns[0]?.name === NAMESPACE_COLUMN,
    decode: (line: string): Row => decodeLine(columns, line),
    encode: (row: Row): string => encodeRow(columns, row),
  });
}

/** Namespace and name addressed by a data row. */
export interface RowTarget {
  readonly namespace?: string;
  readonly name: string;
}

/**
 * Read namespace and name from a row: columns 0/1 for a namespaced listing,
 * column 0 (name only) otherwise.
 */
export function rowTarget(layout: Layout, row: Row): RowTarget {
  if (layout.namespaced) {
    return { namespace: row[0] ?? "", name: row[1] ?? "" };
  }
  return { name: row[0] ?? "" };
}
