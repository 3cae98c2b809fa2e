/**
 * Fixed-width table handling.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - layout.ts: Header column detection and the row codec
 * - match.ts: Column include/exclude filters
 */

export {
  type ColumnDescriptor,
  type Layout,
  type Row,
  type RowTarget,
  NAMESPACE_COLUMN,
  UNBOUNDED,
  createLayout,
  decodeLine,
  detectColumns,
  encodeRow,
  rowTarget,
  stripLineTerminator,
} from "./layout.js";

export {
  type ColumnPattern,
  type ExcludePattern,
  type IncludePattern,
  type MatchSpec,
  EMPTY_MATCH_SPEC,
  describeMatchSpec,
  exclude,
  include,
  matches,
  patternAccepts,
  validateMatchSpec,
} from "./match.js";
