/**
 * @gridtext/core
 *
 * Runtime-agnostic text-table layout engine.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Entry point
// =============================================================================

export { generateTable } from "./table/generateTable.js";
export { column, row, TaggedRow, isTaggedRow } from "./table/column.js";
export type {
  CellFormatter,
  ColumnInput,
  ColumnRecord,
  ColumnSpec,
  FrameLike,
  ObjectFormatter,
  RowOptions,
  RowTagger,
  TableOptions,
} from "./table/types.js";
export { toRowsAndColumns, readAttribute, type AdaptedRow, type AdaptedSource } from "./table/adapters.js";
export { formatBytes, formatCommas } from "./table/formatters.js";

// =============================================================================
// Errors and dev warnings
// =============================================================================

export { GridTextError, type GridTextErrorCode, isGridTextError } from "./errors.js";
export {
  createDevWarnings,
  type DevWarnings,
  type DevWarningsOptions,
  type WarnFn,
  type WarningTopic,
} from "./dev/warnings.js";

// =============================================================================
// Grid styles and rendering
// =============================================================================

export {
  createAlternatingRowGrid,
  createFancyGrid,
  createSparseGrid,
  defineGridStyle,
  type AlternatingRowGridOptions,
  type BodyGlyphs,
  type FancyGridOptions,
  type GridStyle,
  type GridStyleOverrides,
  type RowColorFn,
  type RowColors,
  type RowSeparatorPolicy,
  type RuleGlyphs,
  type SparseGridOptions,
} from "./grid/styles.js";
export type { GridCell, GridColumn, GridRow, Table } from "./grid/model.js";
export { renderTable } from "./grid/render.js";
export { transposeTable } from "./grid/transpose.js";

// =============================================================================
// Colors
// =============================================================================

export {
  type ColorLevel,
  type ColorSupport,
  type Rgb24,
  type TextStyle,
  NO_COLOR_SUPPORT,
  TABLE_COLORS,
  TRUECOLOR_SUPPORT,
  isColorLevel,
  paint,
  rgb,
  styleClose,
  styleOpen,
} from "./style/color.js";

// =============================================================================
// Text measurement and layout primitives
// =============================================================================

export {
  ELLIPSIS,
  clearTextMeasureCache,
  expandTabs,
  getTextMeasureCacheSize,
  measureTextCells,
  measureWidestLine,
  splitLines,
  truncateMiddle,
  truncateStart,
  truncateToWidth,
  truncateWithEllipsis,
} from "./text/textMeasure.js";
export { type AnsiSegment, hasAnsi, scanAnsi, stripAnsi } from "./text/ansi.js";
export { type WrapMode, WRAP_MODES, wrapCellText } from "./text/wrap.js";
export { type HAlign, type VAlign, alignLineToWidth, alignLinesVertically } from "./layout/align.js";
export { resolveColumnWidth, resolveColumnWidths } from "./layout/columns.js";
