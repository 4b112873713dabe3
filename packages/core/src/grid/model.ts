/**
 * packages/core/src/grid/model.ts — The normalized table the renderer draws.
 *
 * Everything here is display-ready: cell values are already strings and every
 * per-column or per-row option has been resolved onto the cell it affects.
 */

import type { HAlign, VAlign } from "../layout/align.js";
import type { Rgb24 } from "../style/color.js";
import type { WrapMode } from "../text/wrap.js";
import type { GridStyle } from "./styles.js";

export type GridCell = Readonly<{
  text: string;
  wrapMode: WrapMode;
  wrapPrefix: string;
  hAlign: HAlign;
  vAlign: VAlign;
  textColor?: Rgb24 | undefined;
}>;

export type GridColumn = Readonly<{
  /** Explicit content width; auto-sized when absent. */
  width?: number | undefined;
  cellPadding: number;
  header: GridCell;
}>;

export type GridRow = Readonly<{
  cells: readonly GridCell[];
  backgroundColor?: Rgb24 | undefined;
  /** Rows with different groups are separated under the "betweenGroups" policy. */
  group?: string | number | undefined;
}>;

export type Table = Readonly<{
  columns: readonly GridColumn[];
  rows: readonly GridRow[];
  /** False when columns were synthesized from the data rather than given. */
  headersPresent: boolean;
  /** The first column holds former headers and is set off by label glyphs. */
  labelColumn: boolean;
  style: GridStyle;
  transpose: boolean;
  /** On transposition, promote the first column to the header row. */
  rowHeader: boolean;
  /** Cap on auto-sized column widths; 0 for none. */
  maxColumnWidth: number;
  /** Padding of columns that have no source column, after transposition. */
  cellPadding: number;
}>;
