/**
 * packages/core/src/table/types.ts — Public configuration surface of
 * `generateTable`.
 */

import type { WarnFn } from "../dev/warnings.js";
import type { GridStyle } from "../grid/styles.js";
import type { HAlign, VAlign } from "../layout/align.js";
import type { Rgb24 } from "../style/color.js";
import type { WrapMode } from "../text/wrap.js";

/** Turns a cell value into display text. */
export type CellFormatter = (value: unknown) => string;

/** Derives a cell value from the whole row; the result then goes through `formatter`. */
export type ObjectFormatter = (row: unknown) => unknown;

export type ColumnSpec = Readonly<{
  /** Header text. */
  name: string;
  /** Explicit content width in columns; auto-sized when absent. */
  width?: number;
  /** Attribute (property, method or map key) read from object rows. */
  attrib?: string;
  wrapMode?: WrapMode;
  /** Starts every wrapped sub-line after the first, in "wrap" mode. */
  wrapPrefix?: string;
  cellPadding?: number;
  headerHAlign?: HAlign;
  headerVAlign?: VAlign;
  cellHAlign?: HAlign;
  cellVAlign?: VAlign;
  formatter?: CellFormatter;
  objFormatter?: ObjectFormatter;
}>;

/** A column is either its header text or a full spec. */
export type ColumnInput = string | ColumnSpec;

export type RowOptions = Readonly<{
  textColor?: Rgb24;
  backgroundColor?: Rgb24;
  /** Rows in different groups are separated under the "betweenGroups" policy. */
  group?: string | number;
}>;

/**
 * Per-row options computed from the row itself. Called once per row, in row
 * order; options given through `row()` take precedence over its result.
 */
export type RowTagger<T = unknown> =
  | ((row: T) => RowOptions | null | undefined)
  | Readonly<{ tag(row: T): RowOptions | null | undefined }>;

export type TableOptions<T = unknown> = Readonly<{
  gridStyle?: GridStyle;
  transpose?: boolean;
  /** When transposed, the first column becomes the header row. */
  rowHeader?: boolean;
  rowTagger?: RowTagger<T>;
  cellPadding?: number;
  /** Cap on auto-sized column widths; 0 for none. */
  maxColumnWidth?: number;
  headerHAlign?: HAlign;
  headerVAlign?: VAlign;
  cellHAlign?: HAlign;
  cellVAlign?: VAlign;
  wrapMode?: WrapMode;
  wrapPrefix?: string;
  /** Receives dev-mode warnings. Defaults to console.warn. */
  warn?: WarnFn;
}>;

/** Column-oriented data: every value is one column. */
export type ColumnRecord = Readonly<Record<string, readonly unknown[]>>;

/** Anything exposing column names plus a row-major value matrix. */
export type FrameLike = Readonly<{
  columns: readonly unknown[];
  values?: readonly (readonly unknown[])[];
  rows?: readonly (readonly unknown[])[];
}>;
