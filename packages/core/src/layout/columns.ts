/**
 * packages/core/src/layout/columns.ts — Column width resolution.
 *
 * An explicit width is used verbatim; content is wrapped or truncated to it
 * later. Otherwise a column is as wide as its widest header or cell line,
 * capped by the table-wide maximum when one is set, and never narrower than 1.
 */

import { invalidConfig } from "../errors.js";
import { measureWidestLine } from "../text/textMeasure.js";

export type ColumnWidthSpec = Readonly<{ width?: number | undefined }>;

export function resolveColumnWidth(
  column: ColumnWidthSpec,
  headerText: string,
  cellTexts: readonly string[],
  maxColumnWidth = 0,
): number {
  if (column.width !== undefined) {
    if (!Number.isInteger(column.width) || column.width < 1) {
      throw invalidConfig(`column.width must be an integer >= 1 (got ${String(column.width)})`);
    }
    return column.width;
  }
  if (!Number.isInteger(maxColumnWidth) || maxColumnWidth < 0) {
    throw invalidConfig(`maxColumnWidth must be an integer >= 0 (got ${String(maxColumnWidth)})`);
  }

  let width = measureWidestLine(headerText);
  for (const text of cellTexts) {
    const w = measureWidestLine(text);
    if (w > width) width = w;
  }
  if (maxColumnWidth > 0 && width > maxColumnWidth) width = maxColumnWidth;
  return Math.max(1, width);
}

/**
 * Resolve every column of a grid in order. `rows[r][c]` is the display text
 * of row r, column c; `headers[c]` is "" when headers are hidden.
 */
export function resolveColumnWidths(
  columns: readonly ColumnWidthSpec[],
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  maxColumnWidth = 0,
): readonly number[] {
  return Object.freeze(
    columns.map((column, c) =>
      resolveColumnWidth(
        column,
        headers[c] ?? "",
        rows.map((row) => row[c] ?? ""),
        maxColumnWidth,
      ),
    ),
  );
}
