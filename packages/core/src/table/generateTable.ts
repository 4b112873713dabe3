/**
 * packages/core/src/table/generateTable.ts — Public entry point.
 *
 * generateTable(source, columns?, options?) runs the whole pipeline:
 *   validate options → adapt source → tag rows → format cells → render.
 *
 * No output is produced until every check has passed; formatter and tagger
 * exceptions reach the caller unmodified.
 */

import { createDevWarnings } from "../dev/warnings.js";
import { invalidConfig } from "../errors.js";
import type { GridCell, GridColumn, GridRow, Table } from "../grid/model.js";
import { renderTable } from "../grid/render.js";
import { createAlternatingRowGrid } from "../grid/styles.js";
import { toRowsAndColumns } from "./adapters.js";
import type { TaggedRow } from "./column.js";
import type { ColumnInput, RowOptions, TableOptions } from "./types.js";
import {
  type ResolvedColumn,
  type ValidationResult,
  validateColumn,
  validateRowOptions,
  validateTableOptions,
} from "./validate.js";

function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) throw invalidConfig(result.detail);
  return result.value;
}

/** Display text of one cell value. */
function cellText(value: unknown, column: ResolvedColumn, rowValue: unknown): string {
  const v = column.objFormatter ? column.objFormatter(rowValue) : value;
  if (column.formatter) return column.formatter(v);
  if (typeof v === "string") return v;
  if (v === null || v === undefined) return "";
  return String(v);
}

function headerCell(column: ResolvedColumn): GridCell {
  return {
    text: column.name,
    wrapMode: "wrap",
    wrapPrefix: "",
    hAlign: column.headerHAlign,
    vAlign: column.headerVAlign,
  };
}

/**
 * Render `source` as a text table.
 *
 * @example
 * ```ts
 * generateTable([["A1", "A2"], ["B1", "B2"]], ["Col 1", "Col 2"]);
 * ```
 */
export function generateTable<T>(
  source: Iterable<T | TaggedRow<T>>,
  columns?: readonly ColumnInput[],
  options?: TableOptions<T>,
): string;
export function generateTable(
  source: unknown,
  columns?: readonly ColumnInput[],
  options?: TableOptions,
): string;
export function generateTable(
  source: unknown,
  columns?: readonly ColumnInput[],
  options: TableOptions = {},
): string {
  const opts = unwrap(validateTableOptions(options));
  const warnings = createDevWarnings(opts.warn ? { warn: opts.warn } : {});
  const adapted = toRowsAndColumns(source, columns, warnings);
  const resolved = adapted.columns.map((column, c) => unwrap(validateColumn(column, c, opts)));

  const rows: GridRow[] = adapted.rows.map((adaptedRow, r) => {
    const tagged: RowOptions = opts.tag ? (opts.tag(adaptedRow.value) ?? {}) : {};
    const rowOptions = unwrap(validateRowOptions({ ...tagged, ...adaptedRow.options }, r));
    const cells: GridCell[] = resolved.map((column, c) => ({
      text: cellText(adaptedRow.cells[c], column, adaptedRow.value),
      wrapMode: column.wrapMode,
      wrapPrefix: column.wrapPrefix,
      hAlign: column.cellHAlign,
      vAlign: column.cellVAlign,
      textColor: rowOptions.textColor,
    }));
    return {
      cells,
      backgroundColor: rowOptions.backgroundColor,
      group: rowOptions.group,
    };
  });

  const gridColumns: GridColumn[] = resolved.map((column) => ({
    width: column.width,
    cellPadding: column.cellPadding,
    header: headerCell(column),
  }));

  const table: Table = {
    columns: gridColumns,
    rows,
    headersPresent: adapted.headersPresent,
    labelColumn: false,
    style: opts.gridStyle ?? createAlternatingRowGrid(),
    transpose: opts.transpose,
    rowHeader: opts.rowHeader,
    maxColumnWidth: opts.maxColumnWidth,
    cellPadding: opts.cellPadding,
  };
  return renderTable(table);
}
