import type { GridCell, GridColumn, GridRow, Table } from "../model.js";
import { type GridStyle, createFancyGrid } from "../styles.js";

export function cell(text: string, overrides: Partial<GridCell> = {}): GridCell {
  return { text, wrapMode: "wrap", wrapPrefix: "", hAlign: "left", vAlign: "top", ...overrides };
}

export type GridTableOptions = Readonly<{
  headers?: readonly string[];
  style?: GridStyle;
  transpose?: boolean;
  rowHeader?: boolean;
  cellPadding?: number;
  maxColumnWidth?: number;
  columns?: readonly Partial<GridColumn>[];
  rowOptions?: readonly Partial<Omit<GridRow, "cells">>[];
}>;

/** A table of plain text cells; columns are auto-sized unless overridden. */
export function gridTable(rows: readonly (readonly string[])[], opts: GridTableOptions = {}): Table {
  const count = opts.headers?.length ?? rows[0]?.length ?? 0;
  const padding = opts.cellPadding ?? 1;
  const columns: GridColumn[] = Array.from({ length: count }, (_, c) => ({
    cellPadding: padding,
    header: cell(opts.headers?.[c] ?? String(c), { vAlign: "bottom" }),
    ...opts.columns?.[c],
  }));
  return {
    columns,
    rows: rows.map((texts, r) => ({
      cells: texts.map((text) => cell(text)),
      ...opts.rowOptions?.[r],
    })),
    headersPresent: opts.headers !== undefined,
    labelColumn: false,
    style: opts.style ?? createFancyGrid(),
    transpose: opts.transpose ?? false,
    rowHeader: opts.rowHeader ?? false,
    maxColumnWidth: opts.maxColumnWidth ?? 0,
    cellPadding: padding,
  };
}

export function lines(text: string): readonly string[] {
  return text.split("\n").slice(0, -1);
}
