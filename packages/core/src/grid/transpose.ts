/**
 * packages/core/src/grid/transpose.ts — Swap the row and column roles.
 *
 * Former columns become rows and former rows become auto-sized columns. When
 * the table has headers, they become a leading label column; a table that
 * already has a label column gets its headers back from it, so transposing
 * twice restores the original arrangement of cells.
 *
 * With `rowHeader`, the row built from the first former column is promoted to
 * the header row instead of being drawn as data.
 */

import type { GridCell, GridColumn, GridRow, Table } from "./model.js";

const HIDDEN_HEADER: GridCell = Object.freeze({
  text: "",
  wrapMode: "wrap",
  wrapPrefix: "",
  hAlign: "left",
  vAlign: "bottom",
});

// Label cells are right-aligned against the data they name.
function labelCellFromHeader(header: GridCell): GridCell {
  return {
    text: header.text,
    wrapMode: "wrap",
    wrapPrefix: "",
    hAlign: "right",
    vAlign: header.vAlign,
  };
}

function headerFromCell(cell: GridCell): GridCell {
  return { ...cell, wrapMode: "wrap", wrapPrefix: "", vAlign: "bottom" };
}

function autoColumn(header: GridCell, cellPadding: number): GridColumn {
  return { cellPadding, header };
}

export function transposeTable(table: Table): Table {
  const sourceRows = table.rows;
  const hasLabel = table.labelColumn;
  const dataStart = hasLabel ? 1 : 0;
  const dataColumnCount = Math.max(0, table.columns.length - dataStart);

  // Former rows become columns; a label column supplies their headers.
  const columns: GridColumn[] = [];
  if (table.headersPresent) {
    columns.push(autoColumn(HIDDEN_HEADER, table.cellPadding));
  }
  for (const row of sourceRows) {
    const header = hasLabel ? (row.cells[0] ?? HIDDEN_HEADER) : HIDDEN_HEADER;
    columns.push(autoColumn(header, table.cellPadding));
  }

  const rows: GridRow[] = [];
  for (let c = 0; c < dataColumnCount; c++) {
    const sourceColumn = table.columns[c + dataStart];
    const cells: GridCell[] = [];
    if (table.headersPresent && sourceColumn) {
      cells.push(labelCellFromHeader(sourceColumn.header));
    }
    for (const row of sourceRows) {
      cells.push(row.cells[c + dataStart] ?? HIDDEN_HEADER);
    }
    rows.push({ cells });
  }

  const promoted = table.rowHeader ? rows[0] : undefined;
  return {
    columns: promoted
      ? columns.map((column, c) => {
          const cell = promoted.cells[c];
          return cell ? { ...column, header: headerFromCell(cell) } : column;
        })
      : columns,
    rows: promoted ? rows.slice(1) : rows,
    headersPresent: promoted !== undefined || hasLabel,
    labelColumn: table.headersPresent,
    style: table.style,
    transpose: false,
    rowHeader: false,
    maxColumnWidth: table.maxColumnWidth,
    cellPadding: table.cellPadding,
  };
}
