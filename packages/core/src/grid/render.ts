/**
 * packages/core/src/grid/render.ts — Emit a table as box-drawn text.
 *
 * Pipeline: validate → [transpose] → resolve widths → wrap → vertical then
 * horizontal alignment → emit rules and body lines with the style's glyphs.
 *
 * Every physical line ends with "\n" and all lines of one table have the same
 * display width. Color escapes are written only when the style's
 * `colorSupport.level` is above 0; they never count toward widths.
 *
 * Line count:
 *   top border (0/1) + header height + header rule (0/1)
 *   + Σ row heights + row rules + bottom border (0/1)
 */

import { invalidConfig } from "../errors.js";
import { alignLineToWidth, alignLinesVertically } from "../layout/align.js";
import { resolveColumnWidths } from "../layout/columns.js";
import { type TextStyle, styleClose, styleOpen } from "../style/color.js";
import { expandTabs } from "../text/textMeasure.js";
import { wrapCellText } from "../text/wrap.js";
import type { GridCell, GridRow, Table } from "./model.js";
import type { GridStyle, RuleGlyphs } from "./styles.js";
import { transposeTable } from "./transpose.js";

type PreparedCell = Readonly<{
  cell: GridCell;
  lines: readonly string[];
}>;

function validateTable(table: Table): void {
  const columnCount = table.columns.length;
  table.rows.forEach((row, r) => {
    if (row.cells.length !== columnCount) {
      throw invalidConfig(
        `row ${String(r)} has ${String(row.cells.length)} cells but the table has ${String(columnCount)} columns`,
      );
    }
  });
  table.columns.forEach((column, c) => {
    if (!Number.isInteger(column.cellPadding) || column.cellPadding < 0) {
      throw invalidConfig(
        `column ${String(c)}: cellPadding must be an integer >= 0 (got ${String(column.cellPadding)})`,
      );
    }
  });
  if (!Number.isInteger(table.cellPadding) || table.cellPadding < 0) {
    throw invalidConfig(`cellPadding must be an integer >= 0 (got ${String(table.cellPadding)})`);
  }
  if (!Number.isInteger(table.maxColumnWidth) || table.maxColumnWidth < 0) {
    throw invalidConfig(
      `maxColumnWidth must be an integer >= 0 (got ${String(table.maxColumnWidth)})`,
    );
  }
}

function prepareCell(cell: GridCell, text: string, width: number, plain: boolean): PreparedCell {
  const lines = plain
    ? wrapCellText(text, width, "wrap", "")
    : wrapCellText(text, width, cell.wrapMode, cell.wrapPrefix);
  return { cell, lines };
}

function heightOf(cells: readonly PreparedCell[]): number {
  let height = 1;
  for (const c of cells) {
    if (c.lines.length > height) height = c.lines.length;
  }
  return height;
}

function separatorBefore(style: GridStyle, prev: GridRow | undefined, row: GridRow): boolean {
  if (!prev) return false;
  switch (style.rowSeparator) {
    case "always":
      return true;
    case "never":
      return false;
    case "betweenGroups":
      return prev.group !== row.group;
  }
}

/** Render `table` to a string of newline-terminated lines. */
export function renderTable(input: Table): string {
  validateTable(input);
  const table = input.transpose ? transposeTable(input) : input;
  if (table.columns.length === 0) return "";

  const style = table.style;
  const support = style.colorSupport;
  const columns = table.columns;
  const showHeader = table.headersPresent && style.showHeader;

  const headerTexts = columns.map((column) => (showHeader ? expandTabs(column.header.text) : ""));
  const bodyTexts = table.rows.map((row) => row.cells.map((cell) => expandTabs(cell.text)));
  const widths = resolveColumnWidths(columns, headerTexts, bodyTexts, table.maxColumnWidth);
  const widthAt = (c: number): number => widths[c] ?? 1;
  const pads = columns.map((column) => style.padChar.repeat(column.cellPadding));

  const out: string[] = [];

  const divider = (c: number, glyphs: Readonly<{ col: string; labelCol: string }>): string => {
    if (c === 0 || !style.colDivider) return "";
    return c === 1 && table.labelColumn ? glyphs.labelCol : glyphs.col;
  };

  const emitRule = (glyphs: RuleGlyphs): void => {
    let line = style.borderLeft ? glyphs.left : "";
    columns.forEach((column, c) => {
      line += divider(c, glyphs);
      line += glyphs.fill.repeat(widthAt(c) + 2 * column.cellPadding);
    });
    if (style.borderRight) line += glyphs.right;
    out.push(line);
  };

  /**
   * Emit `height` physical lines for one row of prepared cells. `textStyleOf`
   * gives the style wrapping a non-blank cell line; `background` spans the
   * whole interior of the row.
   */
  const emitBlock = (
    cells: readonly PreparedCell[],
    height: number,
    header: boolean,
    textStyleOf: (cell: GridCell) => TextStyle | undefined,
    background: TextStyle | undefined,
  ): void => {
    const aligned = cells.map((prepared) =>
      alignLinesVertically(prepared.lines, height, prepared.cell.vAlign),
    );
    const bgOpen = styleOpen(background, support);
    const bgClose = styleClose(background, support);

    for (let lineIndex = 0; lineIndex < height; lineIndex++) {
      let line = style.borderLeft ? style.body.left : "";
      line += bgOpen;
      cells.forEach((prepared, c) => {
        const pad = pads[c] ?? "";
        const text = aligned[c]?.[lineIndex] ?? "";
        const fitted = alignLineToWidth(text, widthAt(c), prepared.cell.hAlign, style.padChar);
        line += divider(c, style.body);
        line += pad;
        const textStyle = text.trim().length > 0 ? textStyleOf(prepared.cell) : undefined;
        const open = styleOpen(textStyle, support);
        if (header || open.length === 0) {
          line += `${open}${fitted}${styleClose(textStyle, support)}${pad}`;
        } else {
          line += `${open}${fitted}${pad}${styleClose(textStyle, support)}`;
        }
      });
      line += bgClose;
      if (style.borderRight) line += style.body.right;
      out.push(line);
    }
  };

  if (style.borderTop) emitRule(style.topRule);

  if (showHeader) {
    const headerCells = columns.map((column, c) =>
      prepareCell(column.header, headerTexts[c] ?? "", widthAt(c), true),
    );
    emitBlock(headerCells, heightOf(headerCells), true, () => style.headerStyle, undefined);
    if (style.headerDivider) emitRule(style.headerRule);
  }

  table.rows.forEach((row, r) => {
    if (separatorBefore(style, table.rows[r - 1], row)) emitRule(style.rowRule);
    const cells = row.cells.map((cell, c) =>
      prepareCell(cell, bodyTexts[r]?.[c] ?? "", widthAt(c), false),
    );
    const styleColors = style.rowColors(r);
    const bg = row.backgroundColor ?? styleColors?.bg;
    const fg = styleColors?.fg;
    emitBlock(
      cells,
      heightOf(cells),
      false,
      (cell) => {
        const color = cell.textColor ?? fg;
        return color === undefined ? undefined : { fg: color };
      },
      bg === undefined ? undefined : { bg },
    );
  });

  if (style.borderBottom) emitRule(style.bottomRule);

  return out.map((line) => `${line}\n`).join("");
}
