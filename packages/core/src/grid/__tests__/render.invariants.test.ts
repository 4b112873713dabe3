import { assert, describe, test } from "@gridtext/testkit";
import { isGridTextError } from "../../errors.js";
import { TABLE_COLORS, TRUECOLOR_SUPPORT } from "../../style/color.js";
import { stripAnsi } from "../../text/ansi.js";
import { measureTextCells } from "../../text/textMeasure.js";
import type { Table } from "../model.js";
import { renderTable } from "../render.js";
import { createAlternatingRowGrid, createFancyGrid, createSparseGrid } from "../styles.js";
import { cell, gridTable, lines } from "./helpers.js";

const MIXED: readonly (readonly string[])[] = [
  ["Longer text that will wrap around", "日本語のテキスト", "1"],
  ["tab\tseparated", "é combining", "👍🏽 thumbs"],
  ["", "x", "multi\nline\ncell"],
];

function widths(text: string): readonly number[] {
  return lines(text).map((line) => measureTextCells(stripAnsi(line)));
}

describe("renderTable - invariants", () => {
  test("every line of a table has the same display width", () => {
    const styles = [
      createFancyGrid(),
      createAlternatingRowGrid({ colorSupport: TRUECOLOR_SUPPORT }),
      createSparseGrid(),
    ];
    for (const style of styles) {
      for (const transpose of [false, true]) {
        const out = renderTable(
          gridTable(MIXED, { headers: ["First", "Second", "Third"], style, transpose, maxColumnWidth: 12 }),
        );
        const measured = widths(out);
        const first = measured[0];
        assert.ok(first !== undefined && first > 0);
        assert.ok(
          measured.every((w) => w === first),
          `${style.name} transpose=${String(transpose)}: ${measured.join(",")}`,
        );
      }
    }
  });

  test("line count is borders + header + rules + row heights", () => {
    const out = renderTable(
      gridTable([["a", "b\nc\nd"], ["e", "f"]], { headers: ["h1", "h2"], style: createFancyGrid() }),
    );
    // top + header + header rule + 3 + row rule + 1 + bottom
    assert.equal(lines(out).length, 9);
  });

  test("betweenGroups draws rules only where the group changes", () => {
    const style = createFancyGrid({ rowSeparator: "betweenGroups" });
    const out = renderTable(
      gridTable([["a"], ["b"], ["c"]], { style, rowOptions: [{ group: 1 }, { group: 1 }, { group: 2 }] }),
    );
    assert.deepEqual(lines(out), ["╔═══╗", "║ a ║", "║ b ║", "╟───╢", "║ c ║", "╚═══╝"]);
  });

  test("escapes never count toward column widths", () => {
    const style = createAlternatingRowGrid({ colorSupport: TRUECOLOR_SUPPORT });
    const colored: Table = {
      ...gridTable([["x"]], { style }),
      rows: [{ cells: [cell("\u001b[31mred\u001b[0m", { textColor: TABLE_COLORS.green })] }],
    };
    assert.equal(lines(renderTable(colored))[0], "╔═════╗");
  });

  test("rows with the wrong number of cells are rejected", () => {
    const table: Table = { ...gridTable([["a", "b"]]), rows: [{ cells: [cell("a")] }] };
    assert.throws(
      () => renderTable(table),
      (err: unknown) =>
        isGridTextError(err, "GRID_INVALID_CONFIG") &&
        err.message === "[gridtext] row 0 has 1 cells but the table has 2 columns",
    );
  });

  test("a continuation prefix as wide as the column is rejected once a cell wraps", () => {
    const table: Table = {
      ...gridTable([["x"]], { columns: [{ width: 3 }] }),
      rows: [{ cells: [cell("too long", { wrapPrefix: ">>>" })] }],
    };
    assert.throws(() => renderTable(table), (err: unknown) => isGridTextError(err, "GRID_INVALID_CONFIG"));
  });

  test("negative padding is rejected before any output", () => {
    assert.throws(
      () => renderTable(gridTable([["x"]], { cellPadding: -1 })),
      (err: unknown) =>
        isGridTextError(err, "GRID_INVALID_CONFIG") &&
        err.message === "[gridtext] column 0: cellPadding must be an integer >= 0 (got -1)",
    );
  });
});
