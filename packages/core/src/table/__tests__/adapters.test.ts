import { assert, describe, test } from "@gridtext/testkit";
import { createDevWarnings } from "../../dev/warnings.js";
import { isGridTextError } from "../../errors.js";
import { toRowsAndColumns } from "../adapters.js";
import { column, row } from "../column.js";

function collector(): { messages: string[]; warnings: ReturnType<typeof createDevWarnings> } {
  const messages: string[] = [];
  return { messages, warnings: createDevWarnings({ warn: (m) => messages.push(m), devMode: true }) };
}

function cellsOf(source: unknown, columns?: Parameters<typeof toRowsAndColumns>[1]): unknown[][] {
  return toRowsAndColumns(source, columns, collector().warnings).rows.map((r) => [...r.cells]);
}

class Part {
  readonly name: string;
  readonly qty: number;

  constructor(name: string, qty: number) {
    this.name = name;
    this.qty = qty;
  }

  label(): string {
    return `#${this.name}`;
  }
}

describe("toRowsAndColumns - sequences", () => {
  test("without columns, headers are hidden indices sized to the widest row", () => {
    const { warnings } = collector();
    const out = toRowsAndColumns([["a", "b", "c"], ["d", "e", "f"]], undefined, warnings);
    assert.deepEqual(out.columns, ["0", "1", "2"]);
    assert.equal(out.headersPresent, false);
    assert.equal(out.attribMode, false);
  });

  test("short rows are padded once with a warning", () => {
    const { messages, warnings } = collector();
    const out = toRowsAndColumns([["a", "b"], ["c"], []], undefined, warnings);
    assert.deepEqual(
      out.rows.map((r) => [...r.cells]),
      [
        ["a", "b"],
        ["c", undefined],
        [undefined, undefined],
      ],
    );
    assert.deepEqual(messages, [
      "[gridtext][adapter] row 1 has 1 values for 2 columns; padded with empty cells",
    ]);
  });

  test("rows longer than the given columns are rejected", () => {
    assert.throws(
      () => cellsOf([["a", "b", "c"]], ["x", "y"]),
      (err: unknown) =>
        isGridTextError(err, "GRID_INVALID_CONFIG") &&
        err.message === "[gridtext] row 0 has 3 values but the table has 2 columns",
    );
  });

  test("any iterable works as rows and as a row", () => {
    function* source(): Generator<Iterable<number>> {
      yield new Set([1, 2]);
      yield [3, 4];
    }
    assert.deepEqual(cellsOf(source()), [
      [1, 2],
      [3, 4],
    ]);
  });

  test("row() wrappers are unwrapped and keep their options", () => {
    const out = toRowsAndColumns([row(["a"], { group: "g" }), ["b"]], undefined, collector().warnings);
    assert.deepEqual(out.rows[0]?.value, ["a"]);
    assert.deepEqual(out.rows[0]?.options, { group: "g" });
    assert.deepEqual(out.rows[1]?.options, {});
  });

  test("string rows are rejected", () => {
    assert.throws(
      () => cellsOf(["abc"]),
      (err: unknown) => isGridTextError(err, "GRID_INVALID_CONFIG"),
    );
  });
});

describe("toRowsAndColumns - records and frames", () => {
  test("a record of columns is zipped into rows", () => {
    const out = toRowsAndColumns({ name: ["a", "b"], size: [1] }, undefined, collector().warnings);
    assert.deepEqual(out.columns, ["name", "size"]);
    assert.equal(out.headersPresent, true);
    assert.deepEqual(
      out.rows.map((r) => [...r.cells]),
      [
        ["a", 1],
        ["b", undefined],
      ],
    );
  });

  test("frame-like sources supply their column names", () => {
    const frame = { columns: ["x", 2], values: [[1, 2], [3, 4]] };
    const out = toRowsAndColumns(frame, undefined, collector().warnings);
    assert.deepEqual(out.columns, ["x", "2"]);
    assert.deepEqual(cellsOf(frame), [
      [1, 2],
      [3, 4],
    ]);
    assert.deepEqual(cellsOf({ columns: ["x"], rows: [[9]] }), [[9]]);
  });

  test("given columns replace the frame names", () => {
    const out = toRowsAndColumns({ columns: ["x"], values: [[1]] }, ["Renamed"], collector().warnings);
    assert.deepEqual(out.columns, ["Renamed"]);
  });

  test("plain object rows without columns are read positionally", () => {
    assert.deepEqual(cellsOf([{ a: 1, b: 2 }]), [[1, 2]]);
  });

  test("plain object rows with positional columns are rejected", () => {
    assert.throws(
      () => cellsOf([{ a: 1 }], ["A"]),
      (err: unknown) =>
        isGridTextError(err, "GRID_INVALID_CONFIG") &&
        err.message ===
          "[gridtext] row 0 is an object but the columns are positional; give every column an attrib or objFormatter",
    );
  });
});

describe("toRowsAndColumns - attributes", () => {
  test("properties, methods and map keys are looked up by name", () => {
    const columns = [column("Name", { attrib: "name" }), column("Label", { attrib: "label" })];
    const rows = [new Part("bolt", 12), new Map([["name", "nut"]])];
    const out = toRowsAndColumns(rows, columns, collector().warnings);
    assert.equal(out.attribMode, true);
    assert.deepEqual(
      out.rows.map((r) => [...r.cells]),
      [
        ["bolt", "#bolt"],
        ["nut", undefined],
      ],
    );
  });

  test("columns with only an objFormatter still select attribute mode", () => {
    const columns = [
      column("Qty", { attrib: "qty" }),
      column("Total", { objFormatter: (r) => r }),
    ];
    const out = toRowsAndColumns([new Part("x", 3)], columns, collector().warnings);
    assert.equal(out.attribMode, true);
    assert.deepEqual(out.rows[0]?.cells, [3, undefined]);
  });

  test("one positional column turns attribute mode off", () => {
    const out = toRowsAndColumns([["a", "b"]], [column("A", { attrib: "a" }), "B"], collector().warnings);
    assert.equal(out.attribMode, false);
  });
});

describe("toRowsAndColumns - unsupported sources", () => {
  for (const source of ["text", 42, null, undefined, true]) {
    test(`rejects ${String(source)}`, () => {
      assert.throws(
        () => cellsOf(source),
        (err: unknown) => isGridTextError(err, "GRID_UNSUPPORTED_SOURCE"),
      );
    });
  }
});
