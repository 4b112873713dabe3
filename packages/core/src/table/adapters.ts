/**
 * packages/core/src/table/adapters.ts — Turn a data source into rows of raw
 * cell values plus the columns describing them.
 *
 * Sources are recognized by capability, checked in this order:
 *   1. frame-like: `columns` plus a `values` (or `rows`) matrix
 *   2. record of columns: a plain object whose own values are all arrays
 *   3. any other iterable: one entry per row
 * Anything else is GRID_UNSUPPORTED_SOURCE.
 *
 * Entries wrapped with `row()` are unwrapped here; their explicit options
 * travel with the row.
 */

import type { DevWarnings } from "../dev/warnings.js";
import { GridTextError, invalidConfig } from "../errors.js";
import { isTaggedRow } from "./column.js";
import type { ColumnInput, RowOptions } from "./types.js";

export type AdaptedRow = Readonly<{
  /** The source entry, unwrapped from `row()`. */
  value: unknown;
  /** Raw values, one per column. */
  cells: readonly unknown[];
  /** Options given explicitly through `row()`. */
  options: RowOptions;
}>;

export type AdaptedSource = Readonly<{
  columns: readonly ColumnInput[];
  /** False when the columns were synthesized as "0".."n-1". */
  headersPresent: boolean;
  /** Cells were looked up by attribute rather than by position. */
  attribMode: boolean;
  rows: readonly AdaptedRow[];
}>;

type Entries = Readonly<{ entries: readonly unknown[]; columns: readonly ColumnInput[] | undefined }>;

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value !== "object" || value === null) return false;
  return typeof Reflect.get(value, Symbol.iterator) === "function";
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toArray(value: unknown): readonly unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (isIterable(value)) return Array.from(value);
  return undefined;
}

function fromFrame(source: object): Entries | undefined {
  const frameColumns = toArray(Reflect.get(source, "columns"));
  if (frameColumns === undefined) return undefined;
  const values: unknown = Reflect.get(source, "values") ?? Reflect.get(source, "rows");
  const matrix = toArray(values);
  if (matrix === undefined) return undefined;
  return { entries: matrix, columns: frameColumns.map((name) => String(name)) };
}

function fromColumnRecord(source: Record<string, unknown>): Entries | undefined {
  const names = Object.keys(source);
  const series: (readonly unknown[])[] = [];
  for (const name of names) {
    const values = source[name];
    if (!Array.isArray(values)) return undefined;
    series.push(values);
  }
  const length = series.reduce((max, values) => Math.max(max, values.length), 0);
  const entries: unknown[][] = [];
  for (let r = 0; r < length; r++) {
    entries.push(series.map((values) => values[r]));
  }
  return { entries, columns: names };
}

function collectEntries(source: unknown): Entries {
  if (typeof source === "object" && source !== null && !Array.isArray(source)) {
    const frame = fromFrame(source);
    if (frame) return frame;
    if (isPlainObject(source)) {
      const record = fromColumnRecord(source);
      if (record) return record;
    }
  }
  const entries = toArray(source);
  if (entries === undefined) {
    throw new GridTextError(
      "GRID_UNSUPPORTED_SOURCE",
      `[gridtext] cannot build rows from ${describeReceivedType(source)}: expected an iterable of rows, a record of column arrays, or a frame with columns and values`,
    );
  }
  return { entries, columns: undefined };
}

function usesAttributes(columns: readonly ColumnInput[]): boolean {
  if (columns.length === 0) return false;
  return columns.every(
    (column) =>
      typeof column !== "string" &&
      ((typeof column.attrib === "string" && column.attrib.length > 0) ||
        typeof column.objFormatter === "function"),
  );
}

function isMapLike(value: object): value is Readonly<{ get(key: unknown): unknown; has(key: unknown): boolean }> {
  return typeof Reflect.get(value, "get") === "function" && typeof Reflect.get(value, "has") === "function";
}

/**
 * Read `attrib` from a row object: an own or inherited property first (a
 * method is called with no arguments), then a map-like `get`. Missing
 * attributes read as undefined.
 */
export function readAttribute(entry: unknown, attrib: string): unknown {
  if ((typeof entry !== "object" && typeof entry !== "function") || entry === null) {
    return undefined;
  }
  let value: unknown;
  if (attrib in entry) {
    value = Reflect.get(entry, attrib);
  } else if (isMapLike(entry) && entry.has(attrib)) {
    value = entry.get(attrib);
  }
  if (typeof value === "function") {
    return Reflect.apply(value, entry, []);
  }
  return value;
}

function positionalCells(entry: unknown, index: number, columnsGiven: boolean): readonly unknown[] {
  if (typeof entry === "string") {
    throw invalidConfig(`row ${String(index)} is a string; wrap it in an array to make a one-cell row`);
  }
  const cells = toArray(entry);
  if (cells) return cells;
  if (typeof entry === "object" && entry !== null) {
    if (columnsGiven) {
      throw invalidConfig(
        `row ${String(index)} is an object but the columns are positional; give every column an attrib or objFormatter`,
      );
    }
    return Object.values(entry);
  }
  throw invalidConfig(
    `row ${String(index)}: expected an array, iterable or object, got ${describeReceivedType(entry)}`,
  );
}

/**
 * Normalize `source` into rows of raw cell values. `columns` replaces the
 * column names a frame or column record carries.
 */
export function toRowsAndColumns(
  source: unknown,
  columns: readonly ColumnInput[] | undefined,
  warnings: DevWarnings,
): AdaptedSource {
  const collected = collectEntries(source);
  const given = columns !== undefined && columns.length > 0 ? columns : undefined;
  const unwrapped = collected.entries.map((entry) =>
    isTaggedRow(entry)
      ? { value: entry.value, options: entry.options }
      : { value: entry, options: {} },
  );

  if (given && usesAttributes(given)) {
    const attribs = given.map((column) => (typeof column === "string" ? undefined : column.attrib));
    return {
      columns: given,
      headersPresent: true,
      attribMode: true,
      rows: unwrapped.map(({ value, options }) => ({
        value,
        options,
        cells: attribs.map((attrib) =>
          attrib !== undefined && attrib.length > 0 ? readAttribute(value, attrib) : undefined,
        ),
      })),
    };
  }

  const named = given ?? collected.columns;
  const cellRows = unwrapped.map(({ value }, r) => positionalCells(value, r, named !== undefined));
  const columnCount =
    named?.length ?? cellRows.reduce((max, cells) => Math.max(max, cells.length), 0);

  const rows = unwrapped.map(({ value, options }, r) => {
    const cells = cellRows[r] ?? [];
    if (cells.length > columnCount) {
      throw invalidConfig(
        `row ${String(r)} has ${String(cells.length)} values but the table has ${String(columnCount)} columns`,
      );
    }
    if (cells.length < columnCount) {
      warnings.warn(
        "adapter",
        "shortRow",
        `row ${String(r)} has ${String(cells.length)} values for ${String(columnCount)} columns; padded with empty cells`,
      );
      return { value, options, cells: [...cells, ...Array.from({ length: columnCount - cells.length }, () => undefined)] };
    }
    return { value, options, cells };
  });

  return {
    columns: named ?? Array.from({ length: columnCount }, (_, c) => String(c)),
    headersPresent: named !== undefined,
    attribMode: false,
    rows,
  };
}
