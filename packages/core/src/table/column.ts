/**
 * packages/core/src/table/column.ts — Builders for columns and tagged rows.
 */

import type { ColumnSpec, RowOptions } from "./types.js";

/** Build a column spec; `opts` may set anything except the name. */
export function column(name: string, opts: Omit<ColumnSpec, "name"> = {}): ColumnSpec {
  return Object.freeze({ ...opts, name });
}

/** A source row paired with its explicit per-row options. */
export class TaggedRow<T = unknown> {
  readonly value: T;
  readonly options: RowOptions;

  constructor(value: T, options: RowOptions) {
    this.value = value;
    this.options = Object.freeze({ ...options });
  }
}

/**
 * Attach options to one row, e.g.
 * `row(["A1", "A2"], { textColor: TABLE_COLORS.red })`.
 */
export function row<T>(value: T, options: RowOptions = {}): TaggedRow<T> {
  return new TaggedRow(value, options);
}

export function isTaggedRow(value: unknown): value is TaggedRow {
  return value instanceof TaggedRow;
}
