/**
 * packages/node/src/writeTable.ts — Render a table straight to a stream.
 */

import {
  type ColumnInput,
  type TableOptions,
  type TaggedRow,
  createAlternatingRowGrid,
  generateTable,
} from "@gridtext/core";
import { type ColorEnv, type ColorStream, colorSupportFromNodeEnv } from "./colorSupport.js";

export type TableStream = ColorStream &
  Readonly<{
    write(chunk: string): boolean;
  }>;

/**
 * Render and write the whole table with one `write` call. Without a
 * `gridStyle`, the default alternating-row grid is colored to match what
 * `stream` supports. Nothing is written when rendering fails.
 */
export function writeTable<T>(
  stream: TableStream,
  source: Iterable<T | TaggedRow<T>>,
  columns?: readonly ColumnInput[],
  options?: TableOptions<T>,
  env?: ColorEnv,
): string;
export function writeTable(
  stream: TableStream,
  source: unknown,
  columns?: readonly ColumnInput[],
  options?: TableOptions,
  env?: ColorEnv,
): string;
export function writeTable(
  stream: TableStream,
  source: unknown,
  columns?: readonly ColumnInput[],
  options: TableOptions = {},
  env: ColorEnv = process.env,
): string {
  const gridStyle =
    options.gridStyle ??
    createAlternatingRowGrid({ colorSupport: colorSupportFromNodeEnv(stream, env) });
  const text = generateTable(source, columns, { ...options, gridStyle });
  stream.write(text);
  return text;
}
