/**
 * packages/core/src/table/validate.ts — Table and column option validation.
 *
 * Options may come from untyped callers, so every field is checked before any
 * rendering starts. Validators return a result rather than throwing; the entry
 * point turns the first failure into a GridTextError.
 *
 * Validation rules:
 *   - Integer options must be finite integers in range (cellPadding >= 0,
 *     maxColumnWidth >= 0, width >= 1)
 *   - Enum options must be one of their listed values
 *   - Callbacks must be functions
 *   - Unset values take the table default, then the built-in default
 */

import type { WarnFn } from "../dev/warnings.js";
import type { GridStyle } from "../grid/styles.js";
import { type HAlign, H_ALIGNS, type VAlign, V_ALIGNS, isHAlign, isVAlign } from "../layout/align.js";
import { type WrapMode, WRAP_MODES, isWrapMode } from "../text/wrap.js";
import type {
  CellFormatter,
  ColumnInput,
  ColumnSpec,
  ObjectFormatter,
  RowOptions,
  RowTagger,
  TableOptions,
} from "./types.js";

export type ValidationResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; detail: string }>;

export type ResolvedTableOptions = Readonly<{
  gridStyle: GridStyle | undefined;
  transpose: boolean;
  rowHeader: boolean;
  tag: ((row: unknown) => RowOptions | null | undefined) | undefined;
  cellPadding: number;
  maxColumnWidth: number;
  headerHAlign: HAlign;
  headerVAlign: VAlign;
  cellHAlign: HAlign;
  cellVAlign: VAlign;
  wrapMode: WrapMode;
  wrapPrefix: string;
  warn: WarnFn | undefined;
}>;

export type ResolvedColumn = Readonly<{
  name: string;
  width: number | undefined;
  attrib: string | undefined;
  wrapMode: WrapMode;
  wrapPrefix: string;
  cellPadding: number;
  headerHAlign: HAlign;
  headerVAlign: VAlign;
  cellHAlign: HAlign;
  cellVAlign: VAlign;
  formatter: CellFormatter | undefined;
  objFormatter: ObjectFormatter | undefined;
}>;

function invalid(detail: string): ValidationResult<never> {
  return { ok: false, detail };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidOption(
  owner: string,
  name: string,
  expected: string,
  received: unknown,
): ValidationResult<never> {
  return invalid(
    `Invalid option "${name}" on ${owner}: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${String(received)})`,
  );
}

function requireInt(
  owner: string,
  name: string,
  v: unknown,
  def: number,
  min: number,
): ValidationResult<number> {
  const value = v === undefined ? def : v;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    return invalidOption(owner, name, `an integer >= ${String(min)}`, value);
  }
  return { ok: true, value };
}

function requireOptionalInt(
  owner: string,
  name: string,
  v: unknown,
  min: number,
): ValidationResult<number | undefined> {
  if (v === undefined) return { ok: true, value: undefined };
  return requireInt(owner, name, v, min, min);
}

function requireBoolean(owner: string, name: string, v: unknown, def: boolean): ValidationResult<boolean> {
  const value = v === undefined ? def : v;
  if (typeof value !== "boolean") return invalidOption(owner, name, "a boolean", value);
  return { ok: true, value };
}

function requireString(owner: string, name: string, v: unknown, def: string): ValidationResult<string> {
  const value = v === undefined ? def : v;
  if (typeof value !== "string") return invalidOption(owner, name, "a string", value);
  return { ok: true, value };
}

function requireEnum<T extends string>(
  owner: string,
  name: string,
  v: unknown,
  def: T,
  allowed: readonly T[],
  guard: (value: unknown) => value is T,
): ValidationResult<T> {
  const value = v === undefined ? def : v;
  if (!guard(value)) {
    return invalidOption(owner, name, `one of ${allowed.map((a) => `"${a}"`).join(" | ")}`, value);
  }
  return { ok: true, value };
}

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === "function";
}

function requireOptionalCallback<F>(
  owner: string,
  name: string,
  v: F | undefined,
): ValidationResult<F | undefined> {
  if (v === undefined || isFunction(v)) return { ok: true, value: v };
  return invalidOption(owner, name, "a function", v);
}

function resolveTagger(
  tagger: RowTagger | undefined,
): ValidationResult<((row: unknown) => RowOptions | null | undefined) | undefined> {
  if (tagger === undefined) return { ok: true, value: undefined };
  if (typeof tagger === "function") return { ok: true, value: tagger };
  if (typeof tagger === "object" && tagger !== null && isFunction(tagger.tag)) {
    const tagged = tagger;
    return { ok: true, value: (row: unknown) => tagged.tag(row) };
  }
  return invalidOption("table", "rowTagger", "a function or an object with tag()", tagger);
}

export function validateTableOptions(opts: TableOptions): ValidationResult<ResolvedTableOptions> {
  const owner = "table";
  const transpose = requireBoolean(owner, "transpose", opts.transpose, false);
  if (!transpose.ok) return transpose;
  const rowHeader = requireBoolean(owner, "rowHeader", opts.rowHeader, false);
  if (!rowHeader.ok) return rowHeader;
  const tag = resolveTagger(opts.rowTagger);
  if (!tag.ok) return tag;
  const cellPadding = requireInt(owner, "cellPadding", opts.cellPadding, 1, 0);
  if (!cellPadding.ok) return cellPadding;
  const maxColumnWidth = requireInt(owner, "maxColumnWidth", opts.maxColumnWidth, 0, 0);
  if (!maxColumnWidth.ok) return maxColumnWidth;
  const headerHAlign = requireEnum(owner, "headerHAlign", opts.headerHAlign, "left", H_ALIGNS, isHAlign);
  if (!headerHAlign.ok) return headerHAlign;
  const headerVAlign = requireEnum(owner, "headerVAlign", opts.headerVAlign, "bottom", V_ALIGNS, isVAlign);
  if (!headerVAlign.ok) return headerVAlign;
  const cellHAlign = requireEnum(owner, "cellHAlign", opts.cellHAlign, "left", H_ALIGNS, isHAlign);
  if (!cellHAlign.ok) return cellHAlign;
  const cellVAlign = requireEnum(owner, "cellVAlign", opts.cellVAlign, "top", V_ALIGNS, isVAlign);
  if (!cellVAlign.ok) return cellVAlign;
  const wrapMode = requireEnum(owner, "wrapMode", opts.wrapMode, "wrap", WRAP_MODES, isWrapMode);
  if (!wrapMode.ok) return wrapMode;
  const wrapPrefix = requireString(owner, "wrapPrefix", opts.wrapPrefix, "");
  if (!wrapPrefix.ok) return wrapPrefix;
  const warn = requireOptionalCallback(owner, "warn", opts.warn);
  if (!warn.ok) return warn;
  if (opts.gridStyle !== undefined && (typeof opts.gridStyle !== "object" || opts.gridStyle === null)) {
    return invalidOption(owner, "gridStyle", "a GridStyle", opts.gridStyle);
  }

  return {
    ok: true,
    value: {
      gridStyle: opts.gridStyle,
      transpose: transpose.value,
      rowHeader: rowHeader.value,
      tag: tag.value,
      cellPadding: cellPadding.value,
      maxColumnWidth: maxColumnWidth.value,
      headerHAlign: headerHAlign.value,
      headerVAlign: headerVAlign.value,
      cellHAlign: cellHAlign.value,
      cellVAlign: cellVAlign.value,
      wrapMode: wrapMode.value,
      wrapPrefix: wrapPrefix.value,
      warn: warn.value,
    },
  };
}

/** Resolve one column against the table defaults. */
export function validateColumn(
  input: ColumnInput,
  index: number,
  defaults: ResolvedTableOptions,
): ValidationResult<ResolvedColumn> {
  const spec: ColumnSpec = typeof input === "string" ? { name: input } : input;
  const owner = `column ${String(index)}`;
  if (typeof spec !== "object" || spec === null) {
    return invalidOption(owner, "column", "a string or a column spec", spec);
  }
  const name = requireString(owner, "name", spec.name, "");
  if (!name.ok) return name;
  const width = requireOptionalInt(owner, "width", spec.width, 1);
  if (!width.ok) return width;
  if (spec.attrib !== undefined && typeof spec.attrib !== "string") {
    return invalidOption(owner, "attrib", "a string", spec.attrib);
  }
  const wrapMode = requireEnum(owner, "wrapMode", spec.wrapMode, defaults.wrapMode, WRAP_MODES, isWrapMode);
  if (!wrapMode.ok) return wrapMode;
  const wrapPrefix = requireString(owner, "wrapPrefix", spec.wrapPrefix, defaults.wrapPrefix);
  if (!wrapPrefix.ok) return wrapPrefix;
  const cellPadding = requireInt(owner, "cellPadding", spec.cellPadding, defaults.cellPadding, 0);
  if (!cellPadding.ok) return cellPadding;
  const headerHAlign = requireEnum(owner, "headerHAlign", spec.headerHAlign, defaults.headerHAlign, H_ALIGNS, isHAlign);
  if (!headerHAlign.ok) return headerHAlign;
  const headerVAlign = requireEnum(owner, "headerVAlign", spec.headerVAlign, defaults.headerVAlign, V_ALIGNS, isVAlign);
  if (!headerVAlign.ok) return headerVAlign;
  const cellHAlign = requireEnum(owner, "cellHAlign", spec.cellHAlign, defaults.cellHAlign, H_ALIGNS, isHAlign);
  if (!cellHAlign.ok) return cellHAlign;
  const cellVAlign = requireEnum(owner, "cellVAlign", spec.cellVAlign, defaults.cellVAlign, V_ALIGNS, isVAlign);
  if (!cellVAlign.ok) return cellVAlign;
  const formatter = requireOptionalCallback(owner, "formatter", spec.formatter);
  if (!formatter.ok) return formatter;
  const objFormatter = requireOptionalCallback(owner, "objFormatter", spec.objFormatter);
  if (!objFormatter.ok) return objFormatter;

  return {
    ok: true,
    value: {
      name: name.value,
      width: width.value,
      attrib: spec.attrib,
      wrapMode: wrapMode.value,
      wrapPrefix: wrapPrefix.value,
      cellPadding: cellPadding.value,
      headerHAlign: headerHAlign.value,
      headerVAlign: headerVAlign.value,
      cellHAlign: cellHAlign.value,
      cellVAlign: cellVAlign.value,
      formatter: formatter.value,
      objFormatter: objFormatter.value,
    },
  };
}

function requireOptionalColor(owner: string, name: string, v: unknown): ValidationResult<number | undefined> {
  if (v === undefined) return { ok: true, value: undefined };
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0 || v > 0xffffff) {
    return invalidOption(owner, name, "an rgb() color", v);
  }
  return { ok: true, value: v };
}

/** Check options coming from `row()` or a row tagger. */
export function validateRowOptions(options: RowOptions, index: number): ValidationResult<RowOptions> {
  const owner = `row ${String(index)}`;
  if (typeof options !== "object" || options === null) {
    return invalidOption(owner, "options", "an object", options);
  }
  const textColor = requireOptionalColor(owner, "textColor", options.textColor);
  if (!textColor.ok) return textColor;
  const backgroundColor = requireOptionalColor(owner, "backgroundColor", options.backgroundColor);
  if (!backgroundColor.ok) return backgroundColor;
  const group = options.group;
  if (group !== undefined && typeof group !== "string" && typeof group !== "number") {
    return invalidOption(owner, "group", "a string or number", group);
  }
  return { ok: true, value: options };
}
