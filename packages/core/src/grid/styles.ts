/**
 * packages/core/src/grid/styles.ts — Grid style descriptors.
 *
 * A GridStyle is immutable data: the glyphs for each rule line and for the
 * verticals of body lines, flags saying which of them are drawn, a row
 * separator policy, and the colors applied to header and body rows.
 *
 * Glyph positions per rule: left corner/tee, fill, right corner/tee, column
 * junction, and the junction after a transposed table's label column.
 */

import { invalidConfig } from "../errors.js";
import {
  type ColorSupport,
  NO_COLOR_SUPPORT,
  type Rgb24,
  TABLE_COLORS,
  type TextStyle,
} from "../style/color.js";
import { measureTextCells } from "../text/textMeasure.js";

export type RuleGlyphs = Readonly<{
  left: string;
  fill: string;
  right: string;
  col: string;
  labelCol: string;
}>;

export type BodyGlyphs = Readonly<{
  left: string;
  right: string;
  col: string;
  labelCol: string;
}>;

/**
 * When a rule line is drawn between two body rows.
 *
 * - "always": between every pair of rows
 * - "never": no rules between rows
 * - "betweenGroups": where the row `group` changes
 */
export type RowSeparatorPolicy = "always" | "never" | "betweenGroups";

export type RowColors = Readonly<{ fg?: Rgb24; bg?: Rgb24 }>;

/** Colors for the body row at `rowIndex` (0-based), or null for none. */
export type RowColorFn = (rowIndex: number) => RowColors | null;

export type GridStyle = Readonly<{
  name: string;
  topRule: RuleGlyphs;
  headerRule: RuleGlyphs;
  rowRule: RuleGlyphs;
  bottomRule: RuleGlyphs;
  body: BodyGlyphs;
  /** Fills cell padding and alignment gaps. Must be one column wide. */
  padChar: string;
  showHeader: boolean;
  borderTop: boolean;
  borderBottom: boolean;
  borderLeft: boolean;
  borderRight: boolean;
  headerDivider: boolean;
  colDivider: boolean;
  rowSeparator: RowSeparatorPolicy;
  rowColors: RowColorFn;
  headerStyle: TextStyle;
  colorSupport: ColorSupport;
}>;

const NO_ROW_COLORS: RowColorFn = () => null;

const EMPTY_RULE: RuleGlyphs = Object.freeze({ left: "", fill: "", right: "", col: "", labelCol: "" });
const EMPTY_BODY: BodyGlyphs = Object.freeze({ left: "", right: "", col: "", labelCol: "" });

const FANCY_BASE: GridStyle = Object.freeze({
  name: "fancy",
  topRule: Object.freeze({ left: "╔", fill: "═", right: "╗", col: "╤", labelCol: "╦" }),
  headerRule: Object.freeze({ left: "╠", fill: "═", right: "╣", col: "╪", labelCol: "╬" }),
  rowRule: Object.freeze({ left: "╟", fill: "─", right: "╢", col: "┼", labelCol: "╫" }),
  bottomRule: Object.freeze({ left: "╚", fill: "═", right: "╝", col: "╧", labelCol: "╩" }),
  body: Object.freeze({ left: "║", right: "║", col: "│", labelCol: "║" }),
  padChar: " ",
  showHeader: true,
  borderTop: true,
  borderBottom: true,
  borderLeft: true,
  borderRight: true,
  headerDivider: true,
  colDivider: true,
  rowSeparator: "always",
  rowColors: NO_ROW_COLORS,
  headerStyle: Object.freeze({ bold: true }),
  colorSupport: NO_COLOR_SUPPORT,
});

function checkGlyphWidths(style: GridStyle): void {
  const rules: [string, RuleGlyphs, boolean][] = [
    ["topRule", style.topRule, style.borderTop],
    ["headerRule", style.headerRule, style.headerDivider && style.showHeader],
    ["rowRule", style.rowRule, style.rowSeparator !== "never"],
    ["bottomRule", style.bottomRule, style.borderBottom],
  ];
  const positions: [keyof BodyGlyphs, boolean][] = [
    ["left", style.borderLeft],
    ["right", style.borderRight],
    ["col", style.colDivider],
    ["labelCol", style.colDivider],
  ];

  for (const [ruleName, rule, drawn] of rules) {
    if (!drawn) continue;
    if (measureTextCells(rule.fill) !== 1) {
      throw invalidConfig(`gridStyle.${ruleName}.fill must be one column wide`);
    }
    for (const [pos, used] of positions) {
      if (!used) continue;
      if (measureTextCells(rule[pos]) !== measureTextCells(style.body[pos])) {
        throw invalidConfig(
          `gridStyle.${ruleName}.${pos} must be as wide as gridStyle.body.${pos}`,
        );
      }
    }
  }
  if (measureTextCells(style.padChar) !== 1) {
    throw invalidConfig("gridStyle.padChar must be one column wide");
  }
}

export type GridStyleOverrides = Partial<GridStyle>;

/**
 * Build a custom style from the fancy base. Glyph widths are checked so that
 * every emitted line of a table has the same display width.
 */
export function defineGridStyle(overrides: GridStyleOverrides = {}): GridStyle {
  const style: GridStyle = Object.freeze({ ...FANCY_BASE, ...overrides });
  checkGlyphWidths(style);
  return style;
}

export type FancyGridOptions = Readonly<{
  colorSupport?: ColorSupport;
  rowSeparator?: RowSeparatorPolicy;
  headerStyle?: TextStyle;
}>;

/** Full frame, header rule, and a rule between every row. */
export function createFancyGrid(opts: FancyGridOptions = {}): GridStyle {
  return defineGridStyle({
    name: "fancy",
    colorSupport: opts.colorSupport ?? NO_COLOR_SUPPORT,
    rowSeparator: opts.rowSeparator ?? "always",
    headerStyle: opts.headerStyle ?? FANCY_BASE.headerStyle,
  });
}

export type AlternatingRowGridOptions = Readonly<{
  colorSupport?: ColorSupport;
  /** Background of even rows (the first row is row 0). Default: none. */
  primary?: Rgb24 | null;
  /** Background of odd rows. Default: gray. */
  alternate?: Rgb24 | null;
  headerStyle?: TextStyle;
}>;

/** Fancy frame without rules between rows; rows shaded alternately. */
export function createAlternatingRowGrid(opts: AlternatingRowGridOptions = {}): GridStyle {
  const primary = opts.primary ?? null;
  const alternate = opts.alternate === undefined ? TABLE_COLORS.gray : opts.alternate;
  const rowColors: RowColorFn = (rowIndex) => {
    const bg = rowIndex % 2 === 0 ? primary : alternate;
    return bg === null ? null : { bg };
  };

  return defineGridStyle({
    name: "alternatingRow",
    colorSupport: opts.colorSupport ?? NO_COLOR_SUPPORT,
    rowSeparator: "never",
    rowColors,
    headerStyle: opts.headerStyle ?? FANCY_BASE.headerStyle,
  });
}

export type SparseGridOptions = Readonly<{
  colorSupport?: ColorSupport;
  rowColors?: RowColorFn;
}>;

/** No borders, rules, dividers or header block: padding only. */
export function createSparseGrid(opts: SparseGridOptions = {}): GridStyle {
  return defineGridStyle({
    name: "sparse",
    topRule: EMPTY_RULE,
    headerRule: EMPTY_RULE,
    rowRule: EMPTY_RULE,
    bottomRule: EMPTY_RULE,
    body: EMPTY_BODY,
    showHeader: false,
    borderTop: false,
    borderBottom: false,
    borderLeft: false,
    borderRight: false,
    headerDivider: false,
    colDivider: false,
    rowSeparator: "never",
    rowColors: opts.rowColors ?? NO_ROW_COLORS,
    colorSupport: opts.colorSupport ?? NO_COLOR_SUPPORT,
  });
}
