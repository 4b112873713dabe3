/**
 * packages/core/src/layout/align.ts — Fitting sub-lines into a cell box.
 */

import { invalidConfig } from "../errors.js";
import { measureTextCells, truncateToWidth, truncateWithEllipsis } from "../text/textMeasure.js";

export type HAlign = "left" | "center" | "right";
export type VAlign = "top" | "middle" | "bottom";

export const H_ALIGNS: readonly HAlign[] = Object.freeze(["left", "center", "right"]);
export const V_ALIGNS: readonly VAlign[] = Object.freeze(["top", "middle", "bottom"]);

export function isHAlign(value: unknown): value is HAlign {
  return typeof value === "string" && H_ALIGNS.some((a) => a === value);
}

export function isVAlign(value: unknown): value is VAlign {
  return typeof value === "string" && V_ALIGNS.some((a) => a === value);
}

/**
 * Pad `text` to exactly `width` columns.
 *
 * Left pads on the right, right pads on the left, center splits the gap with
 * the odd column on the right. Text wider than `width` is cut first; a cut
 * that leaves nothing visible shows an ellipsis instead.
 */
export function alignLineToWidth(text: string, width: number, halign: HAlign, padChar = " "): string {
  if (measureTextCells(padChar) !== 1) {
    throw invalidConfig(`align: padChar must be one column wide (got ${JSON.stringify(padChar)})`);
  }
  let line = text;
  let lineWidth = measureTextCells(text);
  if (lineWidth > width) {
    line = truncateToWidth(text, width);
    if (measureTextCells(line) === 0) line = truncateWithEllipsis(text, width);
    lineWidth = measureTextCells(line);
  }

  const gap = width - lineWidth;
  if (gap <= 0) return line;

  switch (halign) {
    case "left":
      return line + padChar.repeat(gap);
    case "right":
      return padChar.repeat(gap) + line;
    case "center": {
      const before = Math.floor(gap / 2);
      return padChar.repeat(before) + line + padChar.repeat(gap - before);
    }
  }
}

/**
 * Pad `lines` with blank lines to `height`.
 *
 * Top pads below, bottom pads above, middle splits with the odd line below.
 * Sequences already at or over `height` are returned unchanged.
 */
export function alignLinesVertically(
  lines: readonly string[],
  height: number,
  valign: VAlign,
): readonly string[] {
  const gap = height - lines.length;
  if (gap <= 0) return Object.freeze([...lines]);

  const blank = (n: number): string[] => Array.from({ length: n }, () => "");
  switch (valign) {
    case "top":
      return Object.freeze([...lines, ...blank(gap)]);
    case "bottom":
      return Object.freeze([...blank(gap), ...lines]);
    case "middle": {
      const above = Math.floor(gap / 2);
      return Object.freeze([...blank(above), ...lines, ...blank(gap - above)]);
    }
  }
}
