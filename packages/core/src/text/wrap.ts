/**
 * packages/core/src/text/wrap.ts — Split cell text into sub-lines.
 *
 * Explicit line breaks always start a new sub-line. An explicit line that
 * already fits is kept verbatim; only lines wider than `maxWidth` are wrapped
 * or truncated, per `WrapMode`.
 */

import { invalidConfig } from "../errors.js";
import {
  measureTextCells,
  splitAtWidth,
  splitLines,
  truncateMiddle,
  truncateStart,
  truncateToWidth,
  truncateWithEllipsis,
} from "./textMeasure.js";

/**
 * How a line wider than its column is fitted.
 *
 * - "wrap": word wrap onto further sub-lines
 * - "truncate": cut at the width, no marker
 * - "truncateHard": cut and end with an ellipsis
 * - "truncateFront": ellipsis followed by the tail
 * - "truncateMiddle": head, ellipsis, tail
 */
export type WrapMode = "wrap" | "truncate" | "truncateHard" | "truncateFront" | "truncateMiddle";

export const WRAP_MODES: readonly WrapMode[] = Object.freeze([
  "wrap",
  "truncate",
  "truncateHard",
  "truncateFront",
  "truncateMiddle",
]);

export function isWrapMode(value: unknown): value is WrapMode {
  return typeof value === "string" && WRAP_MODES.some((mode) => mode === value);
}

const WHITESPACE_TOKEN_RE = /^\s/;

/**
 * Greedy word wrap of a single explicit line.
 *
 * Whitespace at a break is dropped; whitespace leading the line is kept when
 * a word follows it on the same sub-line. Tokens wider than a fresh sub-line
 * are hard-broken at grapheme boundaries.
 */
function wrapLine(line: string, maxWidth: number, prefix: string): string[] {
  const prefixWidth = measureTextCells(prefix);
  const lines: string[] = [];
  let current = "";
  let currentWidth = 0;
  let pending = "";
  let pendingWidth = 0;

  const limit = (): number => (lines.length === 0 ? maxWidth : maxWidth - prefixWidth);
  const flush = (text: string): void => {
    lines.push(lines.length === 0 ? text : prefix + text);
  };

  const tokens = line.match(/\S+|\s+/g) ?? [];
  for (const token of tokens) {
    const tokenWidth = measureTextCells(token);

    if (WHITESPACE_TOKEN_RE.test(token)) {
      if (lines.length === 0 && current.length === 0 && tokenWidth < maxWidth) {
        current = token;
        currentWidth = tokenWidth;
      } else {
        pending = token;
        pendingWidth = tokenWidth;
      }
      continue;
    }

    if (currentWidth + pendingWidth + tokenWidth <= limit()) {
      current += pending + token;
      currentWidth += pendingWidth + tokenWidth;
      pending = "";
      pendingWidth = 0;
      continue;
    }

    if (current.trim().length > 0) flush(current);
    current = "";
    currentWidth = 0;
    pending = "";
    pendingWidth = 0;

    let rest = token;
    let restWidth = tokenWidth;
    while (restWidth > limit()) {
      const [head, tail] = splitAtWidth(rest, limit());
      if (tail.length === 0) break;
      flush(head);
      rest = tail;
      restWidth = measureTextCells(tail);
    }
    current = rest;
    currentWidth = restWidth;
  }

  if (current.length > 0 || lines.length === 0) flush(current);
  return lines;
}

/**
 * A sub-line still wider than the column (a double-width character in a
 * one-column cell) is marked with an ellipsis rather than cut to nothing.
 */
function markOverflow(line: string, maxWidth: number): string {
  if (measureTextCells(line) <= maxWidth) return line;
  return truncateWithEllipsis(line, maxWidth);
}

function fitLine(line: string, maxWidth: number, mode: WrapMode, prefix: string): string[] {
  switch (mode) {
    case "wrap":
      return wrapLine(line, maxWidth, prefix).map((sub) => markOverflow(sub, maxWidth));
    case "truncate": {
      const cut = truncateToWidth(line, maxWidth);
      return [measureTextCells(cut) === 0 ? truncateWithEllipsis(line, maxWidth) : cut];
    }
    case "truncateHard":
      return [truncateWithEllipsis(line, maxWidth)];
    case "truncateFront":
      return [truncateStart(line, maxWidth)];
    case "truncateMiddle":
      return [truncateMiddle(line, maxWidth)];
  }
}

/** A continuation prefix must leave at least one column for content. */
function assertPrefixFits(prefix: string, maxWidth: number): void {
  const prefixWidth = measureTextCells(prefix);
  if (prefixWidth >= maxWidth) {
    throw invalidConfig(
      `wrap: continuation prefix ${JSON.stringify(prefix)} is ${String(prefixWidth)} columns wide, leaving no room in width ${String(maxWidth)}`,
    );
  }
}

/**
 * Split `text` into sub-lines no wider than `maxWidth` columns.
 *
 * In "wrap" mode every sub-line after the first of an explicit line starts
 * with `continuationPrefix`; its width comes out of `maxWidth`. The result is
 * never empty: blank input yields `[""]`.
 */
export function wrapCellText(
  text: string,
  maxWidth: number,
  mode: WrapMode = "wrap",
  continuationPrefix = "",
): readonly string[] {
  if (!Number.isInteger(maxWidth) || maxWidth < 1) {
    throw invalidConfig(`wrap: maxWidth must be a positive integer (got ${String(maxWidth)})`);
  }
  if (!isWrapMode(mode)) {
    throw invalidConfig(`wrap: unknown wrap mode ${JSON.stringify(mode)}`);
  }

  // Checked only when a line actually wraps.
  const out: string[] = [];
  let prefixChecked = mode !== "wrap" || continuationPrefix.length === 0;
  for (const line of splitLines(text)) {
    if (measureTextCells(line) <= maxWidth) {
      out.push(line);
      continue;
    }
    if (!prefixChecked) {
      assertPrefixFits(continuationPrefix, maxWidth);
      prefixChecked = true;
    }
    out.push(...fitLine(line, maxWidth, mode, continuationPrefix));
  }
  return Object.freeze(out);
}
