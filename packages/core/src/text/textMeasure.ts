/**
 * packages/core/src/text/textMeasure.ts — Display width of cell text.
 *
 * Computes the width of strings in terminal columns. Grapheme clusters come
 * from `Intl.Segmenter`; East Asian Width comes from `get-east-asian-width`.
 *
 * Width rules:
 *   - ASCII printable: 1 cell
 *   - Controls, escape sequences: 0 cells
 *   - Nonspacing/enclosing marks, format characters, variation selectors: 0
 *   - East Asian Wide/Fullwidth: 2 cells
 *   - Emoji sequences: 2 cells total
 *   - A cluster is as wide as its widest code point
 *
 * Tabs are not expanded here; see `expandTabs`.
 */

import { eastAsianWidth } from "get-east-asian-width";
import { invalidConfig } from "../errors.js";
import { scanAnsi } from "./ansi.js";

export const ELLIPSIS = "…";

/* ========== Text Measurement Cache ========== */

/** Maximum number of cached text measurements before eviction. */
const TEXT_CACHE_MAX_SIZE = 10000;
/** Maximum string length (UTF-16 code units) eligible for caching. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();

function evictOldestTextWidthCacheEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

/** Clear the text measurement cache. */
export function clearTextMeasureCache(): void {
  textWidthCache.clear();
}

export function getTextMeasureCacheSize(): number {
  return textWidthCache.size;
}

/* ========== Code point classification ========== */

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

const ZERO_WIDTH_RE = /^[\p{Mn}\p{Me}\p{Cf}]$/u;
const EMOJI_PRESENTATION_RE = /^\p{Emoji_Presentation}$/u;
const EXTENDED_PICTOGRAPHIC_RE = /^\p{Extended_Pictographic}$/u;

const ZERO_WIDTH_JOINER = 0x200d;
const VARIATION_SELECTOR_15 = 0xfe0e;
const VARIATION_SELECTOR_16 = 0xfe0f;
const COMBINING_ENCLOSING_KEYCAP = 0x20e3;

type KeycapState = "start" | "after-base" | "after-base-vs16" | "matched" | "invalid";

function isKeycapBase(scalar: number): boolean {
  if (scalar === 0x23 || scalar === 0x2a) return true;
  return scalar >= 0x30 && scalar <= 0x39;
}

function keycapNext(state: KeycapState, scalar: number): KeycapState {
  if (state === "start") return isKeycapBase(scalar) ? "after-base" : "invalid";
  if (state === "after-base") {
    if (scalar === VARIATION_SELECTOR_16) return "after-base-vs16";
    if (scalar === COMBINING_ENCLOSING_KEYCAP) return "matched";
    return "invalid";
  }
  if (state === "after-base-vs16") {
    if (scalar === COMBINING_ENCLOSING_KEYCAP) return "matched";
    return "invalid";
  }
  return "invalid";
}

function isControl(scalar: number): boolean {
  return scalar < 0x20 || (scalar >= 0x7f && scalar < 0xa0);
}

/**
 * Compute display width of a single code point.
 * Returns 0 for controls/combining, 1 for normal, 2 for wide.
 */
function widthCodepoint(scalar: number): 0 | 1 | 2 {
  if (isControl(scalar)) return 0;
  // Lone surrogates render as U+FFFD.
  if (scalar >= 0xd800 && scalar <= 0xdfff) return 1;
  // Hangul medial vowels and final consonants join the preceding syllable.
  if (scalar >= 0x1160 && scalar <= 0x11ff) return 0;
  if (scalar >= 0xe0100 && scalar <= 0xe01ef) return 0;
  if (ZERO_WIDTH_RE.test(String.fromCodePoint(scalar))) return 0;
  return eastAsianWidth(scalar) === 2 ? 2 : 1;
}

/** Width of one grapheme cluster. */
function clusterWidth(cluster: string): 0 | 1 | 2 {
  let widthText: 0 | 1 | 2 = 0;
  let hasEmojiPresentation = false;
  let hasExtendedPictographic = false;
  let hasZwj = false;
  let hasVs15 = false;
  let hasVs16 = false;
  let keycapState: KeycapState = "start";

  for (const ch of cluster) {
    const scalar = ch.codePointAt(0) ?? 0xfffd;
    if (EMOJI_PRESENTATION_RE.test(ch)) hasEmojiPresentation = true;
    if (EXTENDED_PICTOGRAPHIC_RE.test(ch)) hasExtendedPictographic = true;
    if (scalar === ZERO_WIDTH_JOINER) hasZwj = true;
    if (scalar === VARIATION_SELECTOR_15) hasVs15 = true;
    if (scalar === VARIATION_SELECTOR_16) hasVs16 = true;
    keycapState = keycapNext(keycapState, scalar);

    const w = widthCodepoint(scalar);
    if (w > widthText) widthText = w;
  }

  const keycapEmoji = keycapState === "matched";
  let hasEmoji = keycapEmoji || hasEmojiPresentation;
  if (hasExtendedPictographic && (hasVs16 || hasZwj)) hasEmoji = true;

  // FE0E (text presentation) suppresses emoji width for text-default pictographs.
  if (hasVs15 && !hasVs16 && !hasEmojiPresentation && !keycapEmoji) {
    hasEmoji = false;
  }

  return hasEmoji ? 2 : widthText;
}

/* ========== Measurement ========== */

function measureTextCellsAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    // ESC may start a zero-width sequence; take the slow path.
    if (code >= 0x80 || code === 0x1b) return null;
    if (code < 0x20 || code === 0x7f) continue;
    total++;
  }
  return total;
}

type GraphemeVisitor = (start: number, end: number, width: number) => void;

/**
 * Walk `text` one grapheme cluster at a time. Escape sequences are reported as
 * single zero-width units so that slicing never cuts through one.
 */
function scanGraphemeClusters(text: string, onCluster?: GraphemeVisitor): number {
  let total = 0;
  for (const seg of scanAnsi(text)) {
    if (seg.kind === "escape") {
      onCluster?.(seg.start, seg.end, 0);
      continue;
    }
    for (const { segment, index } of segmenter.segment(seg.text)) {
      const width = clusterWidth(segment);
      const start = seg.start + index;
      total += width;
      onCluster?.(start, start + segment.length, width);
    }
  }
  return total;
}

/**
 * Display width of `text` in terminal columns.
 *
 * Never throws. Results for short strings are cached.
 */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const width = measureTextCellsAsciiOnly(text) ?? scanGraphemeClusters(text);

  if (cacheable) {
    if (!textWidthCache.has(text) && textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      evictOldestTextWidthCacheEntry();
    }
    textWidthCache.set(text, width);
  }

  return width;
}

/** Width of the widest explicit line of `text`. */
export function measureWidestLine(text: string): number {
  let widest = 0;
  for (const line of splitLines(text)) {
    const w = measureTextCells(line);
    if (w > widest) widest = w;
  }
  return widest;
}

/** Split on `\r\n`, `\r` and `\n`. Always returns at least one line. */
export function splitLines(text: string): readonly string[] {
  return text.split(/\r\n|\r|\n/);
}

/**
 * Replace tabs with spaces up to the next multiple of `tabWidth` columns.
 * Columns restart after every line break.
 */
export function expandTabs(text: string, tabWidth = 4): string {
  if (!Number.isInteger(tabWidth) || tabWidth < 1) {
    throw invalidConfig(`expandTabs: tabWidth must be a positive integer (got ${String(tabWidth)})`);
  }
  if (!text.includes("\t")) return text;

  let out = "";
  let col = 0;
  let runStart = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\t") {
      const run = text.slice(runStart, i);
      col += measureTextCells(run);
      const pad = tabWidth - (col % tabWidth);
      out += run + " ".repeat(pad);
      col += pad;
      runStart = i + 1;
    } else if (ch === "\n" || ch === "\r") {
      out += text.slice(runStart, i + 1);
      col = 0;
      runStart = i + 1;
    }
  }
  return out + text.slice(runStart);
}

/* ========== Grapheme-safe slicing ========== */

export type GraphemeSlices = Readonly<{
  starts: readonly number[];
  ends: readonly number[];
  /** prefixWidths[k] is the width of the first k clusters. */
  prefixWidths: readonly number[];
}>;

export function collectGraphemeSlices(text: string): GraphemeSlices {
  const starts: number[] = [];
  const ends: number[] = [];
  const prefixWidths: number[] = [0];

  scanGraphemeClusters(text, (start, end, width) => {
    starts.push(start);
    ends.push(end);
    const prev = prefixWidths[prefixWidths.length - 1] ?? 0;
    prefixWidths.push(prev + width);
  });

  return { starts, ends, prefixWidths };
}

function maxPrefixClustersWithinWidth(prefixWidths: readonly number[], maxWidth: number): number {
  let low = 0;
  let high = prefixWidths.length - 1;
  let best = 0;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const width = prefixWidths[mid] ?? Number.POSITIVE_INFINITY;
    if (width <= maxWidth) {
      best = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return best;
}

function maxSuffixClustersWithinWidth(prefixWidths: readonly number[], maxWidth: number): number {
  const clusterCount = prefixWidths.length - 1;
  const totalWidth = prefixWidths[clusterCount] ?? 0;

  let low = 0;
  let high = clusterCount;
  let best = 0;

  while (low <= high) {
    const mid = Math.floor((low + high) / 2);
    const left = prefixWidths[clusterCount - mid] ?? 0;
    const width = totalWidth - left;
    if (width <= maxWidth) {
      best = mid;
      low = mid + 1;
    } else {
      high = mid - 1;
    }
  }

  return best;
}

/**
 * Split `text` after the longest grapheme prefix no wider than `maxWidth`.
 *
 * At least one cluster is always taken, so a cluster wider than `maxWidth`
 * still makes progress.
 */
export function splitAtWidth(text: string, maxWidth: number): readonly [string, string] {
  const { starts, ends, prefixWidths } = collectGraphemeSlices(text);
  if (starts.length === 0) return [text, ""];
  let clusters = maxPrefixClustersWithinWidth(prefixWidths, maxWidth);
  // Take one visible cluster even when it alone is wider than maxWidth.
  while (clusters < starts.length && (prefixWidths[clusters] ?? 0) === 0) clusters++;
  const end = ends[clusters - 1] ?? text.length;
  return [text.slice(0, end), text.slice(end)];
}

/**
 * Escape sequences of `text`, concatenated in order. Cuts append the escapes
 * of the removed part so that an SGR reset is never lost with it.
 */
export function escapesOf(text: string): string {
  if (!text.includes("\x1b")) return "";
  let out = "";
  for (const seg of scanAnsi(text)) {
    if (seg.kind === "escape") out += seg.text;
  }
  return out;
}

/** Cut `text` to at most `maxWidth` columns, without a marker. */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth <= 0) return escapesOf(text);
  const { ends, prefixWidths } = collectGraphemeSlices(text);
  const clusters = maxPrefixClustersWithinWidth(prefixWidths, maxWidth);
  const end = clusters === 0 ? 0 : (ends[clusters - 1] ?? 0);
  return text.slice(0, end) + escapesOf(text.slice(end));
}

/**
 * Truncate text to fit within maxWidth cells, appending ellipsis if needed.
 * Returns original text if it fits.
 */
export function truncateWithEllipsis(text: string, maxWidth: number): string {
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth <= 0) return escapesOf(text);
  if (maxWidth === 1) return escapesOf(text) + ELLIPSIS;

  const { ends, prefixWidths } = collectGraphemeSlices(text);
  const bestClusters = maxPrefixClustersWithinWidth(prefixWidths, maxWidth - 1);
  const bestEnd = bestClusters === 0 ? 0 : (ends[bestClusters - 1] ?? 0);
  return `${text.slice(0, bestEnd)}${escapesOf(text.slice(bestEnd))}${ELLIPSIS}`;
}

/** Keep the tail of `text`, marking the removed head with an ellipsis. */
export function truncateStart(text: string, maxWidth: number): string {
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth <= 0) return escapesOf(text);
  if (maxWidth === 1) return escapesOf(text) + ELLIPSIS;

  const { starts, prefixWidths } = collectGraphemeSlices(text);
  const tailClusters = maxSuffixClustersWithinWidth(prefixWidths, maxWidth - 1);
  const tailStart =
    tailClusters === 0 ? text.length : (starts[starts.length - tailClusters] ?? text.length);
  return `${escapesOf(text.slice(0, tailStart))}${ELLIPSIS}${text.slice(tailStart)}`;
}

/**
 * Truncate text in the middle, preserving start and end.
 *
 * @example
 * ```typescript
 * truncateMiddle("/home/user/documents/project/src/index.ts", 25)
 * // "/home/user/d…src/index.ts"
 * ```
 */
export function truncateMiddle(text: string, maxWidth: number): string {
  if (measureTextCells(text) <= maxWidth) return text;
  if (maxWidth <= 0) return "";
  if (maxWidth <= 3) return truncateWithEllipsis(text, maxWidth);

  // Reserve 1 cell for ellipsis
  const available = maxWidth - 1;
  const startLen = Math.ceil(available / 2);
  const endLen = Math.floor(available / 2);

  const { starts, ends, prefixWidths } = collectGraphemeSlices(text);
  const clusterCount = starts.length;
  const startClusters = maxPrefixClustersWithinWidth(prefixWidths, startLen);
  const endClusters = maxSuffixClustersWithinWidth(prefixWidths, endLen);
  const endStartCluster = clusterCount - endClusters;

  if (startClusters >= endStartCluster) {
    return truncateWithEllipsis(text, maxWidth);
  }

  const startEnd = startClusters === 0 ? 0 : (ends[startClusters - 1] ?? 0);
  const endStart = endClusters === 0 ? text.length : (starts[endStartCluster] ?? text.length);
  return `${text.slice(0, startEnd)}${escapesOf(text.slice(startEnd, endStart))}${ELLIPSIS}${text.slice(endStart)}`;
}
