/**
 * packages/core/src/text/ansi.ts — Terminal escape sequence scanning.
 *
 * Recognized sequences (all measure as 0 cells):
 *   - CSI: ESC [ params(0x30–0x3F)* intermediates(0x20–0x2F)* final(0x40–0x7E)
 *   - OSC: ESC ] ... terminated by BEL or ESC \
 *   - Fe:  ESC followed by one byte in 0x40–0x5F
 *
 * A sequence that is malformed or unterminated is not an escape: the bare ESC
 * is left in the text (a zero-width control) and the bytes after it are
 * ordinary characters.
 */

const ESC = 0x1b;
const BEL = 0x07;
const CSI_INTRODUCER = 0x5b; // [
const OSC_INTRODUCER = 0x5d; // ]
const ST_FINAL = 0x5c; // \

export type AnsiSegmentKind = "text" | "escape";

export type AnsiSegment = Readonly<{
  kind: AnsiSegmentKind;
  text: string;
  /** UTF-16 offset of the first code unit. */
  start: number;
  /** UTF-16 offset one past the last code unit. */
  end: number;
}>;

/**
 * Length in UTF-16 code units of the escape sequence starting at `off`, or 0
 * when no well-formed sequence starts there.
 */
export function escapeSequenceLength(text: string, off: number): number {
  if (text.charCodeAt(off) !== ESC) return 0;
  const next = text.charCodeAt(off + 1);
  if (Number.isNaN(next)) return 0;

  if (next === CSI_INTRODUCER) {
    let i = off + 2;
    while (i < text.length) {
      const c = text.charCodeAt(i);
      if (c >= 0x30 && c <= 0x3f) i++;
      else break;
    }
    while (i < text.length) {
      const c = text.charCodeAt(i);
      if (c >= 0x20 && c <= 0x2f) i++;
      else break;
    }
    const final = text.charCodeAt(i);
    if (final >= 0x40 && final <= 0x7e) return i + 1 - off;
    return 0;
  }

  if (next === OSC_INTRODUCER) {
    for (let i = off + 2; i < text.length; i++) {
      const c = text.charCodeAt(i);
      if (c === BEL) return i + 1 - off;
      if (c === ESC && text.charCodeAt(i + 1) === ST_FINAL) return i + 2 - off;
    }
    return 0;
  }

  if (next >= 0x40 && next <= 0x5f) return 2;
  return 0;
}

/** True when `text` contains at least one well-formed escape sequence. */
export function hasAnsi(text: string): boolean {
  let off = text.indexOf("\x1b");
  while (off !== -1) {
    if (escapeSequenceLength(text, off) > 0) return true;
    off = text.indexOf("\x1b", off + 1);
  }
  return false;
}

/**
 * Split `text` into alternating plain-text and escape segments, in order.
 * Concatenating every segment's `text` reproduces the input.
 */
export function scanAnsi(text: string): readonly AnsiSegment[] {
  const out: AnsiSegment[] = [];
  let runStart = 0;
  let off = text.indexOf("\x1b");

  while (off !== -1) {
    const len = escapeSequenceLength(text, off);
    if (len === 0) {
      off = text.indexOf("\x1b", off + 1);
      continue;
    }
    if (off > runStart) {
      out.push({ kind: "text", text: text.slice(runStart, off), start: runStart, end: off });
    }
    out.push({ kind: "escape", text: text.slice(off, off + len), start: off, end: off + len });
    runStart = off + len;
    off = text.indexOf("\x1b", runStart);
  }

  if (runStart < text.length) {
    out.push({ kind: "text", text: text.slice(runStart), start: runStart, end: text.length });
  }
  return Object.freeze(out);
}

/** Remove every well-formed escape sequence. */
export function stripAnsi(text: string): string {
  if (!text.includes("\x1b")) return text;
  let out = "";
  for (const seg of scanAnsi(text)) {
    if (seg.kind === "text") out += seg.text;
  }
  return out;
}
