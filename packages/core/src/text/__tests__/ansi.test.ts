import { assert, describe, test } from "@gridtext/testkit";
import { escapeSequenceLength, hasAnsi, scanAnsi, stripAnsi } from "../ansi.js";

describe("escapeSequenceLength", () => {
  test("CSI with params and final byte", () => {
    assert.equal(escapeSequenceLength("\x1b[38;5;196m", 0), 11);
    assert.equal(escapeSequenceLength("x\x1b[0m", 1), 4);
  });

  test("OSC terminated by BEL or ST", () => {
    assert.equal(escapeSequenceLength("\x1b]0;t\x07", 0), 6);
    assert.equal(escapeSequenceLength("\x1b]0;t\x1b\\", 0), 7);
  });

  test("two-byte Fe escape", () => {
    assert.equal(escapeSequenceLength("\x1bM", 0), 2);
  });

  test("malformed or unterminated sequences are not escapes", () => {
    assert.equal(escapeSequenceLength("\x1b[31", 0), 0);
    assert.equal(escapeSequenceLength("\x1b]0;title", 0), 0);
    assert.equal(escapeSequenceLength("\x1b", 0), 0);
    assert.equal(escapeSequenceLength("\x1ba", 0), 0);
    assert.equal(escapeSequenceLength("abc", 0), 0);
  });
});

describe("scanAnsi", () => {
  test("splits text and escapes in order", () => {
    const segs = scanAnsi("a\x1b[1mb\x1b[22m");
    assert.deepEqual(
      segs.map((s) => [s.kind, s.text, s.start, s.end]),
      [
        ["text", "a", 0, 1],
        ["escape", "\x1b[1m", 1, 5],
        ["text", "b", 5, 6],
        ["escape", "\x1b[22m", 6, 11],
      ],
    );
  });

  test("keeps a bare ESC inside text", () => {
    const segs = scanAnsi("a\x1b[31");
    assert.equal(segs.length, 1);
    assert.equal(segs[0]?.kind, "text");
    assert.equal(segs[0]?.text, "a\x1b[31");
  });

  test("empty input has no segments", () => {
    assert.deepEqual(scanAnsi(""), []);
  });
});

describe("stripAnsi / hasAnsi", () => {
  test("removes well-formed sequences only", () => {
    assert.equal(stripAnsi("\x1b[31mred\x1b[0m"), "red");
    assert.equal(stripAnsi("\x1b]8;;http://example.test\x07link\x1b]8;;\x07"), "link");
    assert.equal(stripAnsi("\x1b[31"), "\x1b[31");
    assert.equal(stripAnsi("plain"), "plain");
  });

  test("hasAnsi ignores malformed sequences", () => {
    assert.equal(hasAnsi("\x1b[0m"), true);
    assert.equal(hasAnsi("\x1b[31"), false);
    assert.equal(hasAnsi("\x1b\x1b[1m"), true);
    assert.equal(hasAnsi("plain"), false);
  });
});
