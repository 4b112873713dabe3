import { assert, describe, test } from "@gridtext/testkit";
import {
  measureTextCells,
  truncateMiddle,
  truncateStart,
  truncateToWidth,
  truncateWithEllipsis,
} from "../textMeasure.js";

const LONG = "Longer text that will trigger the column wrapping";

describe("truncation", () => {
  test("truncateToWidth cuts without a marker", () => {
    assert.equal(truncateToWidth(LONG, 20), "Longer text that wil");
    assert.equal(truncateToWidth("abc", 3), "abc");
    assert.equal(truncateToWidth("abc", 0), "");
  });

  test("truncateWithEllipsis replaces the last visible column", () => {
    assert.equal(truncateWithEllipsis(LONG, 20), "Longer text that wi…");
    assert.equal(truncateWithEllipsis("abc", 1), "…");
    assert.equal(truncateWithEllipsis("abc", 3), "abc");
  });

  test("truncateStart keeps the tail", () => {
    assert.equal(truncateStart(LONG, 20), "…the column wrapping");
    assert.equal(truncateStart("abcdef", 4), "…def");
  });

  test("truncateMiddle keeps head and tail", () => {
    assert.equal(truncateMiddle(LONG, 20), "Longer tex… wrapping");
    assert.equal(
      truncateMiddle("/home/user/documents/project/src/index.ts", 25),
      "/home/user/d…src/index.ts",
    );
    assert.equal(truncateMiddle("abcdef", 3), "ab…");
  });

  test("wide characters are never split", () => {
    assert.equal(truncateToWidth("中文字", 3), "中");
    assert.equal(truncateWithEllipsis("中文字", 4), "中…");
    assert.equal(truncateStart("中文字", 4), "…字");
    for (const width of [1, 2, 3, 4, 5]) {
      assert.ok(measureTextCells(truncateWithEllipsis("中文字", width)) <= width);
    }
  });

  test("emoji clusters stay whole", () => {
    const family = "\u{1F468}‍\u{1F469}‍\u{1F467}";
    assert.equal(truncateWithEllipsis(`${family}Z`, 2), "…");
    assert.equal(truncateToWidth(`${family}Z`, 2), family);
  });

  test("escape sequences are kept whole and cost nothing", () => {
    assert.equal(truncateToWidth("\x1b[31mabcdef\x1b[0m", 3), "\x1b[31mabc\x1b[0m");
    assert.equal(truncateWithEllipsis("\x1b[31mabcdef\x1b[0m", 3), "\x1b[31mab\x1b[0m…");
  });

  test("escapes in the removed text survive the cut", () => {
    assert.equal(truncateToWidth("\x1b[31mred\x1b[0m tail", 2), "\x1b[31mre\x1b[0m");
    assert.equal(truncateStart("\x1b[31mhead\x1b[0mtail", 3), "\x1b[31m\x1b[0m…il");
    assert.equal(
      truncateMiddle("ab\x1b[1mcdefgh\x1b[22mijkl", 5),
      "ab\x1b[1m\x1b[22m…kl",
    );
    assert.equal(truncateWithEllipsis("\x1b[31mredred\x1b[0m", 1), "\x1b[31m\x1b[0m…");
  });
});
