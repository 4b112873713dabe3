import { assert, describe, test } from "@gridtext/testkit";
import { alignLineToWidth, alignLinesVertically, isHAlign, isVAlign } from "../align.js";

describe("alignLineToWidth", () => {
  test("left, right and center", () => {
    assert.equal(alignLineToWidth("ab", 5, "left"), "ab   ");
    assert.equal(alignLineToWidth("ab", 5, "right"), "   ab");
    assert.equal(alignLineToWidth("ab", 5, "center"), " ab  ");
    assert.equal(alignLineToWidth("ab", 6, "center"), "  ab  ");
  });

  test("pads by display width", () => {
    assert.equal(alignLineToWidth("中", 4, "right"), "  中");
    assert.equal(alignLineToWidth("\x1b[1mA\x1b[22m", 3, "left"), "\x1b[1mA\x1b[22m  ");
  });

  test("custom pad character", () => {
    assert.equal(alignLineToWidth("7", 3, "right", "0"), "007");
    assert.throws(() => alignLineToWidth("7", 3, "right", "00"), /padChar must be one column wide/);
  });

  test("cuts text wider than the box", () => {
    assert.equal(alignLineToWidth("abcdef", 4, "left"), "abcd");
    assert.equal(alignLineToWidth("中文", 3, "left"), "中 ");
    assert.equal(alignLineToWidth("中文", 1, "left"), "…");
  });
});

describe("alignLinesVertically", () => {
  test("top pads below, bottom above, middle splits", () => {
    assert.deepEqual(alignLinesVertically(["x"], 3, "top"), ["x", "", ""]);
    assert.deepEqual(alignLinesVertically(["x"], 3, "bottom"), ["", "", "x"]);
    assert.deepEqual(alignLinesVertically(["x"], 3, "middle"), ["", "x", ""]);
    assert.deepEqual(alignLinesVertically(["x"], 4, "middle"), ["", "x", "", ""]);
  });

  test("already tall enough is unchanged", () => {
    assert.deepEqual(alignLinesVertically(["a", "b"], 2, "bottom"), ["a", "b"]);
    assert.deepEqual(alignLinesVertically(["a", "b", "c"], 2, "top"), ["a", "b", "c"]);
  });
});

describe("alignment guards", () => {
  test("recognize valid values only", () => {
    assert.equal(isHAlign("center"), true);
    assert.equal(isHAlign("middle"), false);
    assert.equal(isVAlign("middle"), true);
    assert.equal(isVAlign("left"), false);
    assert.equal(isVAlign(undefined), false);
  });
});
