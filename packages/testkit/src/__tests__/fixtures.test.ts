import { assert, describe, test } from "../nodeTest.js";
import { readFixture, readTextFixture } from "../fixtures.js";

describe("testkit fixtures", () => {
  test("readTextFixture returns file contents with LF newlines", async () => {
    const text = await readTextFixture("tables/basic.txt");
    assert.equal(text.split("\n")[0], "╔════╤════╤════╤════╗");
    assert.equal(text.includes("\r"), false);
  });

  test("readFixture returns raw bytes", async () => {
    const bytes = await readFixture("tables/basic.txt");
    assert.ok(bytes.byteLength > 0);
    // "╔" encodes as E2 95 94
    assert.deepEqual(Array.from(bytes.subarray(0, 3)), [0xe2, 0x95, 0x94]);
  });

  test("readFixture rejects paths outside the fixtures root", async () => {
    await assert.rejects(readFixture("../package.json"), /escapes fixtures root/);
  });
});
