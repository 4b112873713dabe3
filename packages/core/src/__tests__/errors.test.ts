import { assert, describe, test } from "@gridtext/testkit";
import { GridTextError, invalidConfig, isGridTextError } from "../errors.js";

describe("GridTextError", () => {
  test("carries code, name and message", () => {
    const err = new GridTextError("GRID_UNSUPPORTED_SOURCE", "no rows");
    assert.equal(err.code, "GRID_UNSUPPORTED_SOURCE");
    assert.equal(err.name, "GridTextError");
    assert.equal(err.message, "no rows");
    assert.ok(err instanceof Error);
  });

  test("message defaults to the code", () => {
    assert.equal(new GridTextError("GRID_INVALID_CONFIG").message, "GRID_INVALID_CONFIG");
  });

  test("invalidConfig prefixes the detail", () => {
    const err = invalidConfig("width must be >= 1");
    assert.equal(err.code, "GRID_INVALID_CONFIG");
    assert.equal(err.message, "[gridtext] width must be >= 1");
  });

  test("isGridTextError narrows by optional code", () => {
    const err = invalidConfig("x");
    assert.equal(isGridTextError(err), true);
    assert.equal(isGridTextError(err, "GRID_INVALID_CONFIG"), true);
    assert.equal(isGridTextError(err, "GRID_UNSUPPORTED_SOURCE"), false);
    assert.equal(isGridTextError(new Error("plain")), false);
    assert.equal(isGridTextError("GRID_INVALID_CONFIG"), false);
  });
});
