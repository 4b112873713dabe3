export { readFixture, readTextFixture } from "./fixtures.js";
export { assert, describe, test } from "./nodeTest.js";
