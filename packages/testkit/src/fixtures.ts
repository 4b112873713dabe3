import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

/** Repository-level fixtures directory (`<repo>/fixtures`). */
const FIXTURES_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../fixtures");

/**
 * Read a fixture file as bytes.
 *
 * `rel` is resolved against `<repo>/fixtures` and may not escape it.
 */
export async function readFixture(rel: string): Promise<Uint8Array> {
  const full = path.resolve(FIXTURES_ROOT, rel);
  if (!full.startsWith(FIXTURES_ROOT + path.sep)) {
    throw new Error(`readFixture: path escapes fixtures root: ${rel}`);
  }
  const bytes = await readFile(full);
  return new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Read a UTF-8 text fixture with CRLF normalized to LF. */
export async function readTextFixture(rel: string): Promise<string> {
  const bytes = await readFixture(rel);
  return new TextDecoder().decode(bytes).replace(/\r\n/g, "\n");
}
