/**
 * packages/core/src/errors.ts — Typed failures raised by gridtext.
 *
 * Formatter and row-tagger exceptions are never wrapped; they reach the caller
 * unmodified. Everything gridtext itself rejects is a GridTextError.
 */

/**
 * Deterministic error codes.
 *
 *   - GRID_INVALID_CONFIG: row/column count mismatch, widths that leave no room
 *     for content, out-of-range integers, unknown alignment or wrap-mode values
 *   - GRID_UNSUPPORTED_SOURCE: the adapter layer cannot turn the input into rows
 */
export type GridTextErrorCode = "GRID_INVALID_CONFIG" | "GRID_UNSUPPORTED_SOURCE";

export class GridTextError extends Error {
  override readonly name = "GridTextError";
  readonly code: GridTextErrorCode;

  constructor(code: GridTextErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GridTextError);
    }
  }
}

export function isGridTextError(value: unknown, code?: GridTextErrorCode): value is GridTextError {
  if (!(value instanceof GridTextError)) return false;
  return code === undefined || value.code === code;
}

/** Shorthand for the common configuration failure. */
export function invalidConfig(detail: string): GridTextError {
  return new GridTextError("GRID_INVALID_CONFIG", `[gridtext] ${detail}`);
}
