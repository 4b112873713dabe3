/**
 * packages/node/src/colorSupport.ts — Color level for a Node output stream.
 *
 * Precedence:
 *   1. NO_COLOR (any non-empty value) disables color
 *   2. FORCE_COLOR: "true" → 1, "false" → 0, integers clamped to 0..3
 *   3. a non-TTY stream gets no color
 *   4. the stream's getColorDepth(): 24+ bits → 3, 8+ → 2, 2+ → 1
 */

import { type ColorLevel, type ColorSupport, NO_COLOR_SUPPORT, isColorLevel } from "@gridtext/core";

export type ColorStream = Readonly<{
  isTTY?: boolean;
  getColorDepth?: (env?: Readonly<Record<string, string | undefined>>) => number;
}>;

export type ColorEnv = Readonly<Record<string, string | undefined>>;

function envText(env: ColorEnv, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined) return undefined;
  const value = raw.trim();
  return value.length > 0 ? value : undefined;
}

export function parseForceColorValue(value: string | undefined): ColorLevel | undefined {
  if (value === undefined || value.length === 0) return undefined;
  if (value === "true") return 1;
  if (value === "false") return 0;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) return undefined;
  const level = Math.max(0, Math.min(3, parsed));
  return isColorLevel(level) ? level : undefined;
}

function supportAt(level: ColorLevel): ColorSupport {
  return level === 0 ? NO_COLOR_SUPPORT : { level, noColor: false };
}

function levelFromDepth(depth: number): ColorLevel {
  if (depth >= 24) return 3;
  if (depth >= 8) return 2;
  if (depth >= 2) return 1;
  return 0;
}

export function colorSupportFromNodeEnv(
  stream: ColorStream,
  env: ColorEnv = process.env,
): ColorSupport {
  if (envText(env, "NO_COLOR") !== undefined) return NO_COLOR_SUPPORT;

  const forced = parseForceColorValue(envText(env, "FORCE_COLOR"));
  if (forced !== undefined) return supportAt(forced);

  if (stream.isTTY !== true) return NO_COLOR_SUPPORT;

  const depth = stream.getColorDepth?.(env);
  if (typeof depth !== "number" || !Number.isFinite(depth)) return supportAt(1);
  return supportAt(levelFromDepth(depth));
}
