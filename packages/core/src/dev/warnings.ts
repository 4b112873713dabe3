/**
 * packages/core/src/dev/warnings.ts — Dev-mode warnings for recoverable input.
 *
 * gridtext has no logger. Normalizations that change the caller's data (short
 * rows padded, for example) are reported through an injected `warn` callback,
 * once per key per table, and only outside production.
 */

export type WarnFn = (message: string) => void;

export type WarningTopic = "adapter" | "layout" | "style";

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

function consoleWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

export type DevWarnings = Readonly<{
  /** Emit `[gridtext][topic] detail` unless `key` was already reported. */
  warn: (topic: WarningTopic, key: string, detail: string) => void;
  /** Keys reported so far, in emission order. */
  reported: () => readonly string[];
}>;

export type DevWarningsOptions = Readonly<{
  warn?: WarnFn;
  devMode?: boolean;
}>;

export function createDevWarnings(opts: DevWarningsOptions = {}): DevWarnings {
  const sink = opts.warn ?? consoleWarn;
  const devMode = opts.devMode ?? DEV_MODE;
  const seen = new Set<string>();

  return Object.freeze({
    warn(topic: WarningTopic, key: string, detail: string): void {
      if (!devMode) return;
      if (seen.has(key)) return;
      seen.add(key);
      sink(`[gridtext][${topic}] ${detail}`);
    },
    reported(): readonly string[] {
      return Object.freeze([...seen]);
    },
  });
}
