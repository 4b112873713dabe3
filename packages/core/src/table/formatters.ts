/**
 * packages/core/src/table/formatters.ts — Ready-made cell formatters.
 */

const KB = 1024n;
const MB = KB * 1024n;
const GB = MB * 1024n;
const TB = GB * 1024n;

const INTEGER_TEXT_RE = /^\s*([-+]?)(\d+)\s*$/;

/** Exact integer value: numbers lose their fraction, strings keep every digit. */
function toInteger(value: unknown): bigint | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? BigInt(Math.trunc(value)) : null;
  }
  if (typeof value === "bigint") return value;
  if (typeof value === "string") {
    const match = INTEGER_TEXT_RE.exec(value);
    const digits = match?.[2];
    if (digits === undefined) return null;
    return match?.[1] === "-" ? -BigInt(digits) : BigInt(digits);
  }
  return null;
}

function scaled(size: bigint, unit: bigint): string {
  return (Number(size) / Number(unit)).toFixed(2);
}

/**
 * Human-readable byte count with two decimals: `"1.50 KB"`, `"512.00  B"`.
 * A unit steps up only once the value exceeds it, so 1024 stays in bytes.
 * Values that are not integers (or integer strings) format as "".
 */
export function formatBytes(value: unknown): string {
  const size = toInteger(value);
  if (size === null) return "";
  if (size > TB) return `${scaled(size, TB)} TB`;
  if (size > GB) return `${scaled(size, GB)} GB`;
  if (size > MB) return `${scaled(size, MB)} MB`;
  if (size > KB) return `${scaled(size, KB)} KB`;
  return `${Number(size).toFixed(2)}  B`;
}

/** Integer with comma thousands separators: `"1,234,567"`. */
export function formatCommas(value: unknown): string {
  const n = toInteger(value);
  if (n === null) return "";
  const digits = (n < 0n ? -n : n).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ",");
  return n < 0n ? `-${digits}` : digits;
}
