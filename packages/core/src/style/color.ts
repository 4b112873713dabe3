/**
 * packages/core/src/style/color.ts — Colors and SGR escape emission.
 *
 * Colors are packed 24-bit RGB values. How they reach the terminal depends on
 * a `ColorSupport` level: 0 emits nothing, 1 maps to the 16-color palette,
 * 2 to the 256-color cube/gray ramp, 3 writes truecolor.
 */

/** Packed RGB color (0x00RRGGBB). */
export type Rgb24 = number;

export type ColorLevel = 0 | 1 | 2 | 3;

export type ColorSupport = Readonly<{
  level: ColorLevel;
  noColor: boolean;
}>;

export const NO_COLOR_SUPPORT: ColorSupport = Object.freeze({ level: 0, noColor: true });
export const TRUECOLOR_SUPPORT: ColorSupport = Object.freeze({ level: 3, noColor: false });

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}

export function rgbR(value: Rgb24): number {
  return (value >>> 16) & 0xff;
}

export function rgbG(value: Rgb24): number {
  return (value >>> 8) & 0xff;
}

export function rgbB(value: Rgb24): number {
  return value & 0xff;
}

/** Named colors used by the built-in grid styles and examples. */
export const TABLE_COLORS = Object.freeze({
  white: rgb(255, 255, 255),
  yellow: rgb(255, 255, 0),
  red: rgb(255, 0, 0),
  green: rgb(135, 255, 95),
  blue: rgb(0, 95, 255),
  gray: rgb(128, 128, 128),
});

const ANSI16_PALETTE: readonly (readonly [number, number, number])[] = [
  [0, 0, 0],
  [205, 0, 0],
  [0, 205, 0],
  [205, 205, 0],
  [0, 0, 238],
  [205, 0, 205],
  [0, 205, 205],
  [229, 229, 229],
  [127, 127, 127],
  [255, 0, 0],
  [0, 255, 0],
  [255, 255, 0],
  [92, 92, 255],
  [255, 0, 255],
  [0, 255, 255],
  [255, 255, 255],
];

function colorDistanceSq(a: Rgb24, b: readonly [number, number, number]): number {
  const dr = rgbR(a) - b[0];
  const dg = rgbG(a) - b[1];
  const db = rgbB(a) - b[2];
  return dr * dr + dg * dg + db * db;
}

/** Nearest 16-color SGR parameter (30–37/90–97, or 40–47/100–107). */
export function toAnsi16Code(color: Rgb24, background: boolean): number {
  let bestIndex = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  ANSI16_PALETTE.forEach((candidate, index) => {
    const distance = colorDistanceSq(color, candidate);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIndex = index;
    }
  });

  if (bestIndex < 8) {
    return (background ? 40 : 30) + bestIndex;
  }
  return (background ? 100 : 90) + (bestIndex - 8);
}

function rgbChannelToCubeLevel(channel: number): number {
  if (channel < 48) return 0;
  if (channel < 114) return 1;
  return Math.min(5, Math.floor((channel - 35) / 40));
}

/** Nearest xterm-256 index, choosing between the 6x6x6 cube and the gray ramp. */
export function toAnsi256Code(color: Rgb24): number {
  const r = rgbR(color);
  const g = rgbG(color);
  const b = rgbB(color);
  const rLevel = rgbChannelToCubeLevel(r);
  const gLevel = rgbChannelToCubeLevel(g);
  const bLevel = rgbChannelToCubeLevel(b);
  const cubeCode = 16 + 36 * rLevel + 6 * gLevel + bLevel;

  const cubeColor = rgb(
    rLevel === 0 ? 0 : 55 + 40 * rLevel,
    gLevel === 0 ? 0 : 55 + 40 * gLevel,
    bLevel === 0 ? 0 : 55 + 40 * bLevel,
  );

  const avg = Math.round((r + g + b) / 3);
  const grayLevel = Math.max(0, Math.min(23, Math.round((avg - 8) / 10)));
  const grayCode = 232 + grayLevel;
  const grayValue = 8 + 10 * grayLevel;
  const grayColor = rgb(grayValue, grayValue, grayValue);

  const cubeDistance = colorDistanceSq(color, [rgbR(cubeColor), rgbG(cubeColor), rgbB(cubeColor)]);
  const grayDistance = colorDistanceSq(color, [rgbR(grayColor), rgbG(grayColor), rgbB(grayColor)]);
  return grayDistance < cubeDistance ? grayCode : cubeCode;
}

function colorParams(color: Rgb24, background: boolean, level: ColorLevel): string {
  if (level >= 3) {
    return `${background ? 48 : 38};2;${rgbR(color)};${rgbG(color)};${rgbB(color)}`;
  }
  if (level === 2) {
    return `${background ? 48 : 38};5;${toAnsi256Code(color)}`;
  }
  return String(toAnsi16Code(color, background));
}

/** Text attributes the renderer can apply to a run of cells. */
export type TextStyle = Readonly<{
  fg?: Rgb24;
  bg?: Rgb24;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
}>;

/**
 * SGR sequence turning `style` on, or "" when color is off or the style sets
 * nothing.
 */
export function styleOpen(style: TextStyle | undefined, support: ColorSupport): string {
  if (!style || support.level === 0) return "";
  const codes: string[] = [];
  if (style.bold) codes.push("1");
  if (style.dim) codes.push("2");
  if (style.italic) codes.push("3");
  if (style.underline) codes.push("4");
  if (style.fg !== undefined) codes.push(colorParams(style.fg, false, support.level));
  if (style.bg !== undefined) codes.push(colorParams(style.bg, true, support.level));
  return codes.length === 0 ? "" : `\u001b[${codes.join(";")}m`;
}

/**
 * SGR sequence undoing exactly what `styleOpen` turned on, leaving other
 * attributes (an enclosing row background, say) in place.
 */
export function styleClose(style: TextStyle | undefined, support: ColorSupport): string {
  if (!style || support.level === 0) return "";
  const codes: string[] = [];
  if (style.bold || style.dim) codes.push("22");
  if (style.italic) codes.push("23");
  if (style.underline) codes.push("24");
  if (style.fg !== undefined) codes.push("39");
  if (style.bg !== undefined) codes.push("49");
  return codes.length === 0 ? "" : `\u001b[${codes.join(";")}m`;
}

/** Wrap `text` in the style's open/close sequences. */
export function paint(text: string, style: TextStyle | undefined, support: ColorSupport): string {
  const open = styleOpen(style, support);
  if (open.length === 0) return text;
  return `${open}${text}${styleClose(style, support)}`;
}

export function isColorLevel(value: unknown): value is ColorLevel {
  return value === 0 || value === 1 || value === 2 || value === 3;
}
