import { Color, MathUtils } from "three";
import { CONTINUOUS_LOW, CONTINUOUS_HIGH } from "../constants";

/** A colour stop: position in [0, 1] and a 0xRRGGBB colour. */
export type ColorStop = readonly [number, number];

/** Default continuous scale: dark navy -> light blue. */
export const CONTINUOUS_STOPS: readonly ColorStop[] = [
  [0, CONTINUOUS_LOW],
  [1, CONTINUOUS_HIGH],
];

/** Maps t in [0, 1] to a 0xRRGGBB colour by linear interpolation between stops. */
export function gradientColor(t: number, stops: readonly ColorStop[] = CONTINUOUS_STOPS): number {
  if (stops.length === 0) throw new RangeError("gradientColor: at least one stop is required");
  const frac = MathUtils.clamp(Number.isFinite(t) ? t : 0, 0, 1);
  // Find the two surrounding stops
  let lo = stops[0];
  let hi = stops[stops.length - 1];
  if (frac <= lo[0]) return lo[1];
  if (frac >= hi[0]) return hi[1];
  for (let i = 1; i < stops.length; i++) {
    if (frac <= stops[i][0]) {
      lo = stops[i - 1];
      hi = stops[i];
      break;
    }
  }
  const span = hi[0] - lo[0];
  const s = span > 0 ? (frac - lo[0]) / span : 0;
  const [r0, g0, b0] = intToRGB(lo[1]);
  const [r1, g1, b1] = intToRGB(hi[1]);
  return rgbToInt(
    Math.round(MathUtils.lerp(r0, r1, s)),
    Math.round(MathUtils.lerp(g0, g1, s)),
    Math.round(MathUtils.lerp(b0, b1, s)),
  );
}

/** Convert a 0xRRGGBB integer to [r, g, b] in 0..255. */
export function intToRGB(c: number): [number, number, number] {
  // eslint-disable-next-line no-bitwise
  return [(c >> 16) & 0xff, (c >> 8) & 0xff, c & 0xff];
}

/** Pack channels in 0..255 (clamped and rounded) into 0xRRGGBB. */
export function rgbToInt(r: number, g: number, b: number): number {
  const ch = (v: number) => Math.round(MathUtils.clamp(v, 0, 255));
  return ch(r) * 65536 + ch(g) * 256 + ch(b);
}

/** Pack channels in [0, 1] into 0xRRGGBB. */
export function unitRGBToInt(r: number, g: number, b: number): number {
  return rgbToInt(r * 255, g * 255, b * 255);
}

export function toCssHex(c: number): string {
  return "#" + c.toString(16).padStart(6, "0");
}

/** Parses a CSS colour ("white", "#1e90ff", "rgb(...)") into 0xRRGGBB. */
export function parseColor(css: string): number {
  // setStyle leaves the colour untouched when it cannot parse the input
  const color = new Color(-1, -1, -1);
  color.setStyle(css);
  if (color.r < 0) throw new RangeError(`parseColor: unrecognised colour "${css}"`);
  return color.getHex();
}

/** 1 / (1 + e^-p). */
export function logistic(p: number): number {
  return 1 / (1 + Math.exp(-p));
}

export interface SinusoidParams {
  a: number;
  b: number;
  c: number;
  d: number;
}

/**
 * Colour from position: coordinates are divided by 4, then
 * r = ½(sin(a·y) + 1), g = ½(cos(b·x) + 1), b = ½(sin(c·x - d·y) + 1).
 */
export function sinusoidColor({ a, b, c, d }: SinusoidParams): (x: number, y: number) => number {
  return (x, y) => {
    const sx = x / 4;
    const sy = y / 4;
    return unitRGBToInt(
      0.5 * (Math.sin(a * sy) + 1),
      0.5 * (Math.cos(b * sx) + 1),
      0.5 * (Math.sin(c * sx - d * sy) + 1),
    );
  };
}
