import { SVG_PRECISION } from "../constants";
import { toCssHex } from "../utils/color-utils";

/** Shortest decimal form of `n` at SVG_PRECISION places ("12.5", "3", never "-0"). */
export function fmt(n: number): string {
  return String(Number(n.toFixed(SVG_PRECISION)) + 0);
}

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export type AttrValue = string | number | undefined;

/**
 * Serializes an element. Numbers go through fmt; undefined attributes are left out.
 * `children` is inserted as-is.
 */
export function el(name: string, attrs: Record<string, AttrValue>, children?: string): string {
  let out = `<${name}`;
  for (const [key, value] of Object.entries(attrs)) {
    if (value === undefined) continue;
    const text = typeof value === "number" ? fmt(value) : escapeXml(value);
    out += ` ${key}="${text}"`;
  }
  return children === undefined ? `${out}/>` : `${out}>${children}</${name}>`;
}

export function color(c: number): string {
  return toCssHex(c);
}

/** Opacity attribute value, or undefined when fully opaque so the attribute can be omitted. */
export function opacityAttr(a: number): number | undefined {
  return a >= 1 ? undefined : a;
}

export function svgDocument(width: number, height: number, body: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">
${body}
</svg>
`;
}
