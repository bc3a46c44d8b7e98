import { Resvg } from "@resvg/resvg-js";

export interface RasterImage {
  png: Buffer;
  width: number;
  height: number;
}

/** Renders SVG markup to PNG at its own pixel size. */
export function rasterize(svg: string): RasterImage {
  const resvg = new Resvg(svg, {
    fitTo: { mode: "original" },
    font: { loadSystemFonts: true, defaultFontFamily: "sans-serif" },
  });
  const out = resvg.render();
  return { png: Buffer.from(out.asPng()), width: out.width, height: out.height };
}
