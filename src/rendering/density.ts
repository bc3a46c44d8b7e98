import { SVG_PRECISION } from "../constants";
import { rgbToInt } from "../utils/color-utils";
import type { Field } from "../types/field-types";
import type { PointStyle, Projection } from "./renderer-interface";

/** Per-pixel aggregate of the points that land in it. */
export interface DensityGrid {
  readonly width: number;
  readonly height: number;
  /** Points that landed in each pixel. */
  readonly count: Uint32Array;
  /** Product of (1 - opacity) over the pixel's points. */
  readonly transmittance: Float64Array;
  /** Opacity-weighted channel sums and their total weight. */
  readonly r: Float64Array;
  readonly g: Float64Array;
  readonly b: Float64Array;
  readonly weight: Float64Array;
}

/** A horizontal run of pixels sharing one colour and opacity. */
export interface DensityRun {
  x: number;
  y: number;
  width: number;
  color: number;
  opacity: number;
}

/**
 * Bins every finite point into the canvas pixel it projects to.
 *
 * Stacking n points of opacity a in one pixel gives opacity 1 - (1 - a)^n,
 * so the product of transmittances is kept per pixel. A point's opacity is
 * scaled by its marker area (px²) where that is under one pixel. The pixel
 * colour is the opacity-weighted mean of its points' colours.
 */
export function aggregateDensity(
  field: Field,
  style: PointStyle,
  proj: Projection,
  width: number,
  height: number,
): DensityGrid {
  const size = width * height;
  const grid: DensityGrid = {
    width,
    height,
    count: new Uint32Array(size),
    transmittance: new Float64Array(size).fill(1),
    r: new Float64Array(size),
    g: new Float64Array(size),
    b: new Float64Array(size),
    weight: new Float64Array(size),
  };

  for (let i = 0; i < field.count; i++) {
    const x = field.x[i];
    const y = field.y[i];
    if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
    // A marker smaller than a pixel only covers part of it
    const size = field.size ? field.size[i] : style.size;
    const alpha = (field.opacity ? field.opacity[i] : style.opacity) * Math.min(1, size);
    if (!(alpha > 0)) continue;

    const [px, py] = proj.project(x, y);
    const ix = Math.floor(px);
    const iy = Math.floor(py);
    if (ix < 0 || ix >= width || iy < 0 || iy >= height) continue;

    const k = iy * width + ix;
    const c = field.color ? field.color[i] : style.color;
    grid.count[k]++;
    grid.transmittance[k] *= 1 - Math.min(alpha, 1);
    /* eslint-disable no-bitwise */
    grid.r[k] += alpha * ((c >> 16) & 0xff);
    grid.g[k] += alpha * ((c >> 8) & 0xff);
    grid.b[k] += alpha * (c & 0xff);
    /* eslint-enable no-bitwise */
    grid.weight[k] += alpha;
  }
  return grid;
}

const quantize = (a: number) => Number(a.toFixed(SVG_PRECISION));

/** Collapses the grid into runs; opacities are quantized to SVG precision before merging. */
export function densityRuns(grid: DensityGrid): DensityRun[] {
  const runs: DensityRun[] = [];
  for (let y = 0; y < grid.height; y++) {
    let current: DensityRun | null = null;
    for (let x = 0; x < grid.width; x++) {
      const k = y * grid.width + x;
      const w = grid.weight[k];
      const opacity = w > 0 ? quantize(1 - grid.transmittance[k]) : 0;
      if (opacity <= 0) {
        current = null;
        continue;
      }
      const color = rgbToInt(grid.r[k] / w, grid.g[k] / w, grid.b[k] / w);
      if (current && current.color === color && current.opacity === opacity) {
        current.width++;
      } else {
        current = { x, y, width: 1, color, opacity };
        runs.push(current);
      }
    }
  }
  return runs;
}
