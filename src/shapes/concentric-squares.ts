import { logistic, unitRGBToInt } from "../utils/color-utils";
import { gaussian, type Rng } from "../utils/random";
import type { Bounds } from "../types/field-types";
import type { RectSpec } from "../rendering/renderer-interface";

export interface SquareGridOptions {
  rows: number;
  cols: number;
  /** Side of the outermost square of each tile. */
  squareSize: number;
  /** Space between neighbouring tiles. */
  gap: number;
  /** Standard deviation of the noise added to the blue channel before the logistic. */
  blueNoise: number;
}

export const DEFAULT_SQUARE_GRID: SquareGridOptions = {
  rows: 12,
  cols: 12,
  squareSize: 5,
  gap: 0.1,
  blueNoise: 0.4,
};

/**
 * Tiles of nested, rotated square outlines.
 *
 * Tile (r, c) holds `squareSize` rings; ring i is anchored i/2 in from the
 * tile corner, has side squareSize - i and is rotated r + c degrees about its
 * anchor. Channel intensities grow with row, column and ring index through
 * the logistic function, with gaussian noise on blue.
 */
export function concentricSquares(options: Partial<SquareGridOptions>, rng: Rng): RectSpec[] {
  const { rows, cols, squareSize: s, gap, blueNoise } = { ...DEFAULT_SQUARE_GRID, ...options };
  const rects: RectSpec[] = [];
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const cx = c * (s + gap);
      const cy = r * (s + gap);
      for (let i = 0; i < s; i++) {
        const red = logistic((r + 1) * (10 * i + 1) / s);
        const green = logistic((c + 1) * (0.05 * i + 1) / s);
        const blue = logistic(((r + 1) / (c + 1)) * (0.01 * i + 1) / s + gaussian(rng, 0, blueNoise));
        rects.push({
          x: cx + i / 2,
          y: cy + i / 2,
          width: s - i,
          height: s - i,
          angle: c + r,
          color: unitRGBToInt(red, green, blue),
          fill: false,
        });
      }
    }
  }
  return rects;
}

/** Plot limits that leave one tile of margin around the grid. */
export function squareGridDomain(options: Partial<SquareGridOptions> = {}): Bounds {
  const { rows, cols, squareSize: s, gap } = { ...DEFAULT_SQUARE_GRID, ...options };
  return {
    xMin: -s - gap,
    xMax: (cols + 1) * (s + gap),
    yMin: -s - gap,
    yMax: (rows + 1) * (s + gap),
  };
}
