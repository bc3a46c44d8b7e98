/** A single (x, y) coordinate. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** A 2D vector sampled from a flow field. */
export interface Vector {
  readonly u: number;
  readonly v: number;
}

export interface Bounds {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;
}

/**
 * An ordered collection of points stored as parallel arrays.
 *
 * Attribute arrays, when present, hold exactly `count` entries:
 * colours as 0xRRGGBB, sizes as marker area in square pixels, opacities in [0, 1].
 * Fields are treated as values; stages that change a field return a new one.
 */
export interface Field {
  readonly count: number;
  readonly x: Float64Array;
  readonly y: Float64Array;
  readonly color?: Uint32Array;
  readonly size?: Float32Array;
  readonly opacity?: Float32Array;
}

/** An ordered polyline. */
export interface Path {
  readonly x: Float64Array;
  readonly y: Float64Array;
}

/** Maps one coordinate pair to another. Must not depend on other points. */
export type PointTransform = (x: number, y: number) => Point;

/** Vectors (u, v) anchored at points (x, y). */
export interface ArrowSet {
  readonly x: Float64Array;
  readonly y: Float64Array;
  readonly u: Float64Array;
  readonly v: Float64Array;
}
