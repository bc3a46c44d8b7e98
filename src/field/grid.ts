import { createField } from "../utils/field-utils";
import { randomUniform, type Rng } from "../utils/random";
import type { Bounds, Field } from "../types/field-types";

export interface GridRange {
  from: number;
  to: number;
  step: number;
}

/** Guards against floating-point shortfall in (to - from) / step, e.g. 20 / 0.01. */
const SEQ_FUZZ = 1e-10;

/**
 * Inclusive arithmetic sequence from `from` towards `to`.
 * seq(-10, 10, 0.01) has 2001 entries.
 */
export function seq(from: number, to: number, step: number): Float64Array {
  if (!Number.isFinite(from) || !Number.isFinite(to) || !Number.isFinite(step)) {
    throw new RangeError(`seq: arguments must be finite (from=${from}, to=${to}, step=${step})`);
  }
  if (from === to) return Float64Array.of(from);
  if (step === 0 || Math.sign(step) !== Math.sign(to - from)) {
    throw new RangeError(`seq: step ${step} does not move from ${from} towards ${to}`);
  }
  const n = Math.floor((to - from) / step + SEQ_FUZZ) + 1;
  const out = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    out[i] = from + i * step;
  }
  return out;
}

/** `n` evenly spaced values from `from` to `to`, both included. */
export function linspace(from: number, to: number, n: number): Float64Array {
  if (!Number.isInteger(n) || n < 1) {
    throw new RangeError(`linspace: n must be a positive integer, got ${n}`);
  }
  const out = new Float64Array(n);
  if (n === 1) {
    out[0] = from;
    return out;
  }
  const step = (to - from) / (n - 1);
  for (let i = 0; i < n; i++) {
    out[i] = from + i * step;
  }
  return out;
}

/** Cartesian product of two axes, x varying fastest: index = j * xs.length + i. */
export function expandGrid(xs: ArrayLike<number>, ys: ArrayLike<number>): Field {
  const nx = xs.length;
  const ny = ys.length;
  const x = new Float64Array(nx * ny);
  const y = new Float64Array(nx * ny);
  for (let j = 0; j < ny; j++) {
    const offset = j * nx;
    for (let i = 0; i < nx; i++) {
      x[offset + i] = xs[i];
      y[offset + i] = ys[j];
    }
  }
  return createField(x, y);
}

/** Square grid covering range x range. */
export function cartesianGrid(range: GridRange): Field {
  const axis = seq(range.from, range.to, range.step);
  return expandGrid(axis, axis);
}

/** Integer lattice [0, width) x [0, height), y varying fastest. */
export function integerGrid(width: number, height: number): Field {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`integerGrid: sizes must be non-negative integers, got ${width} x ${height}`);
  }
  const x = new Float64Array(width * height);
  const y = new Float64Array(width * height);
  let k = 0;
  for (let i = 0; i < width; i++) {
    for (let j = 0; j < height; j++) {
      x[k] = i;
      y[k] = j;
      k++;
    }
  }
  return createField(x, y);
}

/** `count` points drawn uniformly within `bounds`. */
export function randomScatter(count: number, bounds: Bounds, rng: Rng): Field {
  if (!Number.isInteger(count) || count < 0) {
    throw new RangeError(`randomScatter: count must be a non-negative integer, got ${count}`);
  }
  const x = new Float64Array(count);
  const y = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    x[i] = randomUniform(rng, bounds.xMin, bounds.xMax);
    y[i] = randomUniform(rng, bounds.yMin, bounds.yMax);
  }
  return createField(x, y);
}
