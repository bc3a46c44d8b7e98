import { linspace } from "../field/grid";
import { gaussian, randomInt, type Rng } from "../utils/random";
import type { Path } from "../types/field-types";

/** Cumulative chord length along the polyline, normalised to [0, 1]. */
export function chordLengthParameters(xs: ArrayLike<number>, ys: ArrayLike<number>): Float64Array {
  const n = xs.length;
  const t = new Float64Array(n);
  for (let i = 1; i < n; i++) {
    t[i] = t[i - 1] + Math.hypot(xs[i] - xs[i - 1], ys[i] - ys[i - 1]);
  }
  const total = t[n - 1];
  if (total > 0) {
    for (let i = 1; i < n; i++) t[i] /= total;
  }
  return t;
}

/**
 * Interpolating cubic spline with zero second derivative at both ends.
 *
 * Solves the tridiagonal system for the second derivatives M with the
 * Thomas algorithm; between nodes i and i+1 (h = t[i+1] - t[i]):
 *
 *   S(t) = M[i]·(t[i+1] - t)³ / 6h + M[i+1]·(t - t[i])³ / 6h
 *        + (y[i] / h - M[i]·h / 6)·(t[i+1] - t)
 *        + (y[i+1] / h - M[i+1]·h / 6)·(t - t[i])
 *
 * Evaluation outside [t[0], t[n-1]] clamps to the ends.
 */
export function naturalCubicSpline(ts: ArrayLike<number>, values: ArrayLike<number>): (t: number) => number {
  const n = ts.length;
  if (n < 2 || values.length !== n) {
    throw new RangeError(`naturalCubicSpline: need at least 2 nodes with one value each (got ${n} / ${values.length})`);
  }
  const h = new Float64Array(n - 1);
  for (let i = 0; i < n - 1; i++) {
    h[i] = ts[i + 1] - ts[i];
    if (!(h[i] > 0)) {
      throw new RangeError(`naturalCubicSpline: parameters must be strictly increasing (index ${i + 1})`);
    }
  }

  const m = new Float64Array(n);
  if (n > 2) {
    // Interior equations i = 1..n-2, unknowns m[1..n-2]
    const k = n - 2;
    const diag = new Float64Array(k);
    const rhs = new Float64Array(k);
    for (let r = 0; r < k; r++) {
      const i = r + 1;
      diag[r] = 2 * (h[i - 1] + h[i]);
      rhs[r] = 6 * ((values[i + 1] - values[i]) / h[i] - (values[i] - values[i - 1]) / h[i - 1]);
    }
    // Forward sweep: sub-diagonal h[i-1], super-diagonal h[i]
    for (let r = 1; r < k; r++) {
      const w = h[r] / diag[r - 1];
      diag[r] -= w * h[r];
      rhs[r] -= w * rhs[r - 1];
    }
    m[k] = rhs[k - 1] / diag[k - 1];
    for (let r = k - 2; r >= 0; r--) {
      m[r + 1] = (rhs[r] - h[r + 1] * m[r + 2]) / diag[r];
    }
  }

  return (t: number) => {
    const tc = Math.min(Math.max(t, ts[0]), ts[n - 1]);
    let i = 0;
    while (i < n - 2 && tc > ts[i + 1]) i++;
    const hi = h[i];
    const a = ts[i + 1] - tc;
    const b = tc - ts[i];
    return (
      (m[i] * a ** 3) / (6 * hi) +
      (m[i + 1] * b ** 3) / (6 * hi) +
      (values[i] / hi - (m[i] * hi) / 6) * a +
      (values[i + 1] / hi - (m[i + 1] * hi) / 6) * b
    );
  };
}

/**
 * Parametric spline through the nodes, sampled at `samples` evenly spaced
 * parameters. Consecutive duplicate nodes are dropped first.
 */
export function interpolatePath(xs: ArrayLike<number>, ys: ArrayLike<number>, samples = 100): Path {
  if (xs.length !== ys.length) {
    throw new RangeError(`interpolatePath: ${xs.length} x values but ${ys.length} y values`);
  }
  const ux: number[] = [];
  const uy: number[] = [];
  for (let i = 0; i < xs.length; i++) {
    const last = ux.length - 1;
    if (last >= 0 && ux[last] === xs[i] && uy[last] === ys[i]) continue;
    ux.push(xs[i]);
    uy.push(ys[i]);
  }
  if (ux.length < 2) {
    throw new RangeError("interpolatePath: need at least 2 distinct nodes");
  }

  const t = chordLengthParameters(ux, uy);
  const sx = naturalCubicSpline(t, ux);
  const sy = naturalCubicSpline(t, uy);
  const params = linspace(0, 1, samples);
  const x = new Float64Array(samples);
  const y = new Float64Array(samples);
  for (let i = 0; i < samples; i++) {
    x[i] = sx(params[i]);
    y[i] = sy(params[i]);
  }
  return { x, y };
}

export interface NodeOptions {
  count: number;
  /** Nodes are spread evenly over [0, xMax]. */
  xMax: number;
  /** Node heights are integers drawn from [0, yMax). */
  yMax: number;
  /** Standard deviation of the shift applied to all x positions together. */
  xJitter: number;
}

/** Random control nodes, evenly spaced along x. */
export function randomNodes({ count, xMax, yMax, xJitter }: NodeOptions, rng: Rng): Path {
  const x = linspace(0, xMax, count);
  const shift = gaussian(rng, 0, xJitter);
  for (let i = 0; i < count; i++) x[i] += shift;
  const y = new Float64Array(count);
  for (let i = 0; i < count; i++) y[i] = randomInt(rng, 0, yMax);
  return { x, y };
}

export interface DisplacementOptions {
  lines: number;
  /** Standard deviation of the per-line horizontal shift. */
  xJitter: number;
  /** Standard deviation of the per-node upward displacement (folded to be non-negative). */
  yDisplacement: number;
  /** Extra upward offset per line index. */
  yOffset: number;
}

/**
 * Copies of `nodes` for each line i: all x shifted by one N(0, xJitter) draw,
 * each y raised by i·yOffset + |N(0, yDisplacement)|.
 */
export function displacedCopies(nodes: Path, opts: DisplacementOptions, rng: Rng): Path[] {
  const out: Path[] = [];
  const n = nodes.x.length;
  for (let line = 0; line < opts.lines; line++) {
    const shift = gaussian(rng, 0, opts.xJitter);
    const x = new Float64Array(n);
    const y = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      x[i] = nodes.x[i] + shift;
      y[i] = nodes.y[i] + line * opts.yOffset + Math.abs(gaussian(rng, 0, opts.yDisplacement));
    }
    out.push({ x, y });
  }
  return out;
}
