import { MathUtils } from "three";
import { makeNoise2D } from "open-simplex-noise";
import { FLOW_NODE_EPSILON } from "../constants";
import type { ArrowSet, Vector } from "../types/field-types";

export type DecayFunction = "inv_linear" | "inv_quadratic" | "inv_cubic";

/** Exponent k of the inverse-distance weight 1 / d^k. */
const DECAY_EXPONENT: Record<DecayFunction, number> = {
  inv_linear: 1,
  inv_quadratic: 2,
  inv_cubic: 3,
};

export function isDecayFunction(value: string): value is DecayFunction {
  return Object.prototype.hasOwnProperty.call(DECAY_EXPONENT, value);
}

/** Vector at a node position. */
export type VectorFunction = (x: number, y: number) => Vector;

export interface FlowFieldOptions {
  width?: number;
  height?: number;
  /** Distance between neighbouring nodes. */
  resolution?: number;
  /** Nodes per axis that contribute to a sampled vector. Minimum 2. */
  neighbourhoodSize?: number;
  /** One of "inv_linear", "inv_quadratic", "inv_cubic". */
  decay?: string;
}

/**
 * A grid of vectors covering [0, width) x [0, height), sampled between nodes
 * by inverse-distance weighting over the nearest n x n nodes.
 *
 * Node (i, j) sits at (i * resolution, j * resolution); vectors are stored
 * row-major, index = j * cols + i. The field tiles the plane: positions
 * outside it wrap around on both axes.
 */
export class FlowField {
  readonly width: number;
  readonly height: number;
  readonly resolution: number;
  readonly neighbourhoodSize: number;
  readonly decay: DecayFunction;
  readonly cols: number;
  readonly rows: number;
  readonly u: Float64Array;
  readonly v: Float64Array;

  constructor({
    width = 100,
    height = 100,
    resolution = 0.1,
    neighbourhoodSize = 3,
    decay = "inv_linear",
  }: FlowFieldOptions = {}) {
    if (!(width > 0) || !(height > 0) || !(resolution > 0)) {
      throw new RangeError(
        `FlowField: width, height and resolution must be positive (got ${width}, ${height}, ${resolution})`);
    }
    this.width = width;
    this.height = height;
    this.resolution = resolution;

    if (neighbourhoodSize < 2) {
      // eslint-disable-next-line no-console
      console.warn(`FlowField: neighbourhood size must be > 1, using 2 instead of ${neighbourhoodSize}`);
      neighbourhoodSize = 2;
    }
    this.neighbourhoodSize = Math.floor(neighbourhoodSize);

    if (isDecayFunction(decay)) {
      this.decay = decay;
    } else {
      // eslint-disable-next-line no-console
      console.warn(`FlowField: unknown decay "${decay}", using inv_linear`);
      this.decay = "inv_linear";
    }

    this.cols = Math.ceil(width / resolution);
    this.rows = Math.ceil(height / resolution);
    this.u = new Float64Array(this.cols * this.rows);
    this.v = new Float64Array(this.cols * this.rows);
    this.initField();
  }

  /** Fills every node from `fn`, or from the built-in sine/cosine generator. */
  initField(fn: VectorFunction = (x, y) => this.defaultVector(x, y)): void {
    for (let j = 0; j < this.rows; j++) {
      for (let i = 0; i < this.cols; i++) {
        const { u, v } = fn(i * this.resolution, j * this.resolution);
        const k = j * this.cols + i;
        this.u[k] = u;
        this.v[k] = v;
      }
    }
  }

  /**
   * u = 2π·sin(x) + y, then v = 2π·cos(y) + u, each wrapped into the
   * field's extent. The v term reads the already-computed u.
   */
  private defaultVector(x: number, y: number): Vector {
    const u = 2 * Math.PI * Math.sin(x) + y;
    const v = 2 * Math.PI * Math.cos(y) + u;
    return {
      u: MathUtils.euclideanModulo(u, this.width),
      v: MathUtils.euclideanModulo(v, this.height),
    };
  }

  /** Stored vector at node (i, j), wrapping both indices. */
  nodeVector(i: number, j: number): Vector {
    const k = MathUtils.euclideanModulo(j, this.rows) * this.cols + MathUtils.euclideanModulo(i, this.cols);
    return { u: this.u[k], v: this.v[k] };
  }

  /** Weighted sum of the n x n nodes nearest (x, y), normalised by the total weight. */
  getVector(x: number, y: number): Vector {
    const res = this.resolution;
    const n = this.neighbourhoodSize;
    const k = DECAY_EXPONENT[this.decay];

    // Position in node units, wrapped onto the torus spanned by the nodes
    const gx = MathUtils.euclideanModulo(x / res, this.cols);
    const gy = MathUtils.euclideanModulo(y / res, this.rows);
    const i0 = Math.floor(gx - (n - 1) / 2 + 0.5);
    const j0 = Math.floor(gy - (n - 1) / 2 + 0.5);

    let sumU = 0, sumV = 0, sumW = 0;
    for (let j = j0; j < j0 + n; j++) {
      for (let i = i0; i < i0 + n; i++) {
        const d = Math.hypot((i - gx) * res, (j - gy) * res);
        const node = this.nodeVector(i, j);
        if (d < FLOW_NODE_EPSILON) return node;
        const w = 1 / d ** k;
        sumU += w * node.u;
        sumV += w * node.v;
        sumW += w;
      }
    }
    return { u: sumU / sumW, v: sumV / sumW };
  }

  /** Node anchors and their vectors, for drawing the field as arrows. */
  arrows(): ArrowSet {
    const n = this.cols * this.rows;
    const x = new Float64Array(n);
    const y = new Float64Array(n);
    for (let j = 0; j < this.rows; j++) {
      for (let i = 0; i < this.cols; i++) {
        const k = j * this.cols + i;
        x[k] = i * this.resolution;
        y[k] = j * this.resolution;
      }
    }
    return { x, y, u: Float64Array.from(this.u), v: Float64Array.from(this.v) };
  }

  toString(): string {
    return `FlowField: ${this.cols} x ${this.rows} @ ${this.resolution}`;
  }
}

/** Unit vectors whose angle follows 2D OpenSimplex noise: smooth, swirling flow. */
export function noiseFlow(seed: number, frequency: number): VectorFunction {
  const noise = makeNoise2D(seed);
  return (x, y) => {
    const angle = noise(x * frequency, y * frequency) * 2 * Math.PI;
    return { u: Math.cos(angle), v: Math.sin(angle) };
  };
}
