import { DEFAULT_LIFESPAN, DEFAULT_POINT_COLOR } from "../constants";
import { randomScatter } from "../field/grid";
import type { Rng } from "../utils/random";
import type { FlowField } from "./flow-field";
import type { Bounds, Path } from "../types/field-types";

/** A particle carried along by a flow field. */
export class Particle {
  x: number;
  y: number;
  readonly lifespan: number;
  readonly color: number;

  constructor(x = 0, y = 0, lifespan = DEFAULT_LIFESPAN, color = DEFAULT_POINT_COLOR) {
    if (!Number.isInteger(lifespan) || lifespan < 0) {
      throw new RangeError(`Particle: lifespan must be a non-negative integer, got ${lifespan}`);
    }
    this.x = x;
    this.y = y;
    this.lifespan = lifespan;
    this.color = color;
  }

  /**
   * Advance `lifespan` steps, each moving by the field vector at the current
   * position scaled by `stepSize`. Returns every visited position, start included.
   */
  flow(field: FlowField, stepSize = 1): Path {
    const x = new Float64Array(this.lifespan + 1);
    const y = new Float64Array(this.lifespan + 1);
    x[0] = this.x;
    y[0] = this.y;
    for (let i = 1; i <= this.lifespan; i++) {
      const { u, v } = field.getVector(this.x, this.y);
      this.x += u * stepSize;
      this.y += v * stepSize;
      x[i] = this.x;
      y[i] = this.y;
    }
    return { x, y };
  }
}

export class ParticleSystem {
  readonly particles: Particle[];

  /**
   * Spawns `count` particles uniformly inside `bounds`, each coloured by
   * `colorAt` at its spawn position.
   */
  constructor(
    count: number,
    bounds: Bounds,
    rng: Rng,
    lifespan = DEFAULT_LIFESPAN,
    colorAt: (x: number, y: number) => number = () => DEFAULT_POINT_COLOR,
  ) {
    const spawn = randomScatter(count, bounds, rng);
    this.particles = [];
    for (let i = 0; i < spawn.count; i++) {
      const x = spawn.x[i];
      const y = spawn.y[i];
      this.particles.push(new Particle(x, y, lifespan, colorAt(x, y)));
    }
  }

  get count(): number {
    return this.particles.length;
  }

  /** Flows every particle through `field`; one path per particle, in spawn order. */
  flowAll(field: FlowField, stepSize = 1): Path[] {
    return this.particles.map(p => p.flow(field, stepSize));
  }
}
