import seedrandom from "seedrandom";

/** Uniform random source in [0, 1). */
export type Rng = () => number;

export function createRng(seed: string | number): Rng {
  return seedrandom(String(seed));
}

/** Normal sample via Box-Muller. */
export function gaussian(rng: Rng, mean = 0, sd = 1): number {
  let u = rng();
  while (u === 0) u = rng();
  const v = rng();
  return mean + sd * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/** Integer in [min, max). */
export function randomInt(rng: Rng, min: number, max: number): number {
  if (!(max > min)) {
    throw new RangeError(`randomInt: max (${max}) must be greater than min (${min})`);
  }
  return min + Math.floor(rng() * (max - min));
}

export function randomUniform(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}
