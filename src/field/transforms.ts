import { makeNoise2D } from "open-simplex-noise";
import { createField } from "../utils/field-utils";
import { gaussian, type Rng } from "../utils/random";
import type { Field, PointTransform } from "../types/field-types";

/**
 * Applies `fn` to every point independently and returns a new field.
 * Attributes are carried over unchanged.
 */
export function transformField(field: Field, fn: PointTransform): Field {
  const x = new Float64Array(field.count);
  const y = new Float64Array(field.count);
  for (let i = 0; i < field.count; i++) {
    const p = fn(field.x[i], field.y[i]);
    x[i] = p.x;
    y[i] = p.y;
  }
  return createField(x, y, { color: field.color, size: field.size, opacity: field.opacity });
}

/** Left-to-right composition. */
export function compose(...fns: PointTransform[]): PointTransform {
  return (x, y) => {
    let p = { x, y };
    for (const fn of fns) p = fn(p.x, p.y);
    return p;
  };
}

export const identity: PointTransform = (x, y) => ({ x, y });

/** x' = x + y + a·sin(y), y' = y + a·sin(x). */
export function sineShear(amplitude = Math.PI): PointTransform {
  return (x, y) => ({
    x: x + y + amplitude * Math.sin(y),
    y: y + amplitude * Math.sin(x),
  });
}

export interface WaveParams {
  a: number;
  b: number;
  c: number;
  d: number;
}

/**
 * x' = a·sin(x) + b·cos(y) + c·sin(x / y)
 * y' = a·cos(x') + d·sin(y)
 *
 * The y term reads the already-distorted x'. Points with y = 0 come out
 * non-finite and are dropped at render time.
 */
export function waveDistortion({ a, b, c, d }: WaveParams): PointTransform {
  return (x, y) => {
    const nx = a * Math.sin(x) + b * Math.cos(y) + c * Math.sin(x / y);
    const ny = a * Math.cos(nx) + d * Math.sin(y);
    return { x: nx, y: ny };
  };
}

/** (x, y) -> (rho, phi). */
export const cartesianToPolar: PointTransform = (x, y) => ({
  x: Math.hypot(x, y),
  y: Math.atan2(y, x),
});

/** (rho, theta) -> (x, y). Inverse of cartesianToPolar. */
export const polarToCartesian: PointTransform = (rho, theta) => ({
  x: rho * Math.cos(theta),
  y: rho * Math.sin(theta),
});

export function scale(amount: number): PointTransform {
  return (x, y) => ({ x: x * amount, y: y * amount });
}

/** Adds independent N(0, amount) noise to each axis. */
export function jitter(amount: number, rng: Rng): PointTransform {
  return (x, y) => ({
    x: x + gaussian(rng, 0, amount),
    y: y + gaussian(rng, 0, amount),
  });
}

export interface NoiseParams {
  seed: number;
  /** Multiplier applied to coordinates before sampling the noise. */
  frequency: number;
  /** Maximum displacement along each axis. */
  amplitude: number;
}

/** Offset between the x and y noise channels so the two displacements are uncorrelated. */
const NOISE_CHANNEL_OFFSET = 1000;

/** Displaces each point by 2D OpenSimplex noise sampled at its scaled position. */
export function noiseDisplacement({ seed, frequency, amplitude }: NoiseParams): PointTransform {
  const noise = makeNoise2D(seed);
  return (x, y) => {
    const nx = x * frequency;
    const ny = y * frequency;
    return {
      x: x + amplitude * noise(nx, ny),
      y: y + amplitude * noise(nx + NOISE_CHANNEL_OFFSET, ny + NOISE_CHANNEL_OFFSET),
    };
  };
}
