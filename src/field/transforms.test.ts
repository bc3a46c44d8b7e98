import {
  transformField, compose, identity, sineShear, waveDistortion, cartesianToPolar, polarToCartesian,
  scale, jitter, noiseDisplacement,
} from "./transforms";
import { cartesianGrid } from "./grid";
import { createField } from "../utils/field-utils";
import { createRng } from "../utils/random";

describe("transformField", () => {
  it("carries attributes over and leaves the input untouched", () => {
    const field = createField(Float64Array.from([1, 2]), Float64Array.from([3, 4]), {
      color: Uint32Array.from([0xff0000, 0x00ff00]),
    });
    const out = transformField(field, scale(10));
    expect(Array.from(out.x)).toEqual([10, 20]);
    expect(Array.from(out.y)).toEqual([30, 40]);
    expect(out.color).toBe(field.color);
    expect(Array.from(field.x)).toEqual([1, 2]);
  });

  it("gives identical output for identical input", () => {
    const grid = cartesianGrid({ from: -2, to: 2, step: 0.5 });
    const a = transformField(grid, sineShear());
    const b = transformField(grid, sineShear());
    expect(a.x).toEqual(b.x);
    expect(a.y).toEqual(b.y);
  });
});

describe("compose", () => {
  it("applies transforms left to right", () => {
    const shift = (x: number, y: number) => ({ x: x + 1, y });
    expect(compose(scale(2), shift)(1, 1)).toEqual({ x: 3, y: 2 });
    expect(compose(shift, scale(2))(1, 1)).toEqual({ x: 4, y: 2 });
  });

  it("is the identity when empty", () => {
    expect(compose()(5, -3)).toEqual({ x: 5, y: -3 });
    expect(identity(5, -3)).toEqual({ x: 5, y: -3 });
  });
});

describe("sineShear", () => {
  it("fixes the origin", () => {
    expect(sineShear()(0, 0)).toEqual({ x: 0, y: 0 });
  });

  it("shears by pi * sin of the other axis", () => {
    const p = sineShear()(Math.PI / 2, 0);
    expect(p.x).toBeCloseTo(Math.PI / 2, 12);
    expect(p.y).toBeCloseTo(Math.PI, 12);
  });
});

describe("waveDistortion", () => {
  const wave = waveDistortion({ a: 0.2, b: 2, c: 1, d: 0.4 });

  it("feeds the distorted x into y", () => {
    const p = wave(0, Math.PI);
    expect(p.x).toBeCloseTo(-2, 12);
    expect(p.y).toBeCloseTo(0.2 * Math.cos(-2), 12);
  });

  it("produces a non-finite point when y is 0 and x is not", () => {
    expect(Number.isFinite(wave(1, 0).x)).toBe(false);
  });
});

describe("polar conversions", () => {
  it("maps (0, 1) to radius 1 at a quarter turn", () => {
    const p = cartesianToPolar(0, 1);
    expect(p.x).toBe(1);
    expect(p.y).toBeCloseTo(Math.PI / 2, 12);
  });

  it("round-trips", () => {
    for (const [x, y] of [[1, 2], [-3, 0.5], [0.25, -4]]) {
      const polar = cartesianToPolar(x, y);
      const back = polarToCartesian(polar.x, polar.y);
      expect(back.x).toBeCloseTo(x, 10);
      expect(back.y).toBeCloseTo(y, 10);
    }
  });
});

describe("jitter", () => {
  it("is reproducible for the same seed", () => {
    const a = jitter(0.5, createRng("j"))(1, 1);
    const b = jitter(0.5, createRng("j"))(1, 1);
    expect(a).toEqual(b);
  });

  it("does nothing with zero amount", () => {
    expect(jitter(0, createRng("j"))(1, 2)).toEqual({ x: 1, y: 2 });
  });
});

describe("noiseDisplacement", () => {
  it("is reproducible for the same seed", () => {
    const a = noiseDisplacement({ seed: 3, frequency: 0.7, amplitude: 1 });
    const b = noiseDisplacement({ seed: 3, frequency: 0.7, amplitude: 1 });
    expect(a(1.3, -0.4)).toEqual(b(1.3, -0.4));
  });

  it("is the identity with zero amplitude", () => {
    const fn = noiseDisplacement({ seed: 3, frequency: 0.7, amplitude: 0 });
    expect(fn(1.3, -0.4)).toEqual({ x: 1.3, y: -0.4 });
  });

  it("moves points away from their position", () => {
    const fn = noiseDisplacement({ seed: 3, frequency: 0.7, amplitude: 1 });
    const points = [[0.3, 0.1], [1.7, 2.2], [-4.1, 0.9]];
    const moved = points.filter(([x, y]) => fn(x, y).x !== x);
    expect(moved.length).toBeGreaterThan(0);
  });
});
