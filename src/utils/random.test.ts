import { createRng, gaussian, randomInt, randomUniform } from "./random";

describe("createRng", () => {
  it("repeats its sequence for the same seed", () => {
    const a = createRng("seed");
    const b = createRng("seed");
    for (let i = 0; i < 10; i++) {
      expect(a()).toBe(b());
    }
  });

  it("treats numeric and string seeds alike", () => {
    expect(createRng(42)()).toBe(createRng("42")());
  });
});

describe("gaussian", () => {
  it("has roughly the requested mean and standard deviation", () => {
    const rng = createRng("normal");
    const n = 20000;
    const samples = Array.from({ length: n }, () => gaussian(rng, 3, 2));
    const mean = samples.reduce((s, v) => s + v, 0) / n;
    const variance = samples.reduce((s, v) => s + (v - mean) ** 2, 0) / n;
    expect(mean).toBeGreaterThan(2.9);
    expect(mean).toBeLessThan(3.1);
    expect(Math.sqrt(variance)).toBeGreaterThan(1.9);
    expect(Math.sqrt(variance)).toBeLessThan(2.1);
  });

  it("returns the mean when sd is 0", () => {
    expect(gaussian(createRng("flat"), 5, 0)).toBe(5);
  });
});

describe("randomInt", () => {
  it("returns integers in [min, max)", () => {
    const rng = createRng("ints");
    for (let i = 0; i < 200; i++) {
      const v = randomInt(rng, 0, 10);
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(10);
    }
  });

  it("rejects an empty range", () => {
    expect(() => randomInt(createRng("x"), 3, 3)).toThrow(RangeError);
  });
});

describe("randomUniform", () => {
  it("stays within the range", () => {
    const rng = createRng("uniform");
    for (let i = 0; i < 100; i++) {
      const v = randomUniform(rng, -1, 1);
      expect(v).toBeGreaterThanOrEqual(-1);
      expect(v).toBeLessThan(1);
    }
  });
});
