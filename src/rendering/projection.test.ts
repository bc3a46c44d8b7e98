import { cartesianProjection, polarProjection, equalAspectViewport, createProjection } from "./projection";

const unit = { xMin: 0, xMax: 1, yMin: 0, yMax: 1 };
const square = { x: 0, y: 0, width: 100, height: 100 };

describe("cartesianProjection", () => {
  const proj = cartesianProjection({ xMin: 0, xMax: 10, yMin: 0, yMax: 10 }, square);

  it("puts the origin at the bottom left", () => {
    expect(proj.project(0, 0)).toEqual([0, 100]);
    expect(proj.project(10, 10)).toEqual([100, 0]);
  });

  it("maps linearly", () => {
    expect(proj.project(5, 2.5)).toEqual([50, 75]);
  });
});

describe("polarProjection", () => {
  const proj = polarProjection(unit, square);
  const expectPoint = (actual: [number, number], x: number, y: number) => {
    expect(actual[0]).toBeCloseTo(x, 10);
    expect(actual[1]).toBeCloseTo(y, 10);
  };

  it("puts yMin at the centre", () => {
    expectPoint(proj.project(0, 0), 50, 50);
  });

  it("starts at 12 o'clock and turns clockwise", () => {
    expectPoint(proj.project(0, 1), 50, 0);
    expectPoint(proj.project(0.25, 1), 100, 50);
    expectPoint(proj.project(0.5, 0.5), 50, 75);
  });
});

describe("equalAspectViewport", () => {
  it("letterboxes a wide domain", () => {
    expect(equalAspectViewport({ xMin: 0, xMax: 2, yMin: 0, yMax: 1 }, square))
      .toEqual({ x: 0, y: 25, width: 100, height: 50 });
  });
});

describe("createProjection", () => {
  it("builds the requested kind", () => {
    expect(createProjection("polar", unit, square).kind).toBe("polar");
    expect(createProjection("cartesian", unit, square).kind).toBe("cartesian");
  });
});
