import { concentricSquares, squareGridDomain, DEFAULT_SQUARE_GRID } from "./concentric-squares";
import { intToRGB, rgbToInt } from "../utils/color-utils";
import { createRng } from "../utils/random";

describe("concentricSquares", () => {
  it("draws squareSize rings per tile", () => {
    expect(concentricSquares({}, createRng("sq")).length).toBe(12 * 12 * 5);
  });

  it("nests and rotates the rings of each tile", () => {
    const rects = concentricSquares({}, createRng("sq"));
    // row 1, column 2, ring 3
    const rect = rects[(1 * 12 + 2) * 5 + 3];
    expect(rect.x).toBeCloseTo(11.7, 10);
    expect(rect.y).toBeCloseTo(6.6, 10);
    expect(rect.width).toBe(2);
    expect(rect.height).toBe(2);
    expect(rect.angle).toBe(3);
    expect(rect.fill).toBe(false);
  });

  it("derives red and green from position through the logistic", () => {
    const [r, g] = intToRGB(concentricSquares({}, createRng("sq"))[0].color);
    // logistic(0.2) * 255 = 140.2
    expect(r).toBe(140);
    expect(g).toBe(140);
  });

  it("is fully determined by position without blue noise", () => {
    const rects = concentricSquares({ rows: 1, cols: 1, blueNoise: 0 }, createRng("any"));
    expect(rects[0].color).toBe(rgbToInt(140, 140, 140));
  });

  it("is reproducible for the same seed", () => {
    const a = concentricSquares({ rows: 2, cols: 2 }, createRng("seed"));
    const b = concentricSquares({ rows: 2, cols: 2 }, createRng("seed"));
    expect(a).toEqual(b);
  });
});

describe("squareGridDomain", () => {
  it("leaves a tile of margin", () => {
    const d = squareGridDomain();
    const pitch = DEFAULT_SQUARE_GRID.squareSize + DEFAULT_SQUARE_GRID.gap;
    expect(d.xMin).toBeCloseTo(-pitch, 12);
    expect(d.xMax).toBeCloseTo(13 * pitch, 12);
    expect(d.yMax).toBeCloseTo(13 * pitch, 12);
  });
});
