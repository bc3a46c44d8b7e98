import { Plot, composePanels, renderPanels } from "./plot";
import { cartesianGrid } from "../field/grid";
import { transformField, sineShear } from "../field/transforms";
import { mapColor, withConstant } from "../field/attributes";
import { createField } from "../utils/field-utils";
import { gradientColor } from "../utils/color-utils";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const count = (s: string, token: string) => s.split(token).length - 1;
const points = (xs: number[], ys: number[]) => createField(Float64Array.from(xs), Float64Array.from(ys));

describe("Plot", () => {
  it("rejects a non-positive size", () => {
    expect(() => new Plot({ width: 0 })).toThrow(RangeError);
  });

  describe("domain", () => {
    it("spans the layers", () => {
      const plot = new Plot().addPoints(points([0, 2], [0, 4])).addPoints(points([-3], [1]));
      expect(plot.layerCount).toBe(2);
      expect(plot.domain()).toEqual({ xMin: -3, xMax: 2, yMin: 0, yMax: 4 });
    });

    it("takes fixed limits side by side", () => {
      const plot = new Plot({ domain: { xMin: -1 } }).addPoints(points([0, 2], [0, 4]));
      expect(plot.domain()).toEqual({ xMin: -1, xMax: 2, yMin: 0, yMax: 4 });
    });

    it("widens a single point", () => {
      expect(new Plot().addPoints(points([1], [1])).domain()).toEqual({ xMin: 0, xMax: 2, yMin: 0, yMax: 2 });
    });

    it("falls back to the unit square without data", () => {
      expect(new Plot().domain()).toEqual({ xMin: 0, xMax: 1, yMin: 0, yMax: 1 });
    });

    it("rejects inverted limits", () => {
      expect(() => new Plot({ domain: { xMin: 5, xMax: 1 } }).domain()).toThrow(RangeError);
    });
  });

  describe("toSvg", () => {
    const bare = { width: 100, height: 100, padding: 0 };

    it("paints the background first", () => {
      expect(new Plot(bare).toSvgBody().startsWith('<rect width="100" height="100" fill="#ffffff"/>')).toBe(true);
    });

    it("leaves the background out when it is none", () => {
      expect(new Plot({ ...bare, background: "none" }).toSvgBody()).toBe("");
    });

    it("draws a circle of diameter sqrt(size) per point", () => {
      const svg = new Plot(bare)
        .addPoints(points([0, 10], [0, 10]), { size: 4, color: 0xff0000, opacity: 0.5 })
        .toSvg();
      expect(svg).toContain('<circle cx="0" cy="100" r="1" fill="#ff0000" fill-opacity="0.5"/>');
      expect(svg).toContain('<circle cx="100" cy="0" r="1" fill="#ff0000" fill-opacity="0.5"/>');
    });

    it("skips points with a non-finite coordinate", () => {
      const svg = new Plot(bare).addPoints(points([NaN, 0, 1], [0, 0, 1]), { size: 4 }).toSvg();
      expect(count(svg, "<circle")).toBe(2);
    });

    it("cycles path colours", () => {
      const line = (to: number) => ({ x: Float64Array.from([0, to]), y: Float64Array.from([0, to]) });
      const svg = new Plot(bare).addPaths([line(10), line(5)], { color: [0xff0000, 0x00ff00] }).toSvg();
      expect(svg).toContain('<path d="M0 100L100 0" stroke="#ff0000"/>');
      expect(svg).toContain('<path d="M0 100L50 50" stroke="#00ff00"/>');
    });

    it("draws arrows with a head and skips those shorter than half a pixel", () => {
      const arrows = {
        x: Float64Array.from([0, 0]),
        y: Float64Array.from([0, 0]),
        u: Float64Array.from([1, 0]),
        v: Float64Array.from([0, 0]),
      };
      const svg = new Plot(bare).addArrows(arrows).toSvg();
      expect(svg).toContain('<line x1="0" y1="50" x2="70" y2="50"/>');
      expect(svg).toContain('<polygon points="100,50 70,65 70,35" stroke="none"/>');
      expect(count(svg, "<line")).toBe(1);
    });

    it("rejects an empty path colour list", () => {
      const line = { x: Float64Array.from([0, 1]), y: Float64Array.from([0, 1]) };
      expect(() => new Plot(bare).addPaths([line], { color: [] })).toThrow(new RangeError("addPaths: color list is empty"));
    });

    it("outlines rectangles unless filled", () => {
      const svg = new Plot(bare)
        .addRects([{ x: 0, y: 0, width: 10, height: 10, angle: 0, color: 0x0000ff, fill: false }])
        .toSvg();
      expect(svg).toContain('<polygon points="0,100 100,100 100,0 0,0" stroke="#0000ff" fill="none"/>');
    });

    it("hides the chrome by default", () => {
      const svg = new Plot(bare).addPoints(points([0, 1], [0, 1])).toSvg();
      expect(svg).not.toContain("chrome");
      expect(svg).not.toContain("<text");
    });

    it("draws the chrome on request", () => {
      const svg = new Plot({ ...bare, hideChrome: false }).addPoints(points([0, 1], [0, 1])).toSvg();
      expect(svg).toContain('<g class="chrome">');
    });

    it("clips layers to fixed limits", () => {
      const svg = new Plot({ ...bare, domain: { xMin: 0, xMax: 1, yMin: 0, yMax: 1 } })
        .addPoints(points([0, 2], [0, 2]))
        .toSvg();
      expect(svg).toContain('<defs><clipPath id="plot-clip"><rect x="0" y="0" width="100" height="100"/></clipPath></defs>');
      expect(svg).toContain('<g clip-path="url(#plot-clip)">');
    });

    it("clips polar plots to a circle", () => {
      const svg = new Plot({ ...bare, coordinates: "polar", domain: { yMin: 0 } })
        .addPoints(points([0, 1], [0, 1]))
        .toSvg();
      expect(svg).toContain('<clipPath id="plot-clip"><circle cx="50" cy="50" r="50"/></clipPath>');
    });

    it("rejects an unknown background colour", () => {
      const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
      expect(() => new Plot({ background: "not-a-colour" }).toSvg()).toThrow(RangeError);
      warn.mockRestore();
    });
  });

  describe("render", () => {
    it("rasterizes the full sheared grid in polar coordinates without chrome", () => {
      const grid = cartesianGrid({ from: -10, to: 10, step: 0.01 });
      expect(grid.count).toBe(2001 * 2001);
      const coloured = mapColor(grid, x => gradientColor(Math.abs(Math.sin(x))));
      const field = withConstant(transformField(coloured, sineShear()), { size: 0.2, opacity: 0.5 });
      const image = new Plot({ width: 200, height: 200, coordinates: "polar" })
        .addPoints(field, { mode: "density" })
        .render();

      expect(image.width).toBe(200);
      expect(image.height).toBe(200);
      expect(Array.from(image.png.subarray(0, 8))).toEqual(PNG_SIGNATURE);
      expect(image.svg).toContain('<g class="points" shape-rendering="crispEdges"><rect');
      expect(image.svg).not.toContain("chrome");
      expect(image.svg).not.toContain("<text");
    }, 60000);
  });
});

describe("composePanels", () => {
  const panel = () => new Plot({ width: 100, height: 50, domain: { xMin: 0, xMax: 1, yMin: 0, yMax: 1 } });

  it("lays panels out in a row with gaps", () => {
    const svg = composePanels([panel(), panel()], { columns: 2, gap: 10 });
    expect(svg).toContain('width="210" height="50" viewBox="0 0 210 50"');
    expect(svg).toContain('<svg x="110" y="0" width="100" height="50" viewBox="0 0 100 50">');
  });

  it("wraps onto a new row after the last column", () => {
    const svg = composePanels([panel(), panel(), panel()], { columns: 2 });
    expect(svg).toContain('<svg x="0" y="50" width="100" height="50" viewBox="0 0 100 50">');
  });

  it("gives each panel its own clip id", () => {
    const svg = composePanels([panel(), panel()]);
    expect(svg).toContain('id="plot-0-clip"');
    expect(svg).toContain('id="plot-1-clip"');
  });

  it("rejects an empty list", () => {
    expect(() => composePanels([])).toThrow(RangeError);
  });

  it("renders the whole canvas", () => {
    const image = renderPanels([panel(), panel()], { columns: 2, gap: 10 });
    expect(image.width).toBe(210);
    expect(image.height).toBe(50);
    expect(Array.from(image.png.subarray(0, 8))).toEqual(PNG_SIGNATURE);
  });
});
