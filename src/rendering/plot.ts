import {
  DEFAULT_BACKGROUND, DEFAULT_HEIGHT, DEFAULT_PADDING, DEFAULT_POINT_COLOR, DEFAULT_POINT_OPACITY,
  DEFAULT_POINT_SIZE, DEFAULT_STROKE_WIDTH, DEFAULT_WIDTH,
} from "../constants";
import { parseColor } from "../utils/color-utils";
import { expandDegenerate, unionBounds } from "../utils/field-utils";
import { drawChrome } from "./chrome";
import { drawLayer, layerBounds } from "./layers";
import { createProjection, equalAspectViewport } from "./projection";
import { rasterize } from "./rasterize";
import { color, el, svgDocument } from "./svg-markup";
import type { ArrowSet, Bounds, Field, Path } from "../types/field-types";
import type {
  ArrowStyle, Layer, PathStyle, PlotOptions, PointStyle, Projection, RectSpec, RectStyle, RenderedImage, Viewport,
} from "./renderer-interface";

export const DEFAULT_PLOT_OPTIONS: PlotOptions = {
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
  coordinates: "cartesian",
  hideChrome: true,
  background: DEFAULT_BACKGROUND,
  padding: DEFAULT_PADDING,
  aspect: "free",
  id: "plot",
};

/** Minimum padding when chrome is drawn, leaving room for tick labels. */
const CHROME_PADDING = 36;

/** Domain used when no layer has a finite coordinate. */
const EMPTY_DOMAIN: Bounds = { xMin: 0, xMax: 1, yMin: 0, yMax: 1 };

/**
 * A single plot: an ordered stack of layers drawn into one coordinate system.
 *
 * Layers are drawn in the order they were added. The domain is the union of
 * the layers' extents unless fixed through `options.domain`.
 */
export class Plot {
  readonly options: PlotOptions;
  private readonly layers: Layer[] = [];

  constructor(options: Partial<PlotOptions> = {}) {
    const merged = { ...DEFAULT_PLOT_OPTIONS, ...options };
    if (!(merged.width > 0) || !(merged.height > 0)) {
      throw new RangeError(`Plot: size must be positive, got ${merged.width} x ${merged.height}`);
    }
    this.options = merged;
  }

  get layerCount(): number {
    return this.layers.length;
  }

  addPoints(field: Field, style: Partial<PointStyle> = {}): this {
    this.layers.push({
      kind: "points",
      field,
      style: {
        color: DEFAULT_POINT_COLOR,
        size: DEFAULT_POINT_SIZE,
        opacity: DEFAULT_POINT_OPACITY,
        mode: "vector",
        ...style,
      },
    });
    return this;
  }

  addPaths(paths: readonly Path[], style: Partial<PathStyle> = {}): this {
    if (typeof style.color === "object" && style.color.length === 0) {
      throw new RangeError("addPaths: color list is empty");
    }
    this.layers.push({
      kind: "paths",
      paths,
      style: { color: DEFAULT_POINT_COLOR, width: DEFAULT_STROKE_WIDTH, opacity: 1, ...style },
    });
    return this;
  }

  addArrows(arrows: ArrowSet, style: Partial<ArrowStyle> = {}): this {
    this.layers.push({
      kind: "arrows",
      arrows,
      style: { color: DEFAULT_POINT_COLOR, width: DEFAULT_STROKE_WIDTH, opacity: 1, scale: 1, ...style },
    });
    return this;
  }

  addRects(rects: readonly RectSpec[], style: Partial<RectStyle> = {}): this {
    this.layers.push({
      kind: "rects",
      rects,
      style: { width: DEFAULT_STROKE_WIDTH, opacity: 1, ...style },
    });
    return this;
  }

  /** Data domain: layer extents, overridden side by side by `options.domain`. */
  domain(): Bounds {
    const data = this.layers.reduce<Bounds | null>((acc, l) => unionBounds(acc, layerBounds(l)), null)
      ?? EMPTY_DOMAIN;
    const fixed = this.options.domain ?? {};
    const merged: Bounds = {
      xMin: fixed.xMin ?? data.xMin,
      xMax: fixed.xMax ?? data.xMax,
      yMin: fixed.yMin ?? data.yMin,
      yMax: fixed.yMax ?? data.yMax,
    };
    if (merged.xMax < merged.xMin || merged.yMax < merged.yMin) {
      throw new RangeError(
        `Plot: empty domain x [${merged.xMin}, ${merged.xMax}], y [${merged.yMin}, ${merged.yMax}]`);
    }
    return expandDegenerate(merged);
  }

  projection(): Projection {
    const { width, height, hideChrome, aspect, coordinates } = this.options;
    const pad = hideChrome ? this.options.padding : Math.max(this.options.padding, CHROME_PADDING);
    const domain = this.domain();
    let viewport: Viewport = {
      x: pad,
      y: pad,
      width: Math.max(width - 2 * pad, 1),
      height: Math.max(height - 2 * pad, 1),
    };
    if (aspect === "equal" && coordinates === "cartesian") {
      viewport = equalAspectViewport(domain, viewport);
    }
    return createProjection(coordinates, domain, viewport);
  }

  /** Everything inside the root <svg> element. `id` prefixes element ids. */
  toSvgBody(id = this.options.id): string {
    const { width, height, background, hideChrome } = this.options;
    const proj = this.projection();
    const parts: string[] = [];

    if (background !== "none") {
      parts.push(el("rect", { width, height, fill: color(parseColor(background)) }));
    }
    if (!hideChrome) {
      parts.push(drawChrome(proj));
    }

    const layers = this.layers.map(l => drawLayer(l, proj, width, height)).join("");
    if (this.options.domain) {
      // Fixed limits: keep layers from spilling past them
      const vp = proj.viewport;
      const clipShape = proj.kind === "polar"
        ? el("circle", {
          cx: vp.x + vp.width / 2,
          cy: vp.y + vp.height / 2,
          r: Math.min(vp.width, vp.height) / 2,
        })
        : el("rect", { x: vp.x, y: vp.y, width: vp.width, height: vp.height });
      const clipId = `${id}-clip`;
      parts.push(el("defs", {}, el("clipPath", { id: clipId }, clipShape)));
      parts.push(el("g", { "clip-path": `url(#${clipId})` }, layers));
    } else {
      parts.push(layers);
    }
    return parts.join("\n");
  }

  toSvg(): string {
    return svgDocument(this.options.width, this.options.height, this.toSvgBody());
  }

  render(): RenderedImage {
    const svg = this.toSvg();
    return { svg, ...rasterize(svg) };
  }
}

export interface PanelOptions {
  columns: number;
  /** Space between panels in pixels. */
  gap: number;
  background: string;
}

/**
 * Lays plots out left to right, top to bottom, on one canvas. Each cell is as
 * large as the largest plot.
 */
export function composePanels(plots: readonly Plot[], options: Partial<PanelOptions> = {}): string {
  if (plots.length === 0) throw new RangeError("composePanels: at least one plot is required");
  const { columns = plots.length, gap = 0, background = DEFAULT_BACKGROUND } = options;
  if (!Number.isInteger(columns) || columns < 1) {
    throw new RangeError(`composePanels: columns must be a positive integer, got ${columns}`);
  }
  const cellW = Math.max(...plots.map(p => p.options.width));
  const cellH = Math.max(...plots.map(p => p.options.height));
  const rows = Math.ceil(plots.length / columns);
  const width = columns * cellW + (columns - 1) * gap;
  const height = rows * cellH + (rows - 1) * gap;

  const parts: string[] = [];
  if (background !== "none") {
    parts.push(el("rect", { width, height, fill: color(parseColor(background)) }));
  }
  plots.forEach((plot, i) => {
    const col = i % columns;
    const row = Math.floor(i / columns);
    parts.push(el("svg", {
      x: col * (cellW + gap),
      y: row * (cellH + gap),
      width: plot.options.width,
      height: plot.options.height,
      viewBox: `0 0 ${plot.options.width} ${plot.options.height}`,
    }, plot.toSvgBody(`${plot.options.id}-${i}`)));
  });
  return svgDocument(width, height, parts.join("\n"));
}

export function renderPanels(plots: readonly Plot[], options: Partial<PanelOptions> = {}): RenderedImage {
  const svg = composePanels(plots, options);
  return { svg, ...rasterize(svg) };
}
