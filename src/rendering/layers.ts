import { MathUtils } from "three";
import { ARROW_HEAD_RATIO, MIN_ARROW_PX } from "../constants";
import { fieldBounds, pathBounds, unionBounds } from "../utils/field-utils";
import { aggregateDensity, densityRuns } from "./density";
import { color, el, fmt, opacityAttr } from "./svg-markup";
import type { Bounds, Point } from "../types/field-types";
import type { Layer, Projection, RectSpec } from "./renderer-interface";

type LayerOf<K extends Layer["kind"]> = Extract<Layer, { kind: K }>;

/** Corners of a rectangle rotated counter-clockwise about its anchor. */
export function rectCorners(rect: RectSpec): Point[] {
  const a = MathUtils.degToRad(rect.angle);
  const cos = Math.cos(a);
  const sin = Math.sin(a);
  const local: [number, number][] = [[0, 0], [rect.width, 0], [rect.width, rect.height], [0, rect.height]];
  return local.map(([dx, dy]) => ({
    x: rect.x + dx * cos - dy * sin,
    y: rect.y + dx * sin + dy * cos,
  }));
}

function boundsOfPoints(xs: number[], ys: number[]): Bounds | null {
  return pathBounds({ x: Float64Array.from(xs), y: Float64Array.from(ys) });
}

/** Data extent of a layer's finite coordinates, or null when it has none. */
export function layerBounds(layer: Layer): Bounds | null {
  switch (layer.kind) {
    case "points":
      return fieldBounds(layer.field);
    case "paths":
      return layer.paths.reduce<Bounds | null>((acc, p) => unionBounds(acc, pathBounds(p)), null);
    case "arrows": {
      const { x, y, u, v } = layer.arrows;
      const s = layer.style.scale;
      const tips = {
        x: x.map((xi, i) => xi + u[i] * s),
        y: y.map((yi, i) => yi + v[i] * s),
      };
      return unionBounds(pathBounds({ x, y }), pathBounds(tips));
    }
    case "rects": {
      const corners = layer.rects.flatMap(rectCorners);
      return boundsOfPoints(corners.map(c => c.x), corners.map(c => c.y));
    }
  }
}

function drawPoints(layer: LayerOf<"points">, proj: Projection, width: number, height: number): string {
  const { field, style } = layer;
  const parts: string[] = [];

  if (style.mode === "density") {
    for (const run of densityRuns(aggregateDensity(field, style, proj, width, height))) {
      parts.push(el("rect", {
        x: run.x,
        y: run.y,
        width: run.width,
        height: 1,
        fill: color(run.color),
        "fill-opacity": opacityAttr(run.opacity),
      }));
    }
    return el("g", { class: "points", "shape-rendering": "crispEdges" }, parts.join(""));
  }

  for (let i = 0; i < field.count; i++) {
    const x = field.x[i];
    const y = field.y[i];
    if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
    const size = field.size ? field.size[i] : style.size;
    const opacity = field.opacity ? field.opacity[i] : style.opacity;
    const r = Math.sqrt(size) / 2;
    if (!(r > 0) || !(opacity > 0)) continue;
    const [cx, cy] = proj.project(x, y);
    parts.push(el("circle", {
      cx,
      cy,
      r,
      fill: color(field.color ? field.color[i] : style.color),
      "fill-opacity": opacityAttr(opacity),
    }));
  }
  return el("g", { class: "points" }, parts.join(""));
}

/** Path data through the projected vertices; a non-finite vertex starts a new subpath. */
export function pathData(xs: ArrayLike<number>, ys: ArrayLike<number>, proj: Projection): string {
  let d = "";
  let pen = false;
  for (let i = 0; i < xs.length; i++) {
    if (!Number.isFinite(xs[i]) || !Number.isFinite(ys[i])) {
      pen = false;
      continue;
    }
    const [px, py] = proj.project(xs[i], ys[i]);
    d += `${pen ? "L" : "M"}${fmt(px)} ${fmt(py)}`;
    pen = true;
  }
  return d;
}

function drawPaths(layer: LayerOf<"paths">, proj: Projection): string {
  const { paths, style } = layer;
  const parts: string[] = [];
  paths.forEach((path, i) => {
    const d = pathData(path.x, path.y, proj);
    if (!d) return;
    const stroke = typeof style.color === "number" ? style.color : style.color[i % style.color.length];
    parts.push(el("path", { d, stroke: color(stroke) }));
  });
  return el("g", {
    class: "paths",
    fill: "none",
    "stroke-width": style.width,
    "stroke-opacity": opacityAttr(style.opacity),
    "stroke-linejoin": "round",
  }, parts.join(""));
}

function drawArrows(layer: LayerOf<"arrows">, proj: Projection): string {
  const { arrows, style } = layer;
  const parts: string[] = [];
  for (let i = 0; i < arrows.x.length; i++) {
    const [x0, y0] = proj.project(arrows.x[i], arrows.y[i]);
    const [x1, y1] = proj.project(arrows.x[i] + arrows.u[i] * style.scale, arrows.y[i] + arrows.v[i] * style.scale);
    const dx = x1 - x0;
    const dy = y1 - y0;
    const len = Math.hypot(dx, dy);
    if (!(len >= MIN_ARROW_PX)) continue;

    // Head: triangle at the tip, ARROW_HEAD_RATIO of the length, half as wide
    const head = len * ARROW_HEAD_RATIO;
    const bx = x1 - (dx / len) * head;
    const by = y1 - (dy / len) * head;
    const nx = (-dy / len) * head * 0.5;
    const ny = (dx / len) * head * 0.5;
    parts.push(el("line", { x1: x0, y1: y0, x2: bx, y2: by }));
    parts.push(el("polygon", {
      points: `${fmt(x1)},${fmt(y1)} ${fmt(bx + nx)},${fmt(by + ny)} ${fmt(bx - nx)},${fmt(by - ny)}`,
      stroke: "none",
    }));
  }
  return el("g", {
    class: "arrows",
    stroke: color(style.color),
    fill: color(style.color),
    "stroke-width": style.width,
    opacity: opacityAttr(style.opacity),
  }, parts.join(""));
}

function drawRects(layer: LayerOf<"rects">, proj: Projection): string {
  const { rects, style } = layer;
  const parts = rects.map(rect => {
    const points = rectCorners(rect)
      .map(c => proj.project(c.x, c.y))
      .map(([px, py]) => `${fmt(px)},${fmt(py)}`)
      .join(" ");
    return el("polygon", {
      points,
      stroke: color(rect.color),
      fill: rect.fill ? color(rect.color) : "none",
    });
  });
  return el("g", {
    class: "rects",
    "stroke-width": style.width,
    opacity: opacityAttr(style.opacity),
  }, parts.join(""));
}

/** SVG group for one layer. `width` and `height` are the canvas size, used by density points. */
export function drawLayer(layer: Layer, proj: Projection, width: number, height: number): string {
  switch (layer.kind) {
    case "points":
      return drawPoints(layer, proj, width, height);
    case "paths":
      return drawPaths(layer, proj);
    case "arrows":
      return drawArrows(layer, proj);
    case "rects":
      return drawRects(layer, proj);
  }
}
