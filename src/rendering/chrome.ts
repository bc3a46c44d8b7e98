import { AXIS_FONT_SIZE, AXIS_TEXT_COLOR, GRID_COLOR, PANEL_COLOR, TICK_COUNT } from "../constants";
import { color, el, fmt } from "./svg-markup";
import type { Projection } from "./renderer-interface";

/** Tick positions at 1, 2 or 5 times a power of ten, covering [min, max]. */
export function niceTicks(min: number, max: number, count = TICK_COUNT): number[] {
  const span = max - min;
  if (!(span > 0) || count < 1) return [min];
  const raw = span / count;
  const mag = 10 ** Math.floor(Math.log10(raw));
  const norm = raw / mag;
  const step = (norm < 1.5 ? 1 : norm < 3 ? 2 : norm < 7 ? 5 : 10) * mag;
  const ticks: number[] = [];
  for (let v = Math.ceil(min / step) * step; v <= max + step * 1e-9; v += step) {
    // Strip accumulated floating-point error, e.g. 0.30000000000000004
    ticks.push(Number(v.toPrecision(12)));
  }
  return ticks;
}

function label(n: number): string {
  return String(Number(n.toPrecision(6)));
}

const TEXT_ATTRS = {
  "font-family": "sans-serif",
  "font-size": AXIS_FONT_SIZE,
  fill: color(AXIS_TEXT_COLOR),
};

/** Grey panel, white grid lines at the ticks, tick labels below and left of the panel. */
export function cartesianChrome(proj: Projection): string {
  const { domain, viewport: vp } = proj;
  const parts: string[] = [
    el("rect", { x: vp.x, y: vp.y, width: vp.width, height: vp.height, fill: color(PANEL_COLOR) }),
  ];
  const bottom = vp.y + vp.height;

  for (const t of niceTicks(domain.xMin, domain.xMax)) {
    const [px] = proj.project(t, domain.yMin);
    parts.push(el("line", { x1: px, y1: vp.y, x2: px, y2: bottom, stroke: color(GRID_COLOR) }));
    parts.push(el("text", { x: px, y: bottom + AXIS_FONT_SIZE + 3, "text-anchor": "middle", ...TEXT_ATTRS },
      label(t)));
  }
  for (const t of niceTicks(domain.yMin, domain.yMax)) {
    const [, py] = proj.project(domain.xMin, t);
    parts.push(el("line", { x1: vp.x, y1: py, x2: vp.x + vp.width, y2: py, stroke: color(GRID_COLOR) }));
    parts.push(el("text", { x: vp.x - 4, y: py + AXIS_FONT_SIZE / 3, "text-anchor": "end", ...TEXT_ATTRS },
      label(t)));
  }
  return el("g", { class: "chrome" }, parts.join(""));
}

/** Grey disc, rings at the radius ticks, spokes and labels at the angle ticks. */
export function polarChrome(proj: Projection): string {
  const { domain } = proj;
  const [cx, cy] = proj.project(domain.xMin, domain.yMin);
  const [, topY] = proj.project(domain.xMin, domain.yMax);
  const radius = cy - topY;
  const parts: string[] = [
    el("circle", { cx, cy, r: radius, fill: color(PANEL_COLOR) }),
  ];

  for (const t of niceTicks(domain.yMin, domain.yMax)) {
    const [, py] = proj.project(domain.xMin, t);
    parts.push(el("circle", { cx, cy, r: cy - py, fill: "none", stroke: color(GRID_COLOR) }));
  }
  // xMax lands on the same spoke as xMin
  for (const t of niceTicks(domain.xMin, domain.xMax).filter(t => t < domain.xMax)) {
    const [ex, ey] = proj.project(t, domain.yMax);
    parts.push(el("line", { x1: cx, y1: cy, x2: ex, y2: ey, stroke: color(GRID_COLOR) }));
    const lx = cx + (ex - cx) * 1.06;
    const ly = cy + (ey - cy) * 1.06 + AXIS_FONT_SIZE / 3;
    parts.push(el("text", { x: lx, y: ly, "text-anchor": "middle", ...TEXT_ATTRS }, label(t)));
  }
  return el("g", { class: "chrome" }, parts.join(""));
}

export function drawChrome(proj: Projection): string {
  return proj.kind === "polar" ? polarChrome(proj) : cartesianChrome(proj);
}
