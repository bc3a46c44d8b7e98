import type { Bounds } from "../types/field-types";
import type { CoordinateSystem, Projection, Viewport } from "./renderer-interface";

/** Shrinks the viewport around its centre so that x and y units have the same pixel length. */
export function equalAspectViewport(domain: Bounds, viewport: Viewport): Viewport {
  const dx = domain.xMax - domain.xMin;
  const dy = domain.yMax - domain.yMin;
  const unit = Math.min(viewport.width / dx, viewport.height / dy);
  const width = dx * unit;
  const height = dy * unit;
  return {
    x: viewport.x + (viewport.width - width) / 2,
    y: viewport.y + (viewport.height - height) / 2,
    width,
    height,
  };
}

/** Linear map of the domain onto the viewport, y pointing up. */
export function cartesianProjection(domain: Bounds, viewport: Viewport): Projection {
  const sx = viewport.width / (domain.xMax - domain.xMin);
  const sy = viewport.height / (domain.yMax - domain.yMin);
  const bottom = viewport.y + viewport.height;
  return {
    kind: "cartesian",
    domain,
    viewport,
    project: (x, y) => [
      viewport.x + (x - domain.xMin) * sx,
      bottom - (y - domain.yMin) * sy,
    ],
  };
}

/**
 * x becomes the angle and y the radius.
 *
 * xMin sits at 12 o'clock and the angle grows clockwise, one full turn over
 * the x-domain. yMin sits at the centre and yMax on the largest circle that
 * fits in the viewport.
 */
export function polarProjection(domain: Bounds, viewport: Viewport): Projection {
  const cx = viewport.x + viewport.width / 2;
  const cy = viewport.y + viewport.height / 2;
  const maxRadius = Math.min(viewport.width, viewport.height) / 2;
  const turn = (2 * Math.PI) / (domain.xMax - domain.xMin);
  const radial = maxRadius / (domain.yMax - domain.yMin);
  return {
    kind: "polar",
    domain,
    viewport,
    project: (x, y) => {
      const theta = (x - domain.xMin) * turn;
      const r = (y - domain.yMin) * radial;
      return [cx + r * Math.sin(theta), cy - r * Math.cos(theta)];
    },
  };
}

export function createProjection(kind: CoordinateSystem, domain: Bounds, viewport: Viewport): Projection {
  switch (kind) {
    case "cartesian":
      return cartesianProjection(domain, viewport);
    case "polar":
      return polarProjection(domain, viewport);
  }
}
