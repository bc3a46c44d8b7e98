import type { Bounds, Field, Path } from "../types/field-types";

/** Builds a field from coordinate arrays, checking that every attribute has one entry per point. */
export function createField(
  x: Float64Array,
  y: Float64Array,
  attrs: Pick<Field, "color" | "size" | "opacity"> = {},
): Field {
  if (x.length !== y.length) {
    throw new RangeError(`createField: x has ${x.length} entries but y has ${y.length}`);
  }
  const count = x.length;
  for (const [name, arr] of Object.entries(attrs)) {
    if (arr && arr.length !== count) {
      throw new RangeError(`createField: ${name} has ${arr.length} entries, expected ${count}`);
    }
  }
  return { count, x, y, ...attrs };
}

/** Wraps a polyline's vertices as a field, e.g. to style trail points individually. */
export function fieldFromPath(path: Path): Field {
  return createField(path.x, path.y);
}

function extent(xs: ArrayLike<number>, ys: ArrayLike<number>): Bounds | null {
  let xMin = Infinity, xMax = -Infinity, yMin = Infinity, yMax = -Infinity;
  for (let i = 0; i < xs.length; i++) {
    const x = xs[i];
    const y = ys[i];
    // Points with a non-finite coordinate are never drawn
    if (!Number.isFinite(x) || !Number.isFinite(y)) continue;
    if (x < xMin) xMin = x;
    if (x > xMax) xMax = x;
    if (y < yMin) yMin = y;
    if (y > yMax) yMax = y;
  }
  return xMin <= xMax ? { xMin, xMax, yMin, yMax } : null;
}

/** Extent of the finite points of a field, or null when there are none. */
export function fieldBounds(field: Field): Bounds | null {
  return extent(field.x, field.y);
}

export function pathBounds(path: Path): Bounds | null {
  return extent(path.x, path.y);
}

export function unionBounds(a: Bounds | null, b: Bounds | null): Bounds | null {
  if (!a) return b;
  if (!b) return a;
  return {
    xMin: Math.min(a.xMin, b.xMin),
    xMax: Math.max(a.xMax, b.xMax),
    yMin: Math.min(a.yMin, b.yMin),
    yMax: Math.max(a.yMax, b.yMax),
  };
}

/** Widens zero-width extents by 1 on each side so they can be projected. */
export function expandDegenerate(b: Bounds): Bounds {
  const { xMin, xMax, yMin, yMax } = b;
  return {
    xMin: xMax > xMin ? xMin : xMin - 1,
    xMax: xMax > xMin ? xMax : xMax + 1,
    yMin: yMax > yMin ? yMin : yMin - 1,
    yMax: yMax > yMin ? yMax : yMax + 1,
  };
}
