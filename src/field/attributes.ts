import { MathUtils } from "three";
import { createField } from "../utils/field-utils";
import type { Field } from "../types/field-types";

/** Derives one attribute value from a point's coordinates and its index in the field. */
export type AttributeFn = (x: number, y: number, index: number) => number;

export function mapColor(field: Field, fn: AttributeFn): Field {
  const color = new Uint32Array(field.count);
  for (let i = 0; i < field.count; i++) {
    color[i] = MathUtils.clamp(Math.round(fn(field.x[i], field.y[i], i)), 0, 0xffffff);
  }
  return createField(field.x, field.y, { color, size: field.size, opacity: field.opacity });
}

/** Sizes are marker areas in square pixels; negative results become 0 (not drawn). */
export function mapSize(field: Field, fn: AttributeFn): Field {
  const size = new Float32Array(field.count);
  for (let i = 0; i < field.count; i++) {
    const s = fn(field.x[i], field.y[i], i);
    size[i] = Number.isFinite(s) ? Math.max(0, s) : 0;
  }
  return createField(field.x, field.y, { color: field.color, size, opacity: field.opacity });
}

/** Opacities are clamped to [0, 1]. */
export function mapOpacity(field: Field, fn: AttributeFn): Field {
  const opacity = new Float32Array(field.count);
  for (let i = 0; i < field.count; i++) {
    const a = fn(field.x[i], field.y[i], i);
    opacity[i] = Number.isFinite(a) ? MathUtils.clamp(a, 0, 1) : 0;
  }
  return createField(field.x, field.y, { color: field.color, size: field.size, opacity });
}

export interface ConstantAttributes {
  color?: number;
  size?: number;
  opacity?: number;
}

/** Sets the given attributes to the same value for every point. */
export function withConstant(field: Field, attrs: ConstantAttributes): Field {
  let out = field;
  const { color, size, opacity } = attrs;
  if (color !== undefined) out = mapColor(out, () => color);
  if (size !== undefined) out = mapSize(out, () => size);
  if (opacity !== undefined) out = mapOpacity(out, () => opacity);
  return out;
}

/**
 * Opacity ramp by point index: the first of `count` points gets `from`,
 * the last gets `to`. Used to fade particle trails along their age.
 */
export function indexFade(count: number, from = 0, to = 1): AttributeFn {
  return (_x, _y, index) => {
    if (count <= 1) return to;
    return MathUtils.lerp(from, to, MathUtils.clamp(index / (count - 1), 0, 1));
  };
}
