import type { ArrowSet, Bounds, Field, Path } from "../types/field-types";

export type CoordinateSystem = "cartesian" | "polar";

export interface PlotOptions {
  width: number;
  height: number;
  coordinates: CoordinateSystem;
  /** Omit the panel, grid lines and axes. */
  hideChrome: boolean;
  /** CSS colour of the canvas, or "none" for transparent. */
  background: string;
  padding: number;
  /** "equal" keeps one data unit the same length on both axes (Cartesian only). */
  aspect: "free" | "equal";
  /** Fixed limits; any side left out is taken from the data. Layers are clipped to them. */
  domain?: Partial<Bounds>;
  /** Prefix for element ids, unique per plot when several share one document. */
  id: string;
}

/** Pixel rectangle the domain is drawn into. */
export interface Viewport {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Projection {
  readonly kind: CoordinateSystem;
  readonly domain: Bounds;
  readonly viewport: Viewport;
  /** Data coordinates to canvas pixels (y down). */
  project(x: number, y: number): [number, number];
}

/**
 * "vector" draws one circle per point. "density" bins points into canvas
 * pixels first, which keeps very large fields renderable.
 */
export type PointMode = "vector" | "density";

export interface PointStyle {
  /** Used for points without a colour attribute. */
  color: number;
  size: number;
  opacity: number;
  mode: PointMode;
}

export interface PathStyle {
  /** One colour for all paths, or one per path. */
  color: number | readonly number[];
  width: number;
  opacity: number;
}

export interface ArrowStyle {
  color: number;
  width: number;
  opacity: number;
  /** Data units per vector unit. */
  scale: number;
}

export interface RectSpec {
  /** Anchor corner. */
  x: number;
  y: number;
  width: number;
  height: number;
  /** Counter-clockwise rotation about the anchor, in degrees. */
  angle: number;
  color: number;
  fill: boolean;
}

export interface RectStyle {
  width: number;
  opacity: number;
}

export type Layer =
  | { kind: "points"; field: Field; style: PointStyle }
  | { kind: "paths"; paths: readonly Path[]; style: PathStyle }
  | { kind: "arrows"; arrows: ArrowSet; style: ArrowStyle }
  | { kind: "rects"; rects: readonly RectSpec[]; style: RectStyle };

export interface RenderedImage {
  svg: string;
  png: Buffer;
  width: number;
  height: number;
}
