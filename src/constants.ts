// ── Output ──

/** Directory the generator scripts write their images into, relative to the working directory. */
export const OUTPUT_DIR = "out";

/** Seed shared by the scripts' stochastic stages. */
export const DEFAULT_SEED = "point-field";

// ── Rendering ──

/** Default canvas width in pixels. */
export const DEFAULT_WIDTH = 1000;

/** Default canvas height in pixels. */
export const DEFAULT_HEIGHT = 1000;

/** Space in pixels kept free between the canvas edge and the plotted domain. */
export const DEFAULT_PADDING = 20;

/** Default canvas background. "none" leaves the PNG transparent. */
export const DEFAULT_BACKGROUND = "white";

/** Default marker colour (grey). */
export const DEFAULT_POINT_COLOR = 0x808080;

/** Default marker area in square pixels. */
export const DEFAULT_POINT_SIZE = 1;

/** Default marker opacity. */
export const DEFAULT_POINT_OPACITY = 1;

/** Default stroke width in pixels for paths, arrows and rectangle outlines. */
export const DEFAULT_STROKE_WIDTH = 1;

/** Arrow head length as a fraction of the arrow length. */
export const ARROW_HEAD_RATIO = 0.3;

/** Arrows shorter than this many pixels are not drawn. */
export const MIN_ARROW_PX = 0.5;

/** Decimal places kept for coordinates written into SVG markup. */
export const SVG_PRECISION = 2;

// ── Chrome ──

/** Panel fill behind the data when chrome is visible. */
export const PANEL_COLOR = 0xebebeb;

/** Grid line colour when chrome is visible. */
export const GRID_COLOR = 0xffffff;

/** Axis text colour when chrome is visible. */
export const AXIS_TEXT_COLOR = 0x4d4d4d;

/** Approximate number of ticks per axis. */
export const TICK_COUNT = 5;

/** Axis label font size in pixels. */
export const AXIS_FONT_SIZE = 11;

// ── Colour scales ──

/** Colour stops of the default continuous scale: dark navy to light blue. */
export const CONTINUOUS_LOW = 0x132b43;
export const CONTINUOUS_HIGH = 0x56b1f7;

// ── Flow field ──

/** Node vectors closer than this to the sample position are returned as-is. */
export const FLOW_NODE_EPSILON = 1e-9;

/** Default number of advection steps per particle. */
export const DEFAULT_LIFESPAN = 100;
