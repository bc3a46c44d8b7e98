/* eslint-disable no-console */
/**
 * Sine-sheared grid plotted in polar coordinates.
 *
 * Usage: npm run art:polar-swirl
 *
 * Samples the square -10..10 at a 0.01 step (2001 x 2001 points), colours each
 * point by |sin(x)| of its source position, shears it with
 * x' = x + y + π·sin(y), y' = y + π·sin(x), then plots x' as angle and y' as
 * radius without axes.
 */

import { cartesianGrid } from "../src/field/grid";
import { transformField, sineShear } from "../src/field/transforms";
import { mapColor, withConstant } from "../src/field/attributes";
import { gradientColor } from "../src/utils/color-utils";
import { Plot } from "../src/rendering/plot";
import { outputPath, savePng } from "../src/rendering/output";

const RANGE = { from: -10, to: 10, step: 0.01 };
const POINT_OPACITY = 0.5;
const POINT_SIZE = 0.2;
const IMAGE_SIZE = 1200;

async function main() {
  const t0 = performance.now();

  const grid = cartesianGrid(RANGE);
  console.error(`Generated ${grid.count} points`);

  const coloured = mapColor(grid, x => gradientColor(Math.abs(Math.sin(x))));
  const field = withConstant(transformField(coloured, sineShear()), {
    size: POINT_SIZE,
    opacity: POINT_OPACITY,
  });

  const image = new Plot({ width: IMAGE_SIZE, height: IMAGE_SIZE, coordinates: "polar", hideChrome: true })
    .addPoints(field, { mode: "density" })
    .render();

  const file = outputPath("polar-swirl");
  await savePng(image, file);
  console.error(`Wrote ${file} (${image.width}x${image.height}) in ${(performance.now() - t0).toFixed(0)} ms`);
}

main().catch(err => { console.error(err); process.exit(1); });
