/* eslint-disable no-console */
/**
 * Six wave-distorted point grids side by side.
 *
 * Usage: npm run art:point-distortions
 *
 * Each panel distorts a 150 x 150 integer grid with
 * x' = a·sin(x) + b·cos(y) + c·sin(x / y), y' = a·cos(x') + d·sin(y),
 * sweeping a from 0.2 down to -0.3 while b, c, d stay fixed. Marker area
 * follows x'·y' + 0.4, so points with a negative product vanish.
 */

import { integerGrid, linspace } from "../src/field/grid";
import { transformField, waveDistortion } from "../src/field/transforms";
import { mapSize } from "../src/field/attributes";
import { Plot, renderPanels } from "../src/rendering/plot";
import { outputPath, savePng } from "../src/rendering/output";

const GRID_SIZE = 150;
const PANELS = 6;
const A_RANGE = [0.2, -0.3] as const;
const B = 2;
const C = 1;
const D = 0.4;
const POINT_OPACITY = 0.4;
const PANEL_SIZE = 300;

async function main() {
  const t0 = performance.now();

  const plots = Array.from(linspace(A_RANGE[0], A_RANGE[1], PANELS)).map((a, i) => {
    const distorted = transformField(integerGrid(GRID_SIZE, GRID_SIZE), waveDistortion({ a, b: B, c: C, d: D }));
    const field = mapSize(distorted, (x, y) => x * y + 0.4);
    console.error(`Panel ${i + 1}/${PANELS}: a = ${a.toFixed(2)}, ${field.count} points`);
    return new Plot({ width: PANEL_SIZE, height: PANEL_SIZE, hideChrome: true, id: "distortion" })
      .addPoints(field, { opacity: POINT_OPACITY });
  });

  const image = renderPanels(plots, { columns: PANELS });
  const file = outputPath("point-distortions");
  await savePng(image, file);
  console.error(`Wrote ${file} (${image.width}x${image.height}) in ${(performance.now() - t0).toFixed(0)} ms`);
}

main().catch(err => { console.error(err); process.exit(1); });
