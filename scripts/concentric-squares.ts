/* eslint-disable no-console */
/**
 * A 12 x 12 grid of tiles, each holding five nested, rotated square outlines.
 *
 * Usage: npm run art:concentric-squares
 */

import { concentricSquares, DEFAULT_SQUARE_GRID, squareGridDomain } from "../src/shapes/concentric-squares";
import { createRng } from "../src/utils/random";
import { Plot } from "../src/rendering/plot";
import { outputPath, savePng } from "../src/rendering/output";
import { DEFAULT_SEED } from "../src/constants";

const IMAGE_SIZE = 800;

async function main() {
  const t0 = performance.now();
  const rng = createRng(DEFAULT_SEED);

  const rects = concentricSquares(DEFAULT_SQUARE_GRID, rng);
  console.error(`Generated ${rects.length} squares`);

  const image = new Plot({
    width: IMAGE_SIZE,
    height: IMAGE_SIZE,
    aspect: "equal",
    domain: squareGridDomain(DEFAULT_SQUARE_GRID),
  })
    .addRects(rects)
    .render();

  const file = outputPath("concentric-squares");
  await savePng(image, file);
  console.error(`Wrote ${file} (${image.width}x${image.height}) in ${(performance.now() - t0).toFixed(0)} ms`);
}

main().catch(err => { console.error(err); process.exit(1); });
