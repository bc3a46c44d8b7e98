/* eslint-disable no-console */
/**
 * Hundreds of thin splines through displaced copies of one set of nodes.
 *
 * Usage: npm run art:splines
 *
 * Eight control nodes are spread along x with random heights. Each line
 * shifts them sideways a little and lifts every node by a random amount
 * plus a small per-line offset, then draws an interpolating spline through
 * them in white on black.
 */

import { displacedCopies, interpolatePath, randomNodes } from "../src/shapes/splines";
import { createRng } from "../src/utils/random";
import { Plot } from "../src/rendering/plot";
import { outputPath, savePng } from "../src/rendering/output";
import { DEFAULT_SEED } from "../src/constants";
import type { Path } from "../src/types/field-types";

const NODES = { count: 8, xMax: 100, yMax: 100, xJitter: 2 };
const LINES = { lines: 500, xJitter: 0.5, yDisplacement: 50, yOffset: 0.1 };
const SAMPLES = 100;
const LINE_WIDTH = 0.15;
const IMAGE_SIZE = 1000;
const PROGRESS_EVERY = 100;

async function main() {
  const t0 = performance.now();
  const rng = createRng(DEFAULT_SEED);

  const nodes = randomNodes(NODES, rng);
  const copies = displacedCopies(nodes, LINES, rng);

  const paths: Path[] = [];
  copies.forEach((copy, i) => {
    paths.push(interpolatePath(copy.x, copy.y, SAMPLES));
    if ((i + 1) % PROGRESS_EVERY === 0) console.error(`Interpolated ${i + 1}/${copies.length} lines`);
  });

  const image = new Plot({
    width: IMAGE_SIZE,
    height: IMAGE_SIZE,
    background: "black",
    domain: { xMin: 0, xMax: NODES.xMax },
  })
    .addPaths(paths, { color: 0xffffff, width: LINE_WIDTH })
    .render();

  const file = outputPath("splines");
  await savePng(image, file);
  console.error(`Wrote ${file} (${image.width}x${image.height}) in ${(performance.now() - t0).toFixed(0)} ms`);
}

main().catch(err => { console.error(err); process.exit(1); });
