/* eslint-disable no-console */
/**
 * Particles carried through a noise-driven flow field.
 *
 * Usage: npm run art:flow-fields
 *
 * Writes two images: the field itself as arrows (flow-field-vectors.png) and
 * the particle trails (flow-fields.png). Trails are coloured by each
 * particle's spawn position and brighten towards their end.
 */

import { FlowField, noiseFlow } from "../src/simulation/flow-field";
import { ParticleSystem } from "../src/simulation/particle-system";
import { indexFade, mapOpacity, withConstant } from "../src/field/attributes";
import { fieldFromPath } from "../src/utils/field-utils";
import { sinusoidColor } from "../src/utils/color-utils";
import { createRng } from "../src/utils/random";
import { Plot } from "../src/rendering/plot";
import { outputPath, savePng } from "../src/rendering/output";
import { DEFAULT_SEED } from "../src/constants";

const FIELD = { width: 10, height: 10, resolution: 0.25, neighbourhoodSize: 3, decay: "inv_quadratic" };
const NOISE_SEED = 7;
const NOISE_FREQUENCY = 0.2;
const PARTICLES = 400;
const LIFESPAN = 150;
const STEP_SIZE = 0.04;
const TRAIL_COLORS = { a: 20, b: 5, c: 8, d: 5 };
const IMAGE_SIZE = 1000;

async function main() {
  const t0 = performance.now();
  const rng = createRng(DEFAULT_SEED);
  const domain = { xMin: 0, xMax: FIELD.width, yMin: 0, yMax: FIELD.height };

  const field = new FlowField(FIELD);
  field.initField(noiseFlow(NOISE_SEED, NOISE_FREQUENCY));
  console.error(String(field));

  const vectors = new Plot({ width: IMAGE_SIZE, height: IMAGE_SIZE, aspect: "equal", domain })
    .addArrows(field.arrows(), { color: 0x000000, scale: FIELD.resolution * 0.8 })
    .render();
  const vectorsFile = outputPath("flow-field-vectors");
  await savePng(vectors, vectorsFile);
  console.error(`Wrote ${vectorsFile}`);

  const system = new ParticleSystem(PARTICLES, domain, rng, LIFESPAN, sinusoidColor(TRAIL_COLORS));
  const paths = system.flowAll(field, STEP_SIZE);
  console.error(`Advected ${system.count} particles for ${LIFESPAN} steps`);

  const plot = new Plot({ width: IMAGE_SIZE, height: IMAGE_SIZE, background: "black", aspect: "equal", domain })
    .addPaths(paths, { color: system.particles.map(p => p.color), width: 0.6, opacity: 0.35 });
  paths.forEach((path, i) => {
    const trail = mapOpacity(fieldFromPath(path), indexFade(path.x.length, 0.05, 0.8));
    plot.addPoints(withConstant(trail, { color: system.particles[i].color, size: 2 }));
  });

  const image = plot.render();
  const file = outputPath("flow-fields");
  await savePng(image, file);
  console.error(`Wrote ${file} (${image.width}x${image.height}) in ${(performance.now() - t0).toFixed(0)} ms`);
}

main().catch(err => { console.error(err); process.exit(1); });
