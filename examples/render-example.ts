/**
 * Example: run a division to completion without a browser and print the SVG.
 *
 * Usage: npm run example -- [seed] [width] [height]
 */

import { Viewport } from '../src/lib/core/geometry.js';
import { About, SeparationChange, createSettings } from '../src/lib/core/settings.js';
import {
  changeSetting,
  done,
  initialize,
  regionCount,
  runToCompletion,
  subdivideStep,
} from '../src/lib/division/index.js';
import { toSvg, view } from '../src/lib/renderer/index.js';

const [seedArg, widthArg, heightArg] = process.argv.slice(2);
const seed = Number(seedArg ?? 42);
const viewport = Viewport(Number(widthArg ?? 800), Number(heightArg ?? 600));

// Example 1: step a few times and look at the partial division
let model = initialize(seed, viewport, createSettings(5, About(50)));
for (let i = 0; i < 10 && !done(model); i++) {
  model = subdivideStep(model);
}
console.error(`After ${model.steps} steps: ${model.pending.length} pending, ${model.leaves.length} leaves`);

// Example 2: thinner borders from here on, then finish
model = runToCompletion(changeSetting(SeparationChange(2), model));
console.error(`Done: ${regionCount(model)} regions in ${model.steps} steps`);

// The SVG goes to stdout so it can be redirected to a file
process.stdout.write(toSvg(view(model)));
