/**
 * Example stepping a blinker by hand.
 *
 * This shows how to:
 * 1. Parse a pattern from text
 * 2. Place it on a larger grid
 * 3. Advance and render a few generations
 * 4. Release the grid when done
 */

import {
  advanceGrid,
  centerOrigin,
  initGrid,
  isGridFailure,
  parseGrid,
  placePattern,
  releaseGrid,
  renderGrid,
} from '../src/lib/index.js';

const chars = { alive: '#', dead: '.' };

const grid = initGrid(5, 7);
if (isGridFailure(grid)) {
  throw new Error(`Cannot create grid: ${grid.reason}`);
}

const blinker = parseGrid('###', chars);
const [x, y] = centerOrigin(grid, blinker);
placePattern(grid, blinker, x, y);

for (let generation = 0; generation < 3; generation++) {
  const text = renderGrid(grid, chars);
  if (isGridFailure(text)) {
    throw new Error(`Cannot render grid: ${text.reason}`);
  }
  console.log(`=== Generation ${generation} ===\n${text}\n`);

  const advanced = advanceGrid(grid);
  if (isGridFailure(advanced)) {
    throw new Error(`Cannot advance grid: ${advanced.reason}`);
  }
}

releaseGrid(grid);
