/**
 * Random population of a grid.
 */

import type { LifeGrid } from '../core/grid.js';
import { type GridFailure, gridFailure } from '../core/failure.js';

/**
 * Source of uniformly distributed numbers in [0, 1].
 */
export type RandomSource = () => number;

/**
 * Deterministic linear congruential generator.
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 0xffffffff;
  };
}

/**
 * Set every cell alive or dead with even odds.
 *
 * @param random - Defaults to Math.random; pass a seeded source for repeatable grids
 * @returns true, or NOT_INITIALIZED if the grid has no storage
 */
export function randomizeGrid(grid: LifeGrid, random: RandomSource = Math.random): true | GridFailure {
  const cells = grid.cells;
  if (cells === null) {
    return gridFailure('NOT_INITIALIZED', 'randomizeGrid on a grid without storage');
  }
  for (let i = 0; i < cells.length; i++) {
    cells[i] = random() < 0.5 ? 1 : 0;
  }
  return true;
}
