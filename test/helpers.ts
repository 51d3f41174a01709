/**
 * Shared helpers for grid tests.
 */

import { type InitializedGrid, type LifeGrid, initGrid } from '../src/lib/core/grid.js';
import { isGridFailure } from '../src/lib/core/failure.js';
import { parseGrid } from '../src/lib/parser/parser.js';
import { renderGrid } from '../src/lib/renderer/text.js';

export const HASH_DOT = { alive: '#', dead: '.' } as const;

/**
 * initGrid that fails the test instead of returning a failure.
 */
export function mustInit(rows: number, cols: number): InitializedGrid {
  const grid = initGrid(rows, cols);
  if (isGridFailure(grid)) {
    throw new Error(`initGrid(${rows}, ${cols}) failed: ${grid.reason}`);
  }
  return grid;
}

/**
 * Build a grid from rows written with '#' (alive) and '.' (dead).
 */
export function gridFromRows(...rows: string[]): LifeGrid {
  return parseGrid(rows.join('\n'), HASH_DOT);
}

/**
 * Render with '#' and '.', as an array of rows.
 */
export function rowsOf(grid: LifeGrid): string[] {
  const text = renderGrid(grid, HASH_DOT);
  if (isGridFailure(text)) {
    throw new Error(`renderGrid failed: ${text.reason}`);
  }
  return text.split('\n');
}
