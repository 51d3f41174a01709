/**
 * Conway's B3/S23 rule on a finite grid.
 */

import { type LifeGrid, cellIndex, inBounds } from '../core/grid.js';
import { type GridFailure, gridFailure } from '../core/failure.js';

/**
 * Moore neighborhood offsets as [dx, dy].
 */
export const NEIGHBOR_OFFSETS: ReadonlyArray<readonly [number, number]> = Object.freeze([
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
] as const);

/**
 * Count live cells among the in-bounds neighbors of (x, y).
 * Neighbors outside the grid are skipped; the grid does not wrap.
 *
 * @returns 0-8, or NOT_INITIALIZED if the grid has no storage
 */
export function countLiveNeighbors(grid: LifeGrid, x: number, y: number): number | GridFailure {
  const cells = grid.cells;
  if (cells === null) {
    return gridFailure('NOT_INITIALIZED', 'countLiveNeighbors on a grid without storage');
  }

  let n = 0;
  for (const [dx, dy] of NEIGHBOR_OFFSETS) {
    const nx = x + dx;
    const ny = y + dy;
    if (!inBounds(grid, nx, ny)) continue;
    if (cells[cellIndex(grid, nx, ny)] === 1) n++;
  }
  return n;
}

/**
 * Next state of a cell.
 *
 * A live cell survives with 2 or 3 live neighbors; a dead cell comes alive
 * with exactly 3. Everything else is dead.
 */
export function nextCellState(isAlive: boolean, liveNeighbors: number): boolean {
  const survive = isAlive && (liveNeighbors === 2 || liveNeighbors === 3);
  const reproduce = !isAlive && liveNeighbors === 3;
  return survive || reproduce;
}
