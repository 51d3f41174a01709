/**
 * Generation step.
 */

import { type LifeGrid, cellIndex, duplicateGrid, releaseGrid } from '../core/grid.js';
import { type GridFailure, gridFailure, isGridFailure } from '../core/failure.js';
import { countLiveNeighbors, nextCellState } from '../rules/conway.js';

/**
 * Advance the grid one generation in place.
 *
 * Every cell's next state is computed from a snapshot of the current
 * generation, so no cell sees a neighbor's already-updated state. The
 * snapshot is released before returning, on failure as well as success.
 *
 * @returns true, NOT_INITIALIZED if the grid has no storage, or NO_MEMORY
 *          if the snapshot cannot be allocated
 */
export function advanceGrid(grid: LifeGrid): true | GridFailure {
  const snapshot = duplicateGrid(grid);
  if (isGridFailure(snapshot)) {
    return snapshot;
  }

  try {
    const cells = grid.cells;
    if (cells === null) {
      return gridFailure('NOT_INITIALIZED', 'advanceGrid on a grid without storage');
    }

    for (let y = 0; y < grid.rows; y++) {
      for (let x = 0; x < grid.cols; x++) {
        const pos = cellIndex(grid, x, y);
        // Read from the snapshot; cells may already hold next-generation values
        const liveNeighbors = countLiveNeighbors(snapshot, x, y);
        if (isGridFailure(liveNeighbors)) {
          return liveNeighbors;
        }
        cells[pos] = nextCellState(cells[pos] === 1, liveNeighbors) ? 1 : 0;
      }
    }
    return true;
  } finally {
    releaseGrid(snapshot);
  }
}
