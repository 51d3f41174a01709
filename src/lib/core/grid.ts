/**
 * Core data structure for Life grids.
 */

import { type GridFailure, gridFailure, isGridFailure } from './failure.js';

// =============================================================================
// Grid Structure
// =============================================================================

/**
 * A finite 2D grid of cells stored row-major (index = y * cols + x), one
 * byte per cell: 1 alive, 0 dead.
 *
 * A grid is either uninitialized (`cells === null`, rows/cols meaningless) or
 * initialized with exactly `rows * cols` cells. Each grid owns its storage;
 * no two grids share a cells array.
 */
export interface LifeGrid {
  rows: number;
  cols: number;
  cells: Uint8Array | null;
}

/**
 * A grid whose cell storage has been allocated.
 */
export type InitializedGrid = LifeGrid & { cells: Uint8Array };

export function isInitialized(grid: LifeGrid): grid is InitializedGrid {
  return grid.cells !== null;
}

/**
 * Create a grid in the uninitialized state.
 */
export function createUninitializedGrid(): LifeGrid {
  return { rows: 0, cols: 0, cells: null };
}

/**
 * Run an allocation, turning the runtime's RangeError into NO_MEMORY.
 */
function allocate<T>(what: string, fn: () => T): T | GridFailure {
  try {
    return fn();
  } catch (e) {
    if (e instanceof RangeError) {
      return gridFailure('NO_MEMORY', `Cannot allocate ${what}: ${e.message}`);
    }
    throw e;
  }
}

// =============================================================================
// Lifecycle
// =============================================================================

/**
 * Allocate a rows × cols grid with every cell dead.
 *
 * Dimensions are not validated beyond what the runtime can allocate; callers
 * should treat non-positive dimensions as a usage error.
 *
 * @returns The new grid, or NO_MEMORY if the storage cannot be allocated
 */
export function initGrid(rows: number, cols: number): InitializedGrid | GridFailure {
  const cells = allocate(`${rows}x${cols} grid`, () => new Uint8Array(rows * cols));
  if (isGridFailure(cells)) {
    return cells;
  }
  return { rows, cols, cells };
}

/**
 * Drop the grid's storage and reset it to the uninitialized state.
 * Calling this on an uninitialized grid, or twice, is a no-op.
 */
export function releaseGrid(grid: LifeGrid): void {
  grid.cells = null;
  grid.rows = 0;
  grid.cols = 0;
}

/**
 * Deep copy a grid. The copy owns its own storage.
 *
 * An uninitialized source yields an uninitialized copy with the same
 * rows/cols; that is not a failure.
 */
export function duplicateGrid(src: LifeGrid): LifeGrid | GridFailure {
  const source = src.cells;
  if (source === null) {
    return { rows: src.rows, cols: src.cols, cells: null };
  }
  const cells = allocate('grid copy', () => source.slice());
  if (isGridFailure(cells)) {
    return cells;
  }
  return { rows: src.rows, cols: src.cols, cells };
}

// =============================================================================
// Cell Access
// =============================================================================

/**
 * Row-major index of (x, y). No bounds checking.
 */
export function cellIndex(grid: LifeGrid, x: number, y: number): number {
  return y * grid.cols + x;
}

export function inBounds(grid: LifeGrid, x: number, y: number): boolean {
  return x >= 0 && x < grid.cols && y >= 0 && y < grid.rows;
}

/**
 * Get the cell at (x, y).
 *
 * @returns Whether the cell is alive, or undefined if the grid is
 *          uninitialized or the position is out of bounds
 */
export function getCell(grid: LifeGrid, x: number, y: number): boolean | undefined {
  if (grid.cells === null || !inBounds(grid, x, y)) {
    return undefined;
  }
  return grid.cells[cellIndex(grid, x, y)] === 1;
}

/**
 * Set the cell at (x, y).
 *
 * @returns false if the grid is uninitialized or the position is out of bounds
 */
export function setCell(grid: LifeGrid, x: number, y: number, alive: boolean): boolean {
  if (grid.cells === null || !inBounds(grid, x, y)) {
    return false;
  }
  grid.cells[cellIndex(grid, x, y)] = alive ? 1 : 0;
  return true;
}

/**
 * Number of live cells. Zero for an uninitialized grid.
 */
export function countAlive(grid: LifeGrid): number {
  if (grid.cells === null) {
    return 0;
  }
  let n = 0;
  for (const cell of grid.cells) {
    if (cell === 1) n++;
  }
  return n;
}
