/**
 * Parse Life patterns from the text format produced by renderGrid.
 */

import { type LifeGrid, cellIndex, getCell, initGrid, setCell } from '../core/grid.js';
import { type GridFailure, gridFailure, isGridFailure } from '../core/failure.js';
import { type RenderChars, resolveRenderChars } from '../renderer/text.js';

/**
 * Parse a pattern from text.
 *
 * Format (the inverse of renderGrid):
 * - Rows separated by '\n' (a trailing '\r' on a row, and one trailing
 *   newline at the end of the text, are ignored)
 * - One character per cell: the alive char or the dead char
 * - All rows must have the same length
 *
 * @example
 * parseGrid('.#.\n.#.\n.#.', { alive: '#', dead: '.' }) // vertical blinker, 3x3
 *
 * @param text - Pattern text
 * @param chars - Characters for live and dead cells (defaults 'X' / 'O')
 * @returns A new grid holding the pattern
 * @throws Error if parsing fails with detailed diagnostic information
 */
export function parseGrid(text: string, chars?: Partial<RenderChars>): LifeGrid {
  const { alive, dead } = resolveRenderChars(chars);
  if (alive === dead) {
    throw new Error(`Alive and dead characters must differ, both are '${alive}'`);
  }
  if (text.length === 0) {
    throw new Error('Pattern is empty');
  }

  const rowStrings = text.split('\n').map(row => (row.endsWith('\r') ? row.slice(0, -1) : row));
  if (rowStrings.length > 1 && rowStrings[rowStrings.length - 1] === '') {
    rowStrings.pop();
  }
  // Cells are code points, so a palette like '🟩' counts as one column
  const rowCells = rowStrings.map(row => [...row]);
  const cols = rowCells[0].length;

  // Validate all rows have same length
  const mismatched: [number, number][] = [];
  for (let i = 0; i < rowCells.length; i++) {
    if (rowCells[i].length !== cols) {
      mismatched.push([i, rowCells[i].length]);
    }
  }
  if (mismatched.length > 0) {
    let errorMsg =
      `Inconsistent row lengths in pattern\n` +
      `  Expected: ${cols} columns (from row 0)\n` +
      `  Mismatched rows:\n`;
    for (const [rowIdx, actualCols] of mismatched) {
      errorMsg += `    Row ${rowIdx}: ${actualCols} columns - "${rowStrings[rowIdx]}"\n`;
    }
    errorMsg += `  All rows must have the same number of cells`;
    throw new Error(errorMsg);
  }

  const grid = initGrid(rowStrings.length, cols);
  if (isGridFailure(grid)) {
    throw new Error(`Cannot allocate pattern grid: ${grid.details ?? grid.reason}`);
  }
  const cells = grid.cells;

  for (const [rowIdx, row] of rowCells.entries()) {
    for (const [colIdx, ch] of row.entries()) {
      if (ch === alive) {
        cells[cellIndex(grid, colIdx, rowIdx)] = 1;
      } else if (ch !== dead) {
        throw new Error(
          `Invalid cell character: '${ch}'\n` +
          `  Row ${rowIdx}: "${rowStrings[rowIdx]}"\n` +
          `  Position: column ${colIdx}\n` +
          `  Valid characters: '${alive}' (alive), '${dead}' (dead)`
        );
      }
    }
  }

  return grid;
}

/**
 * Copy the live cells of a pattern into a grid with the pattern's top-left
 * corner at (originX, originY). Cells falling outside the grid are dropped;
 * dead pattern cells leave the grid unchanged.
 *
 * @returns true, or NOT_INITIALIZED if either grid has no storage
 */
export function placePattern(
  grid: LifeGrid,
  pattern: LifeGrid,
  originX: number,
  originY: number
): true | GridFailure {
  if (grid.cells === null || pattern.cells === null) {
    return gridFailure('NOT_INITIALIZED', 'placePattern needs two grids with storage');
  }
  for (let y = 0; y < pattern.rows; y++) {
    for (let x = 0; x < pattern.cols; x++) {
      if (getCell(pattern, x, y)) {
        setCell(grid, originX + x, originY + y, true);
      }
    }
  }
  return true;
}

/**
 * Origin that centers a pattern in a grid.
 */
export function centerOrigin(grid: LifeGrid, pattern: LifeGrid): [number, number] {
  return [
    Math.floor((grid.cols - pattern.cols) / 2),
    Math.floor((grid.rows - pattern.rows) / 2),
  ];
}
