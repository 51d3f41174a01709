/**
 * Text rendering of Life grids.
 */

import type { LifeGrid } from '../core/grid.js';
import { type GridFailure, gridFailure } from '../core/failure.js';

/**
 * Characters used for live and dead cells.
 */
export interface RenderChars {
  readonly alive: string;
  readonly dead: string;
}

export const DEFAULT_RENDER_CHARS: RenderChars = Object.freeze({ alive: 'X', dead: 'O' });

function isSingleChar(value: string | undefined): value is string {
  return value !== undefined && [...value].length === 1;
}

/**
 * Fill in missing or malformed members of a character pair from the defaults.
 * Each member must be exactly one character (code point) to be used.
 */
export function resolveRenderChars(chars?: Partial<RenderChars>): RenderChars {
  const alive = chars?.alive;
  const dead = chars?.dead;
  return {
    alive: isSingleChar(alive) ? alive : DEFAULT_RENDER_CHARS.alive,
    dead: isSingleChar(dead) ? dead : DEFAULT_RENDER_CHARS.dead,
  };
}

/**
 * Read a two-character palette string, alive char first (e.g. "X ").
 *
 * @throws Error if the string is not exactly two characters
 */
export function parseRenderChars(pair: string): RenderChars {
  const chars = [...pair];
  if (chars.length !== 2) {
    throw new Error(
      `Invalid character pair: ${JSON.stringify(pair)}\n` +
      `  Expected exactly 2 characters (alive, dead), got ${chars.length}`
    );
  }
  return { alive: chars[0], dead: chars[1] };
}

/**
 * Render the grid as `rows` lines of `cols` characters separated by '\n',
 * with no trailing newline.
 *
 * @example
 * // 2x3 grid [#.#|.#.]
 * renderGrid(grid, { alive: '#', dead: '.' }) // "#.#\n.#."
 *
 * @returns The text, NOT_INITIALIZED if the grid has no storage, or
 *          NO_MEMORY if the text cannot be built
 */
export function renderGrid(grid: LifeGrid, chars?: Partial<RenderChars>): string | GridFailure {
  const cells = grid.cells;
  if (cells === null) {
    return gridFailure('NOT_INITIALIZED', 'renderGrid on a grid without storage');
  }

  const { alive, dead } = resolveRenderChars(chars);
  try {
    const lines: string[] = [];
    for (let y = 0; y < grid.rows; y++) {
      let line = '';
      for (let x = 0; x < grid.cols; x++) {
        line += cells[y * grid.cols + x] === 1 ? alive : dead;
      }
      lines.push(line);
    }
    return lines.join('\n');
  } catch (e) {
    if (e instanceof RangeError) {
      return gridFailure('NO_MEMORY', `Cannot build grid text: ${e.message}`);
    }
    throw e;
  }
}
