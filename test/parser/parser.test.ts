/**
 * Tests for the pattern parser.
 */

import { describe, it, expect } from 'vitest';
import { parseGrid, placePattern, centerOrigin } from '../../src/lib/parser/parser.js';
import { renderGrid } from '../../src/lib/renderer/text.js';
import { countAlive, createUninitializedGrid, getCell } from '../../src/lib/core/grid.js';
import { HASH_DOT, gridFromRows, mustInit, rowsOf } from '../helpers.js';

describe('parseGrid', () => {
  it('parses rows of alive and dead characters', () => {
    const grid = parseGrid('#.#\n.#.', HASH_DOT);
    expect(grid).toEqual({
      rows: 2,
      cols: 3,
      cells: Uint8Array.from([1, 0, 1, 0, 1, 0]),
    });
  });

  it('uses X and O by default', () => {
    const grid = parseGrid('XO\nOX');
    expect(grid.cells).toEqual(Uint8Array.from([1, 0, 0, 1]));
  });

  it('ignores carriage returns and a final newline', () => {
    const grid = parseGrid('#.\r\n.#\r\n', HASH_DOT);
    expect(grid).toEqual({ rows: 2, cols: 2, cells: Uint8Array.from([1, 0, 0, 1]) });
  });

  it('is the inverse of renderGrid', () => {
    const text = '.#...\n..#..\n###..\n.....';
    expect(renderGrid(parseGrid(text, HASH_DOT), HASH_DOT)).toBe(text);
  });

  it('reads a palette of characters outside the basic multilingual plane', () => {
    const chars = { alive: '🟩', dead: '⬛' };
    const grid = parseGrid('🟩⬛\n⬛🟩', chars);
    expect(grid).toEqual({ rows: 2, cols: 2, cells: Uint8Array.from([1, 0, 0, 1]) });
    expect(renderGrid(grid, chars)).toBe('🟩⬛\n⬛🟩');
  });

  it('rejects rows of different lengths', () => {
    expect(() => parseGrid('##\n#\n##', HASH_DOT)).toThrow(
      'Inconsistent row lengths in pattern\n' +
      '  Expected: 2 columns (from row 0)\n' +
      '  Mismatched rows:\n' +
      '    Row 1: 1 columns - "#"\n' +
      '  All rows must have the same number of cells'
    );
  });

  it('rejects unknown characters', () => {
    expect(() => parseGrid('#.\n.x', HASH_DOT)).toThrow(
      "Invalid cell character: 'x'\n" +
      '  Row 1: ".x"\n' +
      '  Position: column 1\n' +
      "  Valid characters: '#' (alive), '.' (dead)"
    );
  });

  it('rejects empty text', () => {
    expect(() => parseGrid('', HASH_DOT)).toThrow('Pattern is empty');
  });

  it('rejects identical alive and dead characters', () => {
    expect(() => parseGrid('##', { alive: '#', dead: '#' })).toThrow(
      "Alive and dead characters must differ, both are '#'"
    );
  });
});

describe('placePattern', () => {
  it('copies live cells at the origin', () => {
    const grid = mustInit(4, 5);
    const glider = gridFromRows(
      '.#.',
      '..#',
      '###',
    );
    expect(placePattern(grid, glider, 1, 1)).toBe(true);
    expect(rowsOf(grid)).toEqual([
      '.....',
      '..#..',
      '...#.',
      '.###.',
    ]);
  });

  it('clips cells that fall outside the grid', () => {
    const grid = mustInit(3, 3);
    const block = gridFromRows('##', '##');
    placePattern(grid, block, 2, 2);
    expect(countAlive(grid)).toBe(1);
    expect(getCell(grid, 2, 2)).toBe(true);
  });

  it('leaves cells under dead pattern cells unchanged', () => {
    const grid = gridFromRows('##', '##');
    placePattern(grid, gridFromRows('..', '..'), 0, 0);
    expect(countAlive(grid)).toBe(4);
  });

  it('returns NOT_INITIALIZED when either grid has no storage', () => {
    const grid = mustInit(2, 2);
    expect(placePattern(grid, createUninitializedGrid(), 0, 0)).toEqual({
      reason: 'NOT_INITIALIZED',
      details: 'placePattern needs two grids with storage',
    });
    expect(placePattern(createUninitializedGrid(), grid, 0, 0)).toEqual({
      reason: 'NOT_INITIALIZED',
      details: 'placePattern needs two grids with storage',
    });
  });
});

describe('centerOrigin', () => {
  it('centers a pattern, rounding toward the top left', () => {
    expect(centerOrigin(mustInit(5, 5), gridFromRows('###'))).toEqual([1, 2]);
    expect(centerOrigin(mustInit(4, 6), gridFromRows('#', '#', '#'))).toEqual([2, 0]);
  });
});
