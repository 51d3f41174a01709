/**
 * Conway's Game of Life on a finite grid.
 *
 * Engine operations return a GridFailure value instead of throwing when a
 * grid has no storage or memory runs out; parsers and configuration throw.
 */

export type { LifeGrid, InitializedGrid } from './core/grid.js';
export {
  initGrid,
  releaseGrid,
  duplicateGrid,
  createUninitializedGrid,
  isInitialized,
  cellIndex,
  inBounds,
  getCell,
  setCell,
  countAlive,
} from './core/grid.js';
export type { GridFailure, GridFailureReason } from './core/failure.js';
export { gridFailure, isGridFailure } from './core/failure.js';
export { NEIGHBOR_OFFSETS, countLiveNeighbors, nextCellState } from './rules/conway.js';
export type { RandomSource } from './operations/randomize.js';
export { randomizeGrid, createSeededRandom } from './operations/randomize.js';
export { advanceGrid } from './operations/advance.js';
export type { RenderChars } from './renderer/text.js';
export { DEFAULT_RENDER_CHARS, renderGrid, resolveRenderChars, parseRenderChars } from './renderer/text.js';
export { parseGrid, placePattern, centerOrigin } from './parser/parser.js';
export type { LifeConfig } from './config/config.js';
export { DEFAULT_CONFIG, parseConfig, loadConfig, resolveSeed } from './config/config.js';
export type { RunnerOutput, RunnerOptions, RunResult, Sleep } from './runner/life-runner.js';
export { LifeRunner } from './runner/life-runner.js';
