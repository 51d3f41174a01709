/**
 * Display loop driving a grid: render, show, wait, advance.
 *
 * The runner owns one grid for the duration of run() and releases it exactly
 * once, whether the loop finishes, is stopped, or an engine call fails.
 * Output and timing are injected so the loop can run without a terminal.
 */

import { type LifeGrid, createUninitializedGrid, initGrid, releaseGrid } from '../core/grid.js';
import { type GridFailure, isGridFailure } from '../core/failure.js';
import { advanceGrid } from '../operations/advance.js';
import { type RandomSource, createSeededRandom, randomizeGrid } from '../operations/randomize.js';
import { renderGrid } from '../renderer/text.js';
import { centerOrigin, parseGrid, placePattern } from '../parser/parser.js';
import { type LifeConfig, resolveSeed } from '../config/config.js';

/**
 * Where frames go.
 */
export interface RunnerOutput {
  /** Clear the previous frame */
  clear(): void;
  /** Show a frame (no trailing newline) */
  write(text: string): void;
}

export type Sleep = (ms: number) => Promise<void>;

export interface RunnerOptions {
  readonly config: LifeConfig;
  readonly output: RunnerOutput;
  readonly sleep: Sleep;
  /** Overrides the seeded source built from config.seed */
  readonly random?: RandomSource;
}

export type RunResult =
  | { readonly ok: true; readonly generations: number }
  | { readonly ok: false; readonly generations: number; readonly failure: GridFailure };

export class LifeRunner {
  private readonly options: RunnerOptions;
  private _grid: LifeGrid = createUninitializedGrid();
  private running = false;
  private stopRequested = false;

  /** Generations advanced during the current or last run */
  generations = 0;

  constructor(options: RunnerOptions) {
    this.options = options;
  }

  /**
   * The grid being run. Uninitialized before run() and after it returns.
   */
  get grid(): Readonly<LifeGrid> {
    return this._grid;
  }

  /**
   * Ask the loop to end after the current frame.
   */
  stop(): void {
    this.stopRequested = true;
  }

  /**
   * Run until the configured number of generations is reached, stop() is
   * called, or an engine operation fails.
   *
   * @throws Error if already running, or if the configured pattern is invalid
   */
  async run(): Promise<RunResult> {
    if (this.running) {
      throw new Error('Runner is already running');
    }
    this.running = true;
    this.stopRequested = false;
    this.generations = 0;

    try {
      const setup = this.setup();
      if (setup !== true) {
        return this.fail(setup);
      }
      return await this.loop();
    } finally {
      releaseGrid(this._grid);
      this.running = false;
    }
  }

  private setup(): true | GridFailure {
    const { config } = this.options;
    const grid = initGrid(config.rows, config.cols);
    if (isGridFailure(grid)) {
      return grid;
    }
    this._grid = grid;

    if (config.pattern !== undefined) {
      const pattern = parseGrid(config.pattern, config.chars);
      const [x, y] = centerOrigin(grid, pattern);
      return placePattern(grid, pattern, x, y);
    }

    const random = this.options.random ?? createSeededRandom(resolveSeed(config));
    return randomizeGrid(grid, random);
  }

  private async loop(): Promise<RunResult> {
    const { config, output, sleep } = this.options;

    for (;;) {
      const text = renderGrid(this._grid, config.chars);
      if (isGridFailure(text)) {
        return this.fail(text);
      }
      output.write(text);

      if (this.stopRequested || this.reachedLimit()) {
        break;
      }
      await sleep(config.delayMs);
      if (this.stopRequested) {
        break;
      }

      const advanced = advanceGrid(this._grid);
      if (isGridFailure(advanced)) {
        return this.fail(advanced);
      }
      this.generations++;
      output.clear();
    }

    return { ok: true, generations: this.generations };
  }

  private reachedLimit(): boolean {
    const limit = this.options.config.generations;
    return limit !== undefined && this.generations >= limit;
  }

  private fail(failure: GridFailure): RunResult {
    console.error(
      `❌ Grid operation failed after ${this.generations} generations: ` +
      `${failure.reason}${failure.details ? ` (${failure.details})` : ''}`
    );
    return { ok: false, generations: this.generations, failure };
  }
}
