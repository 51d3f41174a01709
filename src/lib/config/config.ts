/**
 * Runtime configuration for the Life display loop.
 *
 * Configuration files are JSON5 (unquoted keys, trailing commas and
 * comments are fine):
 *
 *     {
 *       rows: 30,
 *       cols: 120,
 *       delayMs: 100,
 *       chars: 'X ',      // alive, dead
 *       seed: 42,         // omit to seed from the clock
 *       generations: 500, // omit to run until interrupted
 *       pattern: ['.X.', '.X.', '.X.'], // optional; replaces the random start
 *     }
 */

import { readFile } from 'node:fs/promises';
import JSON5 from 'json5';
import { type RenderChars, parseRenderChars } from '../renderer/text.js';

export interface LifeConfig {
  readonly rows: number;
  readonly cols: number;
  /** Wait between frames, in milliseconds */
  readonly delayMs: number;
  readonly chars: RenderChars;
  readonly seed?: number;
  /** Number of generations to run; undefined runs until stopped */
  readonly generations?: number;
  /** Starting pattern in `chars`, centered on an otherwise dead grid */
  readonly pattern?: string;
}

export const DEFAULT_CONFIG: LifeConfig = Object.freeze({
  rows: 30,
  cols: 120,
  delayMs: 100,
  chars: Object.freeze({ alive: 'X', dead: ' ' }),
});

const KNOWN_KEYS = new Set(['rows', 'cols', 'delayMs', 'chars', 'seed', 'generations', 'pattern']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(raw: Record<string, unknown>, key: string, min: number): number | undefined {
  const value = raw[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new Error(`Config '${key}' must be an integer >= ${min}, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readPattern(raw: Record<string, unknown>): string | undefined {
  const value = raw.pattern;
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value) && value.every((row): row is string => typeof row === 'string')) {
    return value.join('\n');
  }
  throw new Error(`Config 'pattern' must be a string or an array of row strings`);
}

/**
 * Parse and validate configuration text. Missing keys take their defaults.
 *
 * @throws Error naming the offending key if the text is not valid JSON5 or a
 *         value is out of range
 */
export function parseConfig(text: string): LifeConfig {
  let raw: unknown;
  try {
    raw = JSON5.parse(text);
  } catch (e) {
    throw new Error(`Invalid JSON5: ${e instanceof Error ? e.message : String(e)}`);
  }

  if (!isRecord(raw)) {
    throw new Error('Expected a JSON object of configuration values');
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`⚠️ Ignoring unknown config key '${key}'`);
    }
  }

  let chars = DEFAULT_CONFIG.chars;
  const rawChars = raw.chars;
  if (rawChars !== undefined) {
    if (typeof rawChars !== 'string') {
      throw new Error(`Config 'chars' must be a two-character string, got ${JSON.stringify(rawChars)}`);
    }
    chars = parseRenderChars(rawChars);
  }

  const seed = readInteger(raw, 'seed', Number.MIN_SAFE_INTEGER);
  const generations = readInteger(raw, 'generations', 0);
  const pattern = readPattern(raw);

  return {
    rows: readInteger(raw, 'rows', 1) ?? DEFAULT_CONFIG.rows,
    cols: readInteger(raw, 'cols', 1) ?? DEFAULT_CONFIG.cols,
    delayMs: readInteger(raw, 'delayMs', 0) ?? DEFAULT_CONFIG.delayMs,
    chars,
    ...(seed !== undefined ? { seed } : {}),
    ...(generations !== undefined ? { generations } : {}),
    ...(pattern !== undefined ? { pattern } : {}),
  };
}

/**
 * Load configuration from a JSON5 file, or the defaults when no path is given.
 */
export async function loadConfig(path?: string): Promise<LifeConfig> {
  if (path === undefined) {
    return DEFAULT_CONFIG;
  }
  const text = await readFile(path, 'utf8');
  return parseConfig(text);
}

/**
 * The configured seed, or the current time in milliseconds.
 */
export function resolveSeed(config: LifeConfig, now: () => number = Date.now): number {
  return config.seed ?? now();
}
