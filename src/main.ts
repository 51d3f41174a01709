#!/usr/bin/env node
/**
 * Command-line entry: run Life in the terminal.
 *
 * Usage: lifegrid [config.json5]
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { type LifeConfig, loadConfig } from './lib/config/config.js';
import { LifeRunner } from './lib/runner/life-runner.js';

const ANSI_CLEAR = '\x1b[2J\x1b[H';

async function main(argv: string[]): Promise<number> {
  let config: LifeConfig;
  try {
    config = await loadConfig(argv[0]);
  } catch (error) {
    console.error(`❌ Failed to load config: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const runner = new LifeRunner({
    config,
    output: {
      clear: () => process.stdout.write(ANSI_CLEAR),
      write: text => process.stdout.write(text + '\n'),
    },
    sleep: ms => sleep(ms),
  });

  process.once('SIGINT', () => runner.stop());

  const result = await runner.run();
  if (!result.ok) {
    return 1;
  }
  console.log(`✅ Ran ${result.generations} generations`);
  return 0;
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('❌ Unexpected error:', error);
    process.exitCode = 1;
  }
);
