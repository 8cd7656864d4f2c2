#!/usr/bin/env node
/**
 * Simulation Tool -- plays a seeded game headlessly and prints a JSON
 * summary of what the pipeline did.
 *
 * Usage:
 *   npm run simulate -- [--seed <n>] [--moves <n>] [--columns <n>] [--rows <n>]
 *                       [--colors <n>] [--guaranteed <n>] [--strategy <name>]
 */

import { runAutoPlay } from '../example-games/auto-play/runAutoPlay';
import { findStrategy } from '../example-games/auto-play/AutoPlayStrategy';
import { USAGE, parseSimulateArgs, type SimulateOptions } from './simulateArgs';

function readOptions(): SimulateOptions {
  try {
    const options = parseSimulateArgs(process.argv.slice(2));
    if (options === null) {
      console.log(USAGE);
      process.exit(0);
    }
    return options;
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const options = readOptions();
  const strategy = findStrategy(options.strategy);
  if (strategy === undefined) {
    console.error(`Error: Unknown strategy "${options.strategy}"`);
    process.exit(1);
  }

  const summary = await runAutoPlay({ ...options, strategy });
  console.log(JSON.stringify(summary, null, 2));
}

main().catch((err: unknown) => {
  console.error('Simulation failed:', err);
  process.exit(1);
});
