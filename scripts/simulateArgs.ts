/**
 * Command-line parsing for the simulation tool.
 */

import { STRATEGIES } from '../example-games/auto-play/AutoPlayStrategy';

export interface SimulateOptions {
  seed: number;
  moves: number;
  columns: number;
  rows: number;
  colorCount: number;
  guaranteedColorCount: number;
  strategy: string;
}

type NumericOption = keyof Omit<SimulateOptions, 'strategy'>;

export const USAGE = `
Usage: npm run simulate -- [options]

Options:
  --seed <n>        RNG seed (default: 1)
  --moves <n>       Moves to play (default: 50)
  --columns <n>     Board columns (default: 8)
  --rows <n>        Board rows (default: 8)
  --colors <n>      Palette size, 1-6 (default: 4)
  --guaranteed <n>  Colors guaranteed by a shuffle, 1-4 (default: 1)
  --strategy <s>    ${Object.keys(STRATEGIES).join(' | ')} (default: largest-group)
`;

const NUMERIC_FLAGS: Readonly<Record<string, NumericOption>> = {
  '--seed': 'seed',
  '--moves': 'moves',
  '--columns': 'columns',
  '--rows': 'rows',
  '--colors': 'colorCount',
  '--guaranteed': 'guaranteedColorCount',
};

/**
 * Parse the tool's arguments (without the node and script paths).
 * Returns `null` when help was requested; throws on a bad option.
 * Strategy names are checked by the caller.
 */
export function parseSimulateArgs(argv: readonly string[]): SimulateOptions | null {
  if (argv.includes('--help') || argv.includes('-h')) return null;

  const options: SimulateOptions = {
    seed: 1,
    moves: 50,
    columns: 8,
    rows: 8,
    colorCount: 4,
    guaranteedColorCount: 1,
    strategy: 'largest-group',
  };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if (flag === '--strategy' && value !== undefined) {
      options.strategy = value;
      i++;
    } else if (Object.hasOwn(NUMERIC_FLAGS, flag) && value !== undefined) {
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        throw new Error(`${flag} expects a number, got "${value}"`);
      }
      options[NUMERIC_FLAGS[flag]] = parsed;
      i++;
    } else {
      throw new Error(`Unknown or incomplete option "${flag}"`);
    }
  }

  return options;
}
