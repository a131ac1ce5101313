/**
 * Command-line configuration for Pyramid Ten.
 */

import { DECK_SIZE } from '../../src/card-system/Deck';
import { DEFAULT_ROW_COUNT, tableauSize } from './Tableau';

export interface CliConfig {
  /** Normal tableau rows. */
  rows: number;
  /** Shuffle seed, or `null` for a random deal. */
  seed: number | null;
  /** Write card movements as they happen. */
  verbose: boolean;
  /** Print usage and exit. */
  help: boolean;
}

/** The most rows a 40-card deck can deal. */
export const MAX_ROWS = (() => {
  let rows = 1;
  while (tableauSize(rows + 1) <= DECK_SIZE) rows++;
  return rows;
})();

export const USAGE = `
Usage: npm start -- [options]

Options:
  --rows <n>     Pyramid rows, 1-${MAX_ROWS} (default: ${DEFAULT_ROW_COUNT})
  --seed <int>   Shuffle seed for a repeatable deal (default: random)
  --verbose      Report every card movement
  --help, -h     Show this help

Examples:
  npm start
  npm start -- --rows 4 --seed 42
`.trim();

function parseInteger(flag: string, value: string | undefined): number {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    throw new Error(`${flag} expects an integer, got ${value === undefined ? 'nothing' : `"${value}"`}`);
  }
  return Number.parseInt(value, 10);
}

/**
 * Parse command-line arguments (without the node and script entries).
 *
 * @throws On an unknown flag or a bad value.
 */
export function parseCliArgs(args: readonly string[]): CliConfig {
  const config: CliConfig = {
    rows: DEFAULT_ROW_COUNT,
    seed: null,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--rows': {
        const rows = parseInteger(arg, args[++i]);
        if (rows < 1 || rows > MAX_ROWS) {
          throw new Error(`--rows must be between 1 and ${MAX_ROWS}, got ${rows}`);
        }
        config.rows = rows;
        break;
      }
      case '--seed':
        config.seed = parseInteger(arg, args[++i]);
        break;
      case '--verbose':
        config.verbose = true;
        break;
      case '--help':
      case '-h':
        config.help = true;
        break;
      default:
        throw new Error(`Unknown option "${arg}"`);
    }
  }

  return config;
}
