#!/usr/bin/env node
/**
 * Play many seeded Pyramid Ten deals with an automated player and
 * report how often it wins.
 *
 * Usage:
 *   npm run simulate -- [--games <n>] [--seed <int>] [--rows <n>] [--strategy greedy|random]
 */

import { createSeededRng } from '../src/card-system/Deck';
import { AiPlayer, GreedyStrategy, RandomStrategy, playOut } from '../games/pyramid-ten/AiStrategy';
import type { AiStrategy } from '../games/pyramid-ten/AiStrategy';
import { MAX_ROWS } from '../games/pyramid-ten/config';
import { setupPyramidTenGame } from '../games/pyramid-ten/PyramidTenGame';
import { DEFAULT_ROW_COUNT } from '../games/pyramid-ten/Tableau';

const STRATEGIES: ReadonlyMap<string, AiStrategy> = new Map([
  [GreedyStrategy.name, GreedyStrategy],
  [RandomStrategy.name, RandomStrategy],
]);

interface SimulationArgs {
  games: number;
  seed: number;
  rows: number;
  strategy: AiStrategy;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function parseArgs(): SimulationArgs {
  const args = process.argv.slice(2);
  const parsed: SimulationArgs = {
    games: 1000,
    seed: 1,
    rows: DEFAULT_ROW_COUNT,
    strategy: GreedyStrategy,
  };

  const integer = (flag: string, value: string | undefined): number => {
    if (value === undefined || !/^\d+$/.test(value)) {
      fail(`${flag} expects a non-negative integer`);
    }
    return Number.parseInt(value, 10);
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--games':
        parsed.games = integer('--games', args[++i]);
        break;
      case '--seed':
        parsed.seed = integer('--seed', args[++i]);
        break;
      case '--rows':
        parsed.rows = integer('--rows', args[++i]);
        if (parsed.rows < 1 || parsed.rows > MAX_ROWS) {
          fail(`--rows must be between 1 and ${MAX_ROWS}`);
        }
        break;
      case '--strategy': {
        const strategy = STRATEGIES.get(args[++i] ?? '');
        if (!strategy) fail(`--strategy must be one of: ${[...STRATEGIES.keys()].join(', ')}`);
        parsed.strategy = strategy;
        break;
      }
      default:
        fail(`Unknown option "${args[i]}"`);
    }
  }
  return parsed;
}

const { games, seed, rows, strategy } = parseArgs();

let wins = 0;
for (let game = 0; game < games; game++) {
  const session = setupPyramidTenGame({ rows, rng: createSeededRng(seed + game) });
  const player = new AiPlayer(strategy, createSeededRng(seed * 31 + game));
  if (playOut(session, player) === 'won') wins++;
}

const rate = games === 0 ? 0 : (wins / games) * 100;
console.log(`Strategy: ${strategy.name}, rows: ${rows}, seeds: ${seed}..${seed + games - 1}`);
console.log(`  Won ${wins} of ${games} games (${rate.toFixed(1)}%)`);
