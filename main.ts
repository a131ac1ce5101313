#!/usr/bin/env node
/**
 * Pyramid Ten -- terminal entry point.
 *
 * Usage:
 *   npm start -- [--rows <n>] [--seed <int>] [--verbose] [--help]
 *
 * Parses the options, deals a game, prints the rules, and hands stdin
 * and stdout to the run loop. The exit code is 0 for a win or a quit,
 * 1 for a bad option, 2 for a loss.
 */

import { createSeededRng } from './src/card-system/Deck';
import { ReadlineLineReader, StreamTextWriter } from './src/ui/TerminalIo';
import { RULES_TEXT } from './games/pyramid-ten/BoardRenderer';
import { runGame } from './games/pyramid-ten/GameRunner';
import { parseCliArgs, USAGE } from './games/pyramid-ten/config';
import type { CliConfig } from './games/pyramid-ten/config';
import { setupPyramidTenGame } from './games/pyramid-ten/PyramidTenGame';

async function main(config: CliConfig): Promise<number> {
  const session = setupPyramidTenGame({
    rows: config.rows,
    rng: config.seed === null ? Math.random : createSeededRng(config.seed),
  });

  const input = new ReadlineLineReader();
  const output = new StreamTextWriter();
  output.write(RULES_TEXT);
  output.write('');

  try {
    const outcome = await runGame(session, input, output, { verbose: config.verbose });
    if (outcome === 'abandoned') output.write('');
    return outcome === 'lost' ? 2 : 0;
  } finally {
    input.close();
  }
}

let config: CliConfig;
try {
  config = parseCliArgs(process.argv.slice(2));
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  console.error(USAGE);
  process.exit(1);
}

if (config.help) {
  console.log(USAGE);
} else {
  main(config).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    },
  );
}
