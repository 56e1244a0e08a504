import type { CliOptions } from './config';
import { runBatch, type BatchStats } from './engine/batch';
import { randomShipCounts, shipCountsToList } from './engine/placement';
import { getPlayer } from './engine/players';
import { SeededRng, randomSeed } from './engine/rng';
import type { BattleSink } from './engine/types';
import { ConsoleSink, TextLogSink, formatResults } from './log/battleLog';
import { BoardRenderSink } from './render/board';

/** Runs a local batch from CLI options; the fleet is announced before the first battle. */
export function simulate(opts: CliOptions, write: (line: string) => void = (line) => console.log(line)): BatchStats {
  const seed = opts.seed ?? randomSeed();
  const shipCounts = opts.list ?? randomShipCounts(opts.height, opts.width, new SeededRng(seed));
  const sinks: BattleSink[] = [];
  if (opts.verbose) {
    write(`[battle] seed ${seed}, ship counts [${shipCountsToList(shipCounts).join(', ')}]`);
    sinks.push(new ConsoleSink(write));
  }
  if (opts.render) {
    sinks.push(new BoardRenderSink(write));
  }
  if (opts.logDir) {
    sinks.push(new TextLogSink(opts.logDir));
  }

  const { stats } = runBatch({
    rows: opts.height,
    cols: opts.width,
    shipCounts,
    players: [getPlayer(opts.p1), getPlayer(opts.p2)],
    count: opts.count,
    seed,
    sinks,
  });
  write(`\n${formatResults(stats)}`);
  return stats;
}
