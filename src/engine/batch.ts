import { runBattle } from './battle';
import { randomShipCounts } from './placement';
import type { PlayerFactory } from './players';
import { SeededRng, deriveSeed } from './rng';
import type { BattleSink, BattleSummary, PlayerId, ShipCounts } from './types';

export interface BatchOptions {
  rows: number;
  cols: number;
  // Omitted: one random fleet, drawn from the base seed, shared by every battle.
  shipCounts?: ShipCounts;
  players: [PlayerFactory, PlayerFactory];
  count: number;
  seed: number;
  sinks?: readonly BattleSink[];
}

export interface BatchStats {
  battles: number;
  wins: Record<PlayerId, number>;
  draws: number;
  totalMoves: number;
}

export interface BatchResult {
  shipCounts: ShipCounts;
  stats: BatchStats;
  summaries: BattleSummary[];
}

export function emptyStats(): BatchStats {
  return { battles: 0, wins: { 1: 0, 2: 0 }, draws: 0, totalMoves: 0 };
}

export function recordResult(stats: BatchStats, summary: BattleSummary): BatchStats {
  return mergeStats(stats, {
    battles: 1,
    wins: { 1: summary.winner === 1 ? 1 : 0, 2: summary.winner === 2 ? 1 : 0 },
    draws: summary.winner === null ? 1 : 0,
    totalMoves: summary.moves,
  });
}

export function mergeStats(a: BatchStats, b: BatchStats): BatchStats {
  return {
    battles: a.battles + b.battles,
    wins: { 1: a.wins[1] + b.wins[1], 2: a.wins[2] + b.wins[2] },
    draws: a.draws + b.draws,
    totalMoves: a.totalMoves + b.totalMoves,
  };
}

export function averageMoves(stats: BatchStats): number {
  return stats.battles ? stats.totalMoves / stats.battles : 0;
}

/** Odd-numbered battles open with player 1, even-numbered ones with player 2. */
export function startingPlayerFor(index: number): PlayerId {
  return index % 2 === 1 ? 1 : 2;
}

export function runBatch(options: BatchOptions): BatchResult {
  const shipCounts = options.shipCounts ?? randomShipCounts(options.rows, options.cols, new SeededRng(options.seed));
  const summaries: BattleSummary[] = [];
  let stats = emptyStats();
  for (let index = 1; index <= options.count; index += 1) {
    const summary = runBattle(
      {
        rows: options.rows,
        cols: options.cols,
        shipCounts,
        players: options.players,
        startingPlayer: startingPlayerFor(index),
        seed: deriveSeed(options.seed, index),
        index,
      },
      options.sinks
    );
    summaries.push(summary);
    stats = recordResult(stats, summary);
  }
  return { shipCounts, stats, summaries };
}

export class StatsSink implements BattleSink {
  stats = emptyStats();

  onBattleEnd(summary: BattleSummary): void {
    this.stats = recordResult(this.stats, summary);
  }
}
