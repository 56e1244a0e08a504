import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { type BatchStats, averageMoves } from '../engine/batch';
import { shipCountsToList } from '../engine/placement';
import type { BattleSink, BattleStartInfo, BattleSummary, MoveEvent } from '../engine/types';

export function formatMove(e: MoveEvent): string {
  return `Move ${e.move}: Player ${e.attacker} attacks (${e.target.x},${e.target.y}) -> ${e.hit ? 'Hit' : 'Miss'}${
    e.sunk ? ' and Sunk' : ''
  }`;
}

export function formatOutcome(s: BattleSummary): string {
  return s.winner === null ? `Battle ended in a draw after ${s.moves} moves.` : `Player ${s.winner} wins after ${s.moves} moves!`;
}

export function formatBattleHeader(info: BattleStartInfo): string {
  return `New battle started: ${info.cols}x${info.rows}, ships: [${shipCountsToList(info.shipCounts).join(', ')}], seed: ${
    info.seed
  }, Player ${info.startingPlayer} starts`;
}

/** Verbose console output, one line per move. */
export class ConsoleSink implements BattleSink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  onBattleStart(info: BattleStartInfo): void {
    this.write(`\n=== Battle ${info.index} (Player ${info.startingPlayer} starts) ===`);
  }

  onMove(event: MoveEvent): void {
    this.write(formatMove(event));
  }

  onBattleEnd(summary: BattleSummary): void {
    this.write(formatOutcome(summary));
  }
}

export function runTimestamp(now = new Date()): string {
  return now.toISOString().replace(/[:.]/g, '-');
}

/**
 * Writes `battle_log.txt` into `logDir/battle_<index>_<seed>_<runId>/`, so a
 * rerun with the same seed never overwrites an earlier log.
 */
export class TextLogSink implements BattleSink {
  private file: string | null = null;

  constructor(
    private readonly logDir: string,
    private readonly runId: string = runTimestamp()
  ) {}

  get currentFile(): string | null {
    return this.file;
  }

  onBattleStart(info: BattleStartInfo): void {
    const dir = join(this.logDir, `battle_${info.index}_${info.seed}_${this.runId}`);
    mkdirSync(dir, { recursive: true });
    this.file = join(dir, 'battle_log.txt');
    writeFileSync(this.file, `${formatBattleHeader(info)}\n`);
  }

  onMove(event: MoveEvent): void {
    appendFileSync(this.requireFile(), `${formatMove(event)}\n`);
  }

  onBattleEnd(summary: BattleSummary): void {
    appendFileSync(this.requireFile(), `${formatOutcome(summary)}\n`);
  }

  private requireFile(): string {
    if (!this.file) {
      throw new Error('Battle log written before the battle started');
    }
    return this.file;
  }
}

export function formatResults(stats: BatchStats): string {
  return [
    '=== Overall Battle Results ===',
    `Total battles: ${stats.battles}`,
    `Player 1 wins: ${stats.wins[1]}`,
    `Player 2 wins: ${stats.wins[2]}`,
    `Draws: ${stats.draws}`,
    `Average game length: ${averageMoves(stats).toFixed(2)} moves`,
  ].join('\n');
}
