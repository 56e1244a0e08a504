import { key, neighbors } from '../src/engine/grid';
import { FixedBoardSetup, type PlayerContext, type PlayerFactory, ScanStrategy, type Strategy } from '../src/engine/players';
import { emptyShipCounts } from '../src/engine/placement';
import type {
  BattleSink,
  BattleStartInfo,
  BattleSummary,
  Coord,
  MoveEvent,
  ShipCounts,
  ShipInstance,
} from '../src/engine/types';

export function boardWith(rows: number, cols: number, ships: { id: number; cells: Coord[] }[]): number[][] {
  const board = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
  for (const ship of ships) {
    for (const c of ship.cells) {
      board[c.y][c.x] = ship.id;
    }
  }
  return board;
}

export function counts(partial: Partial<ShipCounts>): ShipCounts {
  return { ...emptyShipCounts(), ...partial };
}

export function fixedPlayer(
  board: number[][],
  createStrategy: (ctx: PlayerContext) => Strategy = (ctx) => new ScanStrategy(ctx.rows, ctx.cols)
): PlayerFactory {
  return {
    name: 'fixed',
    createBoardSetup: () => new FixedBoardSetup(board),
    createStrategy,
  };
}

/** Proposes the given cells in order, forever repeating the last one. */
export class ScriptedStrategy implements Strategy {
  private i = 0;

  constructor(private readonly moves: Coord[]) {}

  getNextAttack(): Coord {
    const c = this.moves[Math.min(this.i, this.moves.length - 1)];
    this.i += 1;
    return c;
  }

  registerAttack(): void {}
}

export class RecordingSink implements BattleSink {
  starts: BattleStartInfo[] = [];
  moves: MoveEvent[] = [];
  ends: BattleSummary[] = [];

  onBattleStart(info: BattleStartInfo): void {
    this.starts.push(info);
  }

  onMove(event: MoveEvent): void {
    this.moves.push(event);
  }

  onBattleEnd(summary: BattleSummary): void {
    this.ends.push(summary);
  }
}

/** True when some cell of `a` shares an edge with, or sits on, a cell of `b`. */
export function shipsTouch(a: ShipInstance, b: ShipInstance): boolean {
  return a.cells.some((c) => [c, ...neighbors(c)].some((n) => b.coords.has(key(n))));
}
