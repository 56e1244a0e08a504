import { NoAttacksRemainingError } from './errors';
import { Grid, key } from './grid';
import { placeFleet } from './placement';
import type { SeededRng } from './rng';
import { ProbabilityStrategy } from './strategy';
import type { Coord, ShipCounts } from './types';

/** Places one side's fleet. The engine reads the board once, through `getBoard`, after `placeShips`. */
export interface BoardSetup {
  placeShips(): void;
  /** Copy of the placed board: 0 water, 1..7 ship id. */
  getBoard(): Grid;
}

/** Chooses attacks. Sees only the results of its own attacks. */
export interface Strategy {
  getNextAttack(): Coord;
  registerAttack(x: number, y: number, hit: boolean, sunk: boolean): void;
}

export interface PlayerContext {
  rows: number;
  cols: number;
  shipCounts: ShipCounts;
  rng: SeededRng;
}

export interface PlayerFactory {
  name: string;
  createBoardSetup(ctx: PlayerContext): BoardSetup;
  createStrategy(ctx: PlayerContext): Strategy;
}

export class RandomBoardSetup implements BoardSetup {
  private board: Grid;

  constructor(
    readonly rows: number,
    readonly cols: number,
    private readonly shipCounts: ShipCounts,
    private readonly rng: SeededRng
  ) {
    this.board = new Grid(rows, cols);
  }

  placeShips(): void {
    this.board = placeFleet(this.rows, this.cols, this.shipCounts, this.rng);
  }

  getBoard(): Grid {
    return this.board.clone();
  }

  getTile(x: number, y: number): number {
    return this.board.get({ x, y });
  }

  boardStats(): { emptySpaces: number; occupiedSpaces: number } {
    const occupied = this.board.count((t) => t !== 0);
    return { emptySpaces: this.board.area - occupied, occupiedSpaces: occupied };
  }
}

/** Hands out a preset board, for scripted scenarios. */
export class FixedBoardSetup implements BoardSetup {
  private readonly board: Grid;
  private placed = false;

  constructor(rows: readonly (readonly number[])[]) {
    this.board = Grid.fromRows(rows);
  }

  placeShips(): void {
    this.placed = true;
  }

  getBoard(): Grid {
    if (!this.placed) {
      return new Grid(this.board.rows, this.board.cols);
    }
    return this.board.clone();
  }
}

/** Sweeps the board row by row. Baseline opponent. */
export class ScanStrategy implements Strategy {
  private readonly attacked = new Set<string>();

  constructor(
    readonly rows: number,
    readonly cols: number
  ) {}

  getNextAttack(): Coord {
    for (let y = 0; y < this.rows; y += 1) {
      for (let x = 0; x < this.cols; x += 1) {
        if (!this.attacked.has(key({ x, y }))) {
          return { x, y };
        }
      }
    }
    throw new NoAttacksRemainingError();
  }

  registerAttack(x: number, y: number): void {
    this.attacked.add(key({ x, y }));
  }
}

export const PLAYERS: Record<string, PlayerFactory> = {
  probability: {
    name: 'probability',
    createBoardSetup: (ctx) => new RandomBoardSetup(ctx.rows, ctx.cols, ctx.shipCounts, ctx.rng),
    createStrategy: (ctx) => new ProbabilityStrategy(ctx.rows, ctx.cols, ctx.shipCounts),
  },
  scan: {
    name: 'scan',
    createBoardSetup: (ctx) => new RandomBoardSetup(ctx.rows, ctx.cols, ctx.shipCounts, ctx.rng),
    createStrategy: (ctx) => new ScanStrategy(ctx.rows, ctx.cols),
  },
};

export function getPlayer(name: string): PlayerFactory {
  if (!Object.hasOwn(PLAYERS, name)) {
    throw new Error(`Unknown player "${name}" (known: ${Object.keys(PLAYERS).join(', ')})`);
  }
  return PLAYERS[name];
}
