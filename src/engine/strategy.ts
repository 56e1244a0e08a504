import { HIT_BOOST, SHIPS, SHIP_IDS } from './data';
import { NoAttacksRemainingError } from './errors';
import { CellTag, Grid, key, neighbors } from './grid';
import { countTiles } from './placement';
import type { Strategy } from './players';
import { analyzeShipShape, boundingBox } from './shapes';
import type { Coord, EnemyMark, ShapeAnalysis, ShipCounts } from './types';

function parity(c: Coord): number {
  return (c.x + c.y) % 2;
}

/**
 * Heatmap opponent. Every cell starts at 1.0; hits double the unattacked
 * neighbours, and a sinking zeroes the sunk ship's bounding box grown by one
 * cell, since ships never touch. The highest cell is attacked next.
 */
export class ProbabilityStrategy implements Strategy {
  private readonly attacked = new Set<string>();
  // Own attack results only: Empty = unknown, Hit, Miss.
  private readonly knowledge: Grid;
  private readonly probability: number[][];
  private readonly requested: ShipCounts;
  private readonly remaining: ShipCounts;

  constructor(
    readonly rows: number,
    readonly cols: number,
    shipCounts: ShipCounts
  ) {
    this.knowledge = new Grid(rows, cols);
    this.probability = Array.from({ length: rows }, () => new Array<number>(cols).fill(1.0));
    this.requested = { ...shipCounts };
    this.remaining = { ...shipCounts };
  }

  getNextAttack(): Coord {
    let best = -1;
    let pick: Coord | undefined;
    for (const c of this.unattackedCells()) {
      const p = this.probability[c.y][c.x];
      if (p > best) {
        best = p;
        pick = c;
      } else if (p === best && pick && parity(pick) === 0 && parity(c) === 1) {
        pick = c;
      }
    }
    if (!pick || best <= 0) {
      return this.fallbackAttack();
    }
    return pick;
  }

  registerAttack(x: number, y: number, hit: boolean, sunk: boolean): void {
    const c = { x, y };
    if (!this.knowledge.inBounds(c)) {
      throw new RangeError(`Attack outside the board: (${x},${y})`);
    }
    this.attacked.add(key(c));
    this.knowledge.set(c, hit ? CellTag.Hit : CellTag.Miss);
    if (!hit) {
      return;
    }
    this.boostNeighbors(c);
    if (sunk) {
      const cells = this.hitCluster(c);
      this.excludeSurroundings(cells);
      this.updateShipCount(cells);
    }
  }

  probabilityAt(c: Coord): number {
    return this.probability[c.y][c.x];
  }

  hasAttacked(c: Coord): boolean {
    return this.attacked.has(key(c));
  }

  getEnemyBoard(): EnemyMark[][] {
    return this.knowledge.toRows().map((row) =>
      row.map((tag): EnemyMark => (tag === CellTag.Hit ? 'H' : tag === CellTag.Miss ? 'M' : '?'))
    );
  }

  getRemainingShips(): ShipCounts {
    return { ...this.remaining };
  }

  allShipsSunk(): boolean {
    return SHIP_IDS.every((id) => this.remaining[id] === 0);
  }

  /** Counts raw hits against the requested fleet; independent of shape guessing. */
  allTilesHit(): boolean {
    return this.knowledge.count((t) => t === CellTag.Hit) >= countTiles(this.requested);
  }

  analyzeShipShape(x: number, y: number): ShapeAnalysis {
    return analyzeShipShape(this.hitCluster({ x, y }));
  }

  private hitCluster(c: Coord): Coord[] {
    return this.knowledge.floodFill(c, (tag) => tag === CellTag.Hit);
  }

  private boostNeighbors(c: Coord): void {
    for (const n of neighbors(c)) {
      if (this.knowledge.inBounds(n) && !this.attacked.has(key(n))) {
        this.probability[n.y][n.x] *= HIT_BOOST;
      }
    }
  }

  private excludeSurroundings(cells: readonly Coord[]): void {
    if (!cells.length) {
      return;
    }
    const box = boundingBox(cells);
    const minX = Math.max(0, box.minX - 1);
    const maxX = Math.min(this.cols - 1, box.maxX + 1);
    const minY = Math.max(0, box.minY - 1);
    const maxY = Math.min(this.rows - 1, box.maxY + 1);
    for (let y = minY; y <= maxY; y += 1) {
      for (let x = minX; x <= maxX; x += 1) {
        if (!this.attacked.has(key({ x, y }))) {
          this.probability[y][x] = 0;
        }
      }
    }
  }

  // Best effort: the same tile count can belong to several ids, and the guess may be wrong.
  private updateShipCount(cells: readonly Coord[]): void {
    const shape = analyzeShipShape(cells);
    const candidates = SHIPS.filter((s) => s.size === shape.size && this.remaining[s.id] > 0);
    const match = candidates.find((s) => s.family === shape.family) ?? candidates[0];
    if (match) {
      this.remaining[match.id] -= 1;
    }
  }

  private fallbackAttack(): Coord {
    const first = this.unattackedCells().next();
    if (first.done) {
      throw new NoAttacksRemainingError();
    }
    return first.value;
  }

  private *unattackedCells(): Generator<Coord, void, undefined> {
    for (let y = 0; y < this.rows; y += 1) {
      for (let x = 0; x < this.cols; x += 1) {
        if (!this.attacked.has(key({ x, y }))) {
          yield { x, y };
        }
      }
    }
  }
}
