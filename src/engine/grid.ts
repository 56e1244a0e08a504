import type { Coord } from './types';

export const CellTag = {
  Empty: 0,
  Hit: 8,
  Sunk: 9,
  Miss: 10,
} as const;

export const ORTHOGONAL: readonly Coord[] = [
  { x: -1, y: 0 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: 0, y: 1 },
];

export function key(c: Coord): string {
  return `${c.x},${c.y}`;
}

export function cloneCoord(c: Coord): Coord {
  return { x: c.x, y: c.y };
}

export function neighbors(c: Coord): Coord[] {
  return ORTHOGONAL.map((d) => ({ x: c.x + d.x, y: c.y + d.y }));
}

export class Grid {
  private cells: number[][];

  constructor(
    readonly rows: number,
    readonly cols: number,
    fill: number = CellTag.Empty
  ) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
      throw new RangeError(`Invalid grid size ${rows}x${cols}`);
    }
    this.cells = Array.from({ length: rows }, () => new Array<number>(cols).fill(fill));
  }

  static fromRows(rows: readonly (readonly number[])[]): Grid {
    const cols = rows.length ? rows[0].length : 0;
    const grid = new Grid(rows.length, cols);
    rows.forEach((row, y) => {
      if (row.length !== cols) {
        throw new RangeError(`Row ${y} has ${row.length} cells, expected ${cols}`);
      }
      row.forEach((tag, x) => grid.set({ x, y }, tag));
    });
    return grid;
  }

  get area(): number {
    return this.rows * this.cols;
  }

  inBounds(c: Coord): boolean {
    return c.x >= 0 && c.y >= 0 && c.x < this.cols && c.y < this.rows;
  }

  get(c: Coord): number {
    if (!this.inBounds(c)) {
      throw new RangeError(`Coordinates out of bounds: (${c.x},${c.y})`);
    }
    return this.cells[c.y][c.x];
  }

  set(c: Coord, tag: number): void {
    if (!this.inBounds(c)) {
      throw new RangeError(`Coordinates out of bounds: (${c.x},${c.y})`);
    }
    this.cells[c.y][c.x] = tag;
  }

  clear(): void {
    for (const row of this.cells) {
      row.fill(CellTag.Empty);
    }
  }

  count(predicate: (tag: number) => boolean): number {
    let n = 0;
    for (const row of this.cells) {
      for (const tag of row) {
        if (predicate(tag)) {
          n += 1;
        }
      }
    }
    return n;
  }

  /** Row-major walk. */
  forEach(visit: (tag: number, c: Coord) => void): void {
    for (let y = 0; y < this.rows; y += 1) {
      for (let x = 0; x < this.cols; x += 1) {
        visit(this.cells[y][x], { x, y });
      }
    }
  }

  clone(): Grid {
    return Grid.fromRows(this.cells);
  }

  toRows(): number[][] {
    return this.cells.map((row) => row.slice());
  }

  /**
   * Collects the 4-connected region around `start` whose cells satisfy `accept`.
   * Returns an empty list when `start` itself is rejected.
   */
  floodFill(start: Coord, accept: (tag: number, c: Coord) => boolean): Coord[] {
    const region: Coord[] = [];
    if (!this.inBounds(start) || !accept(this.get(start), start)) {
      return region;
    }
    const visited = new Set<string>([key(start)]);
    const stack: Coord[] = [cloneCoord(start)];
    while (stack.length) {
      const c = stack.pop();
      if (!c) {
        break;
      }
      region.push(c);
      for (const n of neighbors(c)) {
        const k = key(n);
        if (visited.has(k) || !this.inBounds(n) || !accept(this.get(n), n)) {
          continue;
        }
        visited.add(k);
        stack.push(n);
      }
    }
    return region;
  }
}
