import { describe, expect, it } from 'vitest';
import { CellTag, Grid } from '../src/engine/grid';
import { extractShips, fleetDestroyed, isSunk, resolveAttack } from '../src/engine/rules';
import type { ShipInstance } from '../src/engine/types';
import { boardWith, shipsTouch } from './helpers';

function ship(cells: [number, number][]): ShipInstance {
  const coords = cells.map(([x, y]) => ({ x, y }));
  return { shipId: 2, cells: coords, coords: new Set(coords.map((c) => `${c.x},${c.y}`)), hits: new Set<string>() };
}

describe('grid', () => {
  it('copies rows in and out', () => {
    const rows = [
      [0, 1],
      [2, 0],
    ];
    const grid = Grid.fromRows(rows);
    rows[0][0] = 7;
    const out = grid.toRows();
    out[1][0] = 9;
    expect(grid.toRows()).toEqual([
      [0, 1],
      [2, 0],
    ]);
  });

  it('rejects ragged rows and out of bounds access', () => {
    expect(() => Grid.fromRows([[0, 0], [0]])).toThrow(RangeError);
    const grid = new Grid(2, 3);
    expect(grid.inBounds({ x: 2, y: 1 })).toBe(true);
    expect(grid.inBounds({ x: 3, y: 1 })).toBe(false);
    expect(() => grid.get({ x: 0, y: 2 })).toThrow(RangeError);
  });

  it('flood fills only orthogonally connected accepted cells', () => {
    const grid = Grid.fromRows([
      [8, 8, 0],
      [0, 8, 0],
      [8, 0, 8],
    ]);
    const region = grid.floodFill({ x: 0, y: 0 }, (t) => t === CellTag.Hit);
    expect(region.map((c) => `${c.x},${c.y}`).sort()).toEqual(['0,0', '1,0', '1,1']);
    expect(grid.floodFill({ x: 2, y: 0 }, (t) => t === CellTag.Hit)).toEqual([]);
  });
});

describe('ship extraction', () => {
  it('labels components in row-major order', () => {
    const grid = Grid.fromRows([
      [1, 1, 0, 0],
      [0, 0, 0, 2],
      [0, 0, 0, 2],
      [3, 0, 0, 2],
    ]);
    const ships = extractShips(grid);
    expect(ships.map((s) => s.shipId)).toEqual([1, 2, 3]);
    expect(ships[0].coords).toEqual(new Set(['0,0', '1,0']));
    expect(ships[1].coords).toEqual(new Set(['3,1', '3,2', '3,3']));
    expect(ships[2].coords).toEqual(new Set(['0,3']));
    expect(ships.every((s) => s.hits.size === 0)).toBe(true);
  });

  it('splits separate runs of one id and touching runs of different ids', () => {
    expect(extractShips(Grid.fromRows([[1, 1, 0, 1, 1]])).length).toBe(2);
    const touching = extractShips(Grid.fromRows([[1, 2]]));
    expect(touching.map((s) => s.shipId)).toEqual([1, 2]);
  });

  it('rejects display tags on a placement board', () => {
    expect(() => extractShips(Grid.fromRows([[0, CellTag.Hit]]))).toThrow(RangeError);
  });
});

describe('attack resolution', () => {
  it('sinks a ship only when its last cell is hit', () => {
    const s = ship([
      [2, 2],
      [3, 2],
      [4, 2],
    ]);
    expect(resolveAttack({ x: 2, y: 2 }, [s])).toEqual({ hit: true, sunk: false, shipId: 2 });
    expect(resolveAttack({ x: 3, y: 2 }, [s])).toEqual({ hit: true, sunk: false, shipId: 2 });
    expect(isSunk(s)).toBe(false);
    expect(resolveAttack({ x: 4, y: 2 }, [s])).toEqual({ hit: true, sunk: true, shipId: 2 });
    expect(isSunk(s)).toBe(true);
  });

  it('does not double count a repeated hit', () => {
    const s = ship([
      [0, 0],
      [1, 0],
    ]);
    resolveAttack({ x: 0, y: 0 }, [s]);
    expect(resolveAttack({ x: 0, y: 0 }, [s])).toEqual({ hit: true, sunk: false, shipId: 2 });
    expect(s.hits.size).toBe(1);
  });

  it('reports a miss and leaves ships untouched', () => {
    const s = ship([[0, 0]]);
    expect(resolveAttack({ x: 5, y: 5 }, [s])).toEqual({ hit: false, sunk: false });
    expect(s.hits.size).toBe(0);
  });

  it('resolves a two-tile ship on a 10x10 board', () => {
    const ships = extractShips(Grid.fromRows(boardWith(10, 10, [{ id: 1, cells: [{ x: 0, y: 0 }, { x: 1, y: 0 }] }])));
    expect(resolveAttack({ x: 0, y: 0 }, ships)).toMatchObject({ hit: true, sunk: false });
    expect(resolveAttack({ x: 1, y: 0 }, ships)).toMatchObject({ hit: true, sunk: true });
    expect(resolveAttack({ x: 5, y: 5 }, ships)).toEqual({ hit: false, sunk: false });
    expect(fleetDestroyed(ships)).toBe(true);
  });

  it('detects touching ships', () => {
    const a = ship([[0, 0]]);
    expect(shipsTouch(a, ship([[1, 0]]))).toBe(true);
    expect(shipsTouch(a, ship([[1, 1]]))).toBe(false);
  });
});
