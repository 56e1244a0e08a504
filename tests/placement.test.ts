import { describe, expect, it } from 'vitest';
import { SHIP_BY_ID } from '../src/engine/data';
import { InsufficientSpaceError, PlacementExhaustedError } from '../src/engine/errors';
import { Grid } from '../src/engine/grid';
import {
  countShips,
  countTiles,
  isValidPlacement,
  normalizeShipCounts,
  placeFleet,
  randomShipCounts,
} from '../src/engine/placement';
import { RandomBoardSetup } from '../src/engine/players';
import { SeededRng } from '../src/engine/rng';
import { extractShips } from '../src/engine/rules';
import { analyzeShipShape, rotateShape } from '../src/engine/shapes';
import { counts, shipsTouch } from './helpers';

describe('ship counts', () => {
  it('normalizes list and record forms', () => {
    expect(normalizeShipCounts([1, 0, 2, 0, 0, 0, 1])).toEqual({ 1: 1, 2: 0, 3: 2, 4: 0, 5: 0, 6: 0, 7: 1 });
    expect(normalizeShipCounts({ 7: 2 })).toEqual({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 2 });
    expect(() => normalizeShipCounts({ 8: 1 })).toThrow(RangeError);
    expect(() => normalizeShipCounts([-1])).toThrow(RangeError);
  });

  it('counts tiles with the catalogue sizes', () => {
    expect(countTiles(counts({ 1: 1, 2: 1, 3: 1, 4: 1, 5: 1, 6: 1, 7: 1 }))).toBe(27);
    expect(countShips(counts({ 1: 2, 7: 1 }))).toBe(3);
  });

  it('draws random fleets covering at least 30% of the board', () => {
    const fleet = randomShipCounts(10, 10, new SeededRng(11));
    const tiles = countTiles(fleet);
    expect(tiles).toBeGreaterThanOrEqual(30);
    expect(tiles).toBeLessThan(36);
  });
});

describe('shapes', () => {
  it('rotates offsets about the anchor', () => {
    const bar = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
    ];
    expect(rotateShape(bar, 0, { x: 5, y: 5 })).toEqual([
      { x: 5, y: 5 },
      { x: 6, y: 5 },
    ]);
    expect(rotateShape(bar, 90, { x: 5, y: 5 })).toEqual([
      { x: 5, y: 5 },
      { x: 5, y: 6 },
    ]);
    expect(rotateShape(bar, 180, { x: 5, y: 5 })).toEqual([
      { x: 5, y: 5 },
      { x: 4, y: 5 },
    ]);
    expect(rotateShape(bar, 270, { x: 5, y: 5 })).toEqual([
      { x: 5, y: 5 },
      { x: 5, y: 4 },
    ]);
  });

  it('classifies clusters by geometry', () => {
    const vertical = [0, 1, 2].map((y) => ({ x: 4, y }));
    expect(analyzeShipShape(vertical)).toEqual({ size: 3, family: 'I', width: 1, height: 3 });
    const longBar = [0, 1, 2, 3, 4].map((x) => ({ x, y: 0 }));
    expect(analyzeShipShape(longBar).family).toBe('I');
    const square = [
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 0, y: 1 },
      { x: 1, y: 1 },
    ];
    expect(analyzeShipShape(square)).toEqual({ size: 4, family: 'unknown', width: 2, height: 2 });
    // Double-T turned on its side.
    const tt = rotateShape(SHIP_BY_ID[7].variants[0], 90, { x: 3, y: 3 });
    expect(analyzeShipShape(tt)).toEqual({ size: 6, family: 'TT', width: 2, height: 4 });
    // Mirrored L.
    const j = [
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 1, y: 2 },
      { x: 0, y: 2 },
    ];
    expect(analyzeShipShape(j).family).toBe('L');
  });
});

describe('placement', () => {
  it('rejects cells that overlap, touch or leave the board', () => {
    const grid = Grid.fromRows([
      [1, 0, 0],
      [0, 0, 0],
    ]);
    expect(isValidPlacement(grid, [{ x: 1, y: 0 }])).toBe(false);
    expect(isValidPlacement(grid, [{ x: 0, y: 0 }])).toBe(false);
    expect(isValidPlacement(grid, [{ x: -1, y: 1 }])).toBe(false);
    expect(isValidPlacement(grid, [{ x: 1, y: 1 }])).toBe(true);
  });

  it('fails fast when the fleet is larger than the board', () => {
    expect(() => placeFleet(2, 2, counts({ 7: 1 }), new SeededRng(1))).toThrow(InsufficientSpaceError);
  });

  it('gives up after the restart budget instead of looping', () => {
    // Two patrol boats fit by area but can never be kept apart on a 2x2 board.
    let error: unknown;
    try {
      placeFleet(2, 2, counts({ 1: 2 }), new SeededRng(1), { maxRestarts: 3 });
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(PlacementExhaustedError);
    expect(error instanceof PlacementExhaustedError && error.restarts).toBe(3);
  });

  it('places every requested ship with its catalogue size and shape, never touching', () => {
    const fleet = counts({ 1: 2, 2: 1, 3: 1, 4: 1, 5: 1, 6: 1, 7: 1 });
    for (const seed of [1, 2, 3, 4, 5]) {
      const ships = extractShips(placeFleet(10, 10, fleet, new SeededRng(seed)));
      expect(ships.length).toBe(countShips(fleet));
      for (const s of ships) {
        expect(s.cells.length).toBe(SHIP_BY_ID[s.shipId].size);
        expect(analyzeShipShape(s.cells).family).toBe(SHIP_BY_ID[s.shipId].family);
      }
      for (let i = 0; i < ships.length; i += 1) {
        for (let j = i + 1; j < ships.length; j += 1) {
          expect(shipsTouch(ships[i], ships[j])).toBe(false);
        }
      }
    }
  });

  it('is reproducible for a seed', () => {
    const fleet = counts({ 2: 2, 5: 1 });
    expect(placeFleet(8, 8, fleet, new SeededRng(9)).toRows()).toEqual(placeFleet(8, 8, fleet, new SeededRng(9)).toRows());
  });

  it('exposes the placed board through a copy', () => {
    const setup = new RandomBoardSetup(6, 6, counts({ 2: 1 }), new SeededRng(4));
    setup.placeShips();
    const board = setup.getBoard();
    expect(setup.boardStats()).toEqual({ emptySpaces: 33, occupiedSpaces: 3 });
    board.clear();
    expect(setup.boardStats().occupiedSpaces).toBe(3);
    expect(() => setup.getTile(6, 0)).toThrow(RangeError);
  });
});
