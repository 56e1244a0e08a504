import { RANDOM_FLEET_FILL, SHIP_BY_ID, SHIP_IDS, isShipId } from './data';
import { InsufficientSpaceError, PlacementExhaustedError } from './errors';
import { CellTag, Grid, neighbors } from './grid';
import type { SeededRng } from './rng';
import { ROTATIONS, rotateShape } from './shapes';
import type { Coord, ShipCounts, ShipId } from './types';

export const DEFAULT_MAX_RESTARTS = 200;

export interface PlacementOptions {
  maxRestarts?: number;
}

export function emptyShipCounts(): ShipCounts {
  return { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0, 7: 0 };
}

/** Accepts either the 7-entry list form (`[1,0,2,...]`) or a partial id → count record. */
export function normalizeShipCounts(input: number[] | Partial<Record<number, number>>): ShipCounts {
  const counts = emptyShipCounts();
  const entries: [number, number | undefined][] = Array.isArray(input)
    ? input.map((n, i): [number, number] => [i + 1, n])
    : Object.entries(input).map(([id, n]): [number, number | undefined] => [Number(id), n]);
  for (const [id, n] of entries) {
    if (!isShipId(id)) {
      throw new RangeError(`Unknown ship id ${id}`);
    }
    const count = n ?? 0;
    if (!Number.isInteger(count) || count < 0) {
      throw new RangeError(`Invalid count ${count} for ship id ${id}`);
    }
    counts[id] = count;
  }
  return counts;
}

export function countTiles(counts: ShipCounts): number {
  return SHIP_IDS.reduce((acc, id) => acc + SHIP_BY_ID[id].size * counts[id], 0);
}

export function countShips(counts: ShipCounts): number {
  return SHIP_IDS.reduce((acc, id) => acc + counts[id], 0);
}

export function shipCountsToList(counts: ShipCounts): number[] {
  return SHIP_IDS.map((id) => counts[id]);
}

/** Adds random ships until at least `fill` of the board area is requested. */
export function randomShipCounts(rows: number, cols: number, rng: SeededRng, fill = RANDOM_FLEET_FILL): ShipCounts {
  const target = Math.floor(rows * cols * fill);
  const counts = emptyShipCounts();
  let total = 0;
  while (total < target) {
    const id = rng.pick(SHIP_IDS);
    counts[id] += 1;
    total += SHIP_BY_ID[id].size;
  }
  return counts;
}

export function isValidPlacement(grid: Grid, cells: readonly Coord[]): boolean {
  for (const c of cells) {
    if (!grid.inBounds(c) || grid.get(c) !== CellTag.Empty) {
      return false;
    }
    for (const n of neighbors(c)) {
      if (grid.inBounds(n) && grid.get(n) !== CellTag.Empty) {
        return false;
      }
    }
  }
  return true;
}

function tryPlaceShip(grid: Grid, id: ShipId, anchors: readonly Coord[], rng: SeededRng): boolean {
  const shape = rng.pick(SHIP_BY_ID[id].variants);
  for (const anchor of anchors) {
    for (const r of ROTATIONS) {
      const cells = rotateShape(shape, r, anchor);
      if (isValidPlacement(grid, cells)) {
        for (const c of cells) {
          grid.set(c, id);
        }
        return true;
      }
    }
  }
  return false;
}

function placementOrder(): ShipId[] {
  return [...SHIP_IDS].sort((a, b) => SHIP_BY_ID[b].size - SHIP_BY_ID[a].size);
}

/**
 * Fills a fresh grid with `counts` ships, largest first. A ship that fits nowhere
 * clears the board and restarts the whole fleet, at most `maxRestarts` times.
 */
export function placeFleet(
  rows: number,
  cols: number,
  counts: ShipCounts,
  rng: SeededRng,
  opts: PlacementOptions = {}
): Grid {
  const grid = new Grid(rows, cols);
  const required = countTiles(counts);
  if (required > grid.area) {
    throw new InsufficientSpaceError(required, grid.area);
  }

  const maxRestarts = opts.maxRestarts ?? DEFAULT_MAX_RESTARTS;
  const order = placementOrder();
  const anchors: Coord[] = [];
  grid.forEach((_tag, c) => anchors.push(c));

  for (let restarts = 0; restarts <= maxRestarts; restarts += 1) {
    if (restarts > 0) {
      grid.clear();
    }
    rng.shuffle(anchors);
    let placed = true;
    for (const id of order) {
      for (let n = 0; n < counts[id] && placed; n += 1) {
        placed = tryPlaceShip(grid, id, anchors, rng);
      }
      if (!placed) {
        break;
      }
    }
    if (placed) {
      return grid;
    }
  }
  throw new PlacementExhaustedError(maxRestarts);
}
