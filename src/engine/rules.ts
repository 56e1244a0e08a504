import { isShipId } from './data';
import { CellTag, type Grid, key } from './grid';
import type { AttackOutcome, Coord, ShipInstance } from './types';

/**
 * Labels every 4-connected run of one ship id as a ship instance, scanning
 * row-major so the result order is stable for a given grid.
 */
export function extractShips(grid: Grid): ShipInstance[] {
  const visited = new Set<string>();
  const ships: ShipInstance[] = [];
  grid.forEach((tag, c) => {
    if (tag === CellTag.Empty || visited.has(key(c))) {
      return;
    }
    if (!isShipId(tag)) {
      throw new RangeError(`Unexpected cell tag ${tag} at (${c.x},${c.y})`);
    }
    const cells = grid.floodFill(c, (t) => t === tag);
    const coords = new Set(cells.map(key));
    for (const k of coords) {
      visited.add(k);
    }
    ships.push({ shipId: tag, cells, coords, hits: new Set<string>() });
  });
  return ships;
}

export function isSunk(ship: ShipInstance): boolean {
  return ship.hits.size === ship.coords.size;
}

export function fleetDestroyed(ships: readonly ShipInstance[]): boolean {
  return ships.every(isSunk);
}

export function shipAt(ships: readonly ShipInstance[], target: Coord): ShipInstance | undefined {
  const k = key(target);
  return ships.find((s) => s.coords.has(k));
}

/** Marks `target` on the ship occupying it. Repeating a hit leaves the ship unchanged. */
export function resolveAttack(target: Coord, ships: readonly ShipInstance[]): AttackOutcome {
  const ship = shipAt(ships, target);
  if (!ship) {
    return { hit: false, sunk: false };
  }
  ship.hits.add(key(target));
  return { hit: true, sunk: isSunk(ship), shipId: ship.shipId };
}
