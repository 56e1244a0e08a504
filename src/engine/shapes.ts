import { SHIPS } from './data';
import { key } from './grid';
import type { Coord, ShapeAnalysis, ShapeKind } from './types';

export type Rotation = 0 | 90 | 180 | 270;

export const ROTATIONS: readonly Rotation[] = [0, 90, 180, 270];

export function rotateShape(offsets: readonly Coord[], degrees: Rotation, anchor: Coord): Coord[] {
  return offsets.map(({ x: dx, y: dy }) => {
    switch (degrees) {
      case 90:
        return { x: anchor.x - dy, y: anchor.y + dx };
      case 180:
        return { x: anchor.x - dx, y: anchor.y - dy };
      case 270:
        return { x: anchor.x + dy, y: anchor.y - dx };
      default:
        return { x: anchor.x + dx, y: anchor.y + dy };
    }
  });
}

/** Translates cells so the smallest x and y are 0, sorted row-major. */
export function normalizeCells(cells: readonly Coord[]): Coord[] {
  if (!cells.length) {
    return [];
  }
  const minX = Math.min(...cells.map((c) => c.x));
  const minY = Math.min(...cells.map((c) => c.y));
  return cells
    .map((c) => ({ x: c.x - minX, y: c.y - minY }))
    .sort((a, b) => a.y - b.y || a.x - b.x);
}

function signature(cells: readonly Coord[]): string {
  return normalizeCells(cells).map(key).join(';');
}

function mirror(cells: readonly Coord[]): Coord[] {
  return cells.map((c) => ({ x: -c.x, y: c.y }));
}

// Every rotation and mirror image of every catalogue footprint, keyed by normalized cells.
const FAMILY_BY_SIGNATURE: Map<string, ShapeKind> = (() => {
  const map = new Map<string, ShapeKind>();
  for (const ship of SHIPS) {
    for (const variant of ship.variants) {
      for (const base of [variant, mirror(variant)]) {
        for (const r of ROTATIONS) {
          const sig = signature(rotateShape(base, r, { x: 0, y: 0 }));
          if (!map.has(sig)) {
            map.set(sig, ship.family);
          }
        }
      }
    }
  }
  return map;
})();

export function boundingBox(cells: readonly Coord[]): { minX: number; minY: number; maxX: number; maxY: number } {
  return {
    minX: Math.min(...cells.map((c) => c.x)),
    minY: Math.min(...cells.map((c) => c.y)),
    maxX: Math.max(...cells.map((c) => c.x)),
    maxY: Math.max(...cells.map((c) => c.y)),
  };
}

export function analyzeShipShape(cells: readonly Coord[]): ShapeAnalysis {
  if (!cells.length) {
    return { size: 0, family: 'unknown', width: 0, height: 0 };
  }
  const box = boundingBox(cells);
  const width = box.maxX - box.minX + 1;
  const height = box.maxY - box.minY + 1;
  const known = FAMILY_BY_SIGNATURE.get(signature(cells));
  if (known) {
    return { size: cells.length, family: known, width, height };
  }
  if (width === 1 || height === 1) {
    return { size: cells.length, family: 'I', width, height };
  }
  return { size: cells.length, family: 'unknown', width, height };
}
