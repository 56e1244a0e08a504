import type { ShipId, ShipTemplate } from './types';

export const BOARD_SIZE = 10;

export const SHIP_IDS: readonly ShipId[] = [1, 2, 3, 4, 5, 6, 7];

// Random fleets keep adding ships until this share of the board is covered.
export const RANDOM_FLEET_FILL = 0.3;

export const MOVE_CAP_FACTOR = 100;

export const HIT_BOOST = 2.0;

export const SHIPS: ShipTemplate[] = [
  { id: 1, name: 'Patrol Boat', size: 2, family: 'I', variants: [[{ x: 0, y: 0 }, { x: 1, y: 0 }]] },
  {
    id: 2,
    name: 'Destroyer',
    size: 3,
    family: 'I',
    variants: [[{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }]],
  },
  {
    id: 3,
    name: 'Cruiser',
    size: 4,
    family: 'I',
    variants: [[{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 3, y: 0 }]],
  },
  {
    id: 4,
    name: 'Tender',
    size: 4,
    family: 'T',
    variants: [[{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 1, y: 1 }]],
  },
  {
    id: 5,
    name: 'Carrier',
    size: 4,
    family: 'L',
    variants: [
      [{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 0, y: 2 }, { x: 1, y: 2 }],
      [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 2, y: 1 }],
      [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 }, { x: 0, y: 1 }],
      [{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 1, y: 1 }, { x: 2, y: 1 }],
    ],
  },
  {
    id: 6,
    name: 'Corvette',
    size: 4,
    family: 'Z',
    variants: [
      [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 1 }],
      [{ x: 0, y: 1 }, { x: 1, y: 1 }, { x: 1, y: 0 }, { x: 2, y: 0 }],
    ],
  },
  {
    id: 7,
    name: 'Dreadnought',
    size: 6,
    family: 'TT',
    variants: [
      [
        { x: 1, y: 0 },
        { x: 2, y: 0 },
        { x: 0, y: 1 },
        { x: 1, y: 1 },
        { x: 2, y: 1 },
        { x: 3, y: 1 },
      ],
    ],
  },
];

export const SHIP_BY_ID = Object.fromEntries(SHIPS.map((s) => [s.id, s])) as Record<ShipId, ShipTemplate>;

export function isShipId(value: number): value is ShipId {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}
