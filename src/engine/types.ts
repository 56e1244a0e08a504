export type PlayerId = 1 | 2;

export type ShipId = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export type ShipFamily = 'I' | 'L' | 'T' | 'Z' | 'TT';

export type ShapeKind = ShipFamily | 'unknown';

export interface Coord {
  x: number;
  y: number;
}

export interface ShipTemplate {
  id: ShipId;
  name: string;
  size: number;
  family: ShipFamily;
  // Alternative footprints; placement picks one uniformly.
  variants: Coord[][];
}

export type ShipCounts = Record<ShipId, number>;

export interface ShipInstance {
  shipId: ShipId;
  cells: Coord[];
  coords: Set<string>;
  hits: Set<string>;
}

export interface AttackOutcome {
  hit: boolean;
  sunk: boolean;
  shipId?: ShipId;
}

export interface ShapeAnalysis {
  size: number;
  family: ShapeKind;
  width: number;
  height: number;
}

export type EnemyMark = '?' | 'H' | 'M';

export interface MoveEvent {
  move: number;
  attacker: PlayerId;
  defender: PlayerId;
  target: Coord;
  hit: boolean;
  sunk: boolean;
}

export interface BattleStartInfo {
  index: number;
  seed: number;
  rows: number;
  cols: number;
  shipCounts: ShipCounts;
  startingPlayer: PlayerId;
  // Copies of the placed boards, for display sinks only.
  boards: Record<PlayerId, number[][]>;
}

export interface BattleSummary {
  index: number;
  seed: number;
  winner: PlayerId | null;
  moves: number;
  startingPlayer: PlayerId;
}

export interface BattleSink {
  onBattleStart?(info: BattleStartInfo): void;
  onMove?(event: MoveEvent): void;
  onBattleEnd?(summary: BattleSummary): void;
}
