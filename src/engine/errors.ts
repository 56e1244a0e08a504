import type { Coord, PlayerId } from './types';

export type BattleErrorCode =
  | 'INSUFFICIENT_SPACE'
  | 'PLACEMENT_EXHAUSTED'
  | 'INVALID_ATTACK'
  | 'NO_ATTACKS_REMAINING';

export abstract class BattleError extends Error {
  abstract readonly code: BattleErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InsufficientSpaceError extends BattleError {
  readonly code = 'INSUFFICIENT_SPACE';

  constructor(
    readonly required: number,
    readonly available: number
  ) {
    super(`Not enough space to place all ships: ${required} tiles requested, board has ${available}`);
  }
}

export class PlacementExhaustedError extends BattleError {
  readonly code = 'PLACEMENT_EXHAUSTED';

  constructor(readonly restarts: number) {
    super(`Ship placement failed after ${restarts} restarts`);
  }
}

export type InvalidAttackReason = 'not_integer' | 'out_of_bounds' | 'repeated';

export class InvalidAttackError extends BattleError {
  readonly code = 'INVALID_ATTACK';

  constructor(
    readonly player: PlayerId,
    readonly target: Coord,
    readonly reason: InvalidAttackReason
  ) {
    super(`Player ${player} proposed an invalid attack at (${target.x},${target.y}): ${reason.replace('_', ' ')}`);
  }
}

export class NoAttacksRemainingError extends BattleError {
  readonly code = 'NO_ATTACKS_REMAINING';

  constructor() {
    super('No remaining attack positions');
  }
}
