import { MOVE_CAP_FACTOR } from './data';
import type { Grid } from './grid';
import { countShips } from './placement';
import type { PlayerFactory, Strategy } from './players';
import { SeededRng, deriveSeed } from './rng';
import { extractShips } from './rules';
import type { PlayerId, ShipCounts, ShipInstance } from './types';

export interface BattleConfig {
  rows: number;
  cols: number;
  shipCounts: ShipCounts;
  players: [PlayerFactory, PlayerFactory];
  startingPlayer?: PlayerId;
  seed?: number;
  index?: number;
}

export interface PlayerState {
  id: PlayerId;
  name: string;
  strategy: Strategy;
  // Authoritative instances; only the attack resolver mutates their hits.
  ships: ShipInstance[];
  board: Grid;
  attacked: Set<string>;
}

export type BattlePhase = 'in_progress' | 'game_over';

export interface BattleState {
  index: number;
  seed: number;
  rows: number;
  cols: number;
  shipCounts: ShipCounts;
  phase: BattlePhase;
  startingPlayer: PlayerId;
  current: PlayerId;
  moves: number;
  maxMoves: number;
  players: Record<PlayerId, PlayerState>;
  winner: PlayerId | null;
}

export function opponentOf(id: PlayerId): PlayerId {
  return id === 1 ? 2 : 1;
}

function createPlayer(id: PlayerId, factory: PlayerFactory, config: BattleConfig, seed: number): PlayerState {
  const ctx = {
    rows: config.rows,
    cols: config.cols,
    shipCounts: { ...config.shipCounts },
    rng: new SeededRng(deriveSeed(seed, id)),
  };
  const setup = factory.createBoardSetup(ctx);
  setup.placeShips();
  const board = setup.getBoard();
  if (board.rows !== config.rows || board.cols !== config.cols) {
    throw new RangeError(
      `Player ${id} (${factory.name}) returned a ${board.rows}x${board.cols} board, expected ${config.rows}x${config.cols}`
    );
  }
  return {
    id,
    name: factory.name,
    strategy: factory.createStrategy({ ...ctx, shipCounts: { ...config.shipCounts } }),
    ships: extractShips(board),
    board,
    attacked: new Set<string>(),
  };
}

/**
 * Places both fleets and builds both strategies. A battle is over before the
 * first move when a fleet is empty: a draw if both are, else the side with
 * ships wins.
 */
export function createBattle(config: BattleConfig): BattleState {
  const seed = (config.seed ?? 0) >>> 0;
  const startingPlayer = config.startingPlayer ?? 1;
  const p1 = createPlayer(1, config.players[0], config, seed);
  const p2 = createPlayer(2, config.players[1], config, seed);
  const state: BattleState = {
    index: config.index ?? 1,
    seed,
    rows: config.rows,
    cols: config.cols,
    shipCounts: { ...config.shipCounts },
    phase: 'in_progress',
    startingPlayer,
    current: startingPlayer,
    moves: 0,
    maxMoves: config.rows * config.cols * MOVE_CAP_FACTOR,
    players: { 1: p1, 2: p2 },
    winner: null,
  };

  const empty1 = p1.ships.length === 0;
  const empty2 = p2.ships.length === 0;
  if (countShips(config.shipCounts) === 0 || empty1 || empty2) {
    state.phase = 'game_over';
    state.winner = empty1 === empty2 ? null : empty1 ? 2 : 1;
  }
  return state;
}
