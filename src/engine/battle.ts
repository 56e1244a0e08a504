import { InvalidAttackError } from './errors';
import { key } from './grid';
import { fleetDestroyed, resolveAttack } from './rules';
import { type BattleConfig, type BattleState, createBattle, opponentOf } from './state';
import type { BattleSink, BattleStartInfo, BattleSummary, Coord, MoveEvent, PlayerId } from './types';

export function validateAttack(state: BattleState, attacker: PlayerId, target: Coord): void {
  if (!Number.isInteger(target.x) || !Number.isInteger(target.y)) {
    throw new InvalidAttackError(attacker, target, 'not_integer');
  }
  if (target.x < 0 || target.y < 0 || target.x >= state.cols || target.y >= state.rows) {
    throw new InvalidAttackError(attacker, target, 'out_of_bounds');
  }
  if (state.players[attacker].attacked.has(key(target))) {
    throw new InvalidAttackError(attacker, target, 'repeated');
  }
}

/**
 * One attack by the current player: propose, validate, resolve against the
 * defender's instances, report back to the proposer, then check for the end.
 */
export function playTurn(state: BattleState, sinks: readonly BattleSink[] = []): MoveEvent {
  if (state.phase === 'game_over') {
    throw new Error('Battle is already over');
  }
  const attacker = state.players[state.current];
  const defender = state.players[opponentOf(state.current)];

  const proposed = attacker.strategy.getNextAttack();
  const target = { x: proposed.x, y: proposed.y };
  validateAttack(state, attacker.id, target);

  attacker.attacked.add(key(target));
  state.moves += 1;
  const { hit, sunk } = resolveAttack(target, defender.ships);
  attacker.strategy.registerAttack(target.x, target.y, hit, sunk);

  const event: MoveEvent = { move: state.moves, attacker: attacker.id, defender: defender.id, target, hit, sunk };
  for (const sink of sinks) {
    sink.onMove?.(event);
  }

  if (fleetDestroyed(defender.ships)) {
    state.phase = 'game_over';
    state.winner = attacker.id;
  } else if (state.moves >= state.maxMoves) {
    state.phase = 'game_over';
  } else {
    state.current = defender.id;
  }
  return event;
}

export function startInfo(state: BattleState): BattleStartInfo {
  return {
    index: state.index,
    seed: state.seed,
    rows: state.rows,
    cols: state.cols,
    shipCounts: { ...state.shipCounts },
    startingPlayer: state.startingPlayer,
    boards: { 1: state.players[1].board.toRows(), 2: state.players[2].board.toRows() },
  };
}

export function summarize(state: BattleState): BattleSummary {
  return {
    index: state.index,
    seed: state.seed,
    winner: state.winner,
    moves: state.moves,
    startingPlayer: state.startingPlayer,
  };
}

export function runBattle(config: BattleConfig, sinks: readonly BattleSink[] = []): BattleSummary {
  const state = createBattle(config);
  const info = startInfo(state);
  for (const sink of sinks) {
    sink.onBattleStart?.(info);
  }
  while (state.phase !== 'game_over') {
    playTurn(state, sinks);
  }
  const summary = summarize(state);
  for (const sink of sinks) {
    sink.onBattleEnd?.(summary);
  }
  return summary;
}
