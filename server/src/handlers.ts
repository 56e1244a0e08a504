import type { Socket } from 'socket.io';
import { runBattle } from '../../src/engine/battle.js';
import { runBatch } from '../../src/engine/batch.js';
import { normalizeShipCounts, randomShipCounts } from '../../src/engine/placement.js';
import { getPlayer } from '../../src/engine/players.js';
import { BattleError } from '../../src/engine/errors.js';
import { SeededRng, randomSeed } from '../../src/engine/rng.js';
import type { BattleSink, BattleSummary } from '../../src/engine/types.js';
import type { ClientToServerEvents, ServerToClientEvents } from '../../src/online/types.js';
import type { BattleArchive, BatchRecord } from './battles.js';
import { BatchRequestSchema, ValidationError, WatchRequestSchema, safeParse } from './protocol.js';

export function handleBatchRequest(archive: BattleArchive, payload: unknown): BatchRecord {
  const request = safeParse(BatchRequestSchema, payload);
  const seed = request.seed ?? randomSeed();
  const result = runBatch({
    rows: request.rows,
    cols: request.cols,
    shipCounts: request.shipCounts ? normalizeShipCounts(request.shipCounts) : undefined,
    players: [getPlayer(request.p1), getPlayer(request.p2)],
    count: request.count,
    seed,
  });
  return archive.add(request, seed, result);
}

/** Plays one battle, reporting it to `sink` as it goes. */
export function handleWatchRequest(payload: unknown, sink: BattleSink): BattleSummary {
  const request = safeParse(WatchRequestSchema, payload);
  const seed = request.seed ?? randomSeed();
  const shipCounts = request.shipCounts
    ? normalizeShipCounts(request.shipCounts)
    : randomShipCounts(request.rows, request.cols, new SeededRng(seed));
  return runBattle(
    {
      rows: request.rows,
      cols: request.cols,
      shipCounts,
      players: [getPlayer(request.p1), getPlayer(request.p2)],
      startingPlayer: request.startingPlayer,
      seed,
    },
    [sink]
  );
}

/**
 * HTTP status for a failed request. A fleet that cannot be placed is the
 * caller's fault; an invalid attack from a built-in player is ours.
 */
export function statusFor(e: unknown): number {
  if (e instanceof ValidationError) {
    return 400;
  }
  if (e instanceof BattleError) {
    switch (e.code) {
      case 'INSUFFICIENT_SPACE':
      case 'PLACEMENT_EXHAUSTED':
        return 422;
      case 'INVALID_ATTACK':
      case 'NO_ATTACKS_REMAINING':
        return 500;
    }
  }
  return 500;
}

export function socketSink(socket: Socket<ClientToServerEvents, ServerToClientEvents>): BattleSink {
  return {
    onBattleStart: (info) => socket.emit('battle_start', { info }),
    onMove: (event) => socket.emit('move', { event }),
    onBattleEnd: (summary) => socket.emit('battle_over', { summary }),
  };
}
