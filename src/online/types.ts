import type { BattleStartInfo, BattleSummary, MoveEvent, PlayerId } from '../engine/types';

export interface WatchRequest {
  rows?: number;
  cols?: number;
  // Seven counts, ship ids 1..7. Omitted: a random fleet.
  shipCounts?: number[];
  seed?: number;
  p1?: string;
  p2?: string;
  startingPlayer?: PlayerId;
}

export interface ServerToClientEvents {
  battle_start: (payload: { info: BattleStartInfo }) => void;
  move: (payload: { event: MoveEvent }) => void;
  battle_over: (payload: { summary: BattleSummary }) => void;
  error_msg: (payload: { message: string }) => void;
}

export interface ClientToServerEvents {
  watch: (payload: WatchRequest) => void;
}
