import { randomBytes } from 'node:crypto';
import { type BatchResult, type BatchStats, averageMoves } from '../../src/engine/batch.js';
import { shipCountsToList } from '../../src/engine/placement.js';
import type { BattleSummary, PlayerId } from '../../src/engine/types.js';
import type { BatchRequest } from './protocol.js';

export interface BatchRecord {
  id: string;
  createdAt: number;
  request: BatchRequest;
  seed: number;
  shipCounts: number[];
  stats: BatchStats;
  summaries: BattleSummary[];
}

export interface BatchPublicInfo {
  id: string;
  createdAt: number;
  battles: number;
  wins: Record<PlayerId, number>;
  draws: number;
  averageMoves: number;
}

function id12(): string {
  return randomBytes(6).toString('hex');
}

/** Recent batch results, dropped after `ttlMs` or once more than `maxRecords` are held. */
export class BattleArchive {
  private records = new Map<string, BatchRecord>();

  constructor(
    private ttlMs = 1000 * 60 * 60,
    private maxRecords = 100
  ) {}

  listPublic(): BatchPublicInfo[] {
    const list: BatchPublicInfo[] = [];
    for (const r of this.records.values()) {
      list.push({
        id: r.id,
        createdAt: r.createdAt,
        battles: r.stats.battles,
        wins: { ...r.stats.wins },
        draws: r.stats.draws,
        averageMoves: averageMoves(r.stats),
      });
    }
    return list.sort((a, b) => b.createdAt - a.createdAt);
  }

  get(id: string): BatchRecord | undefined {
    return this.records.get(id);
  }

  get size(): number {
    return this.records.size;
  }

  add(request: BatchRequest, seed: number, result: BatchResult, now = Date.now()): BatchRecord {
    let id = id12();
    while (this.records.has(id)) {
      id = id12();
    }
    const record: BatchRecord = {
      id,
      createdAt: now,
      request,
      seed,
      shipCounts: shipCountsToList(result.shipCounts),
      stats: result.stats,
      summaries: result.summaries,
    };
    this.records.set(id, record);
    // Map iteration follows insertion order, so the first keys are the oldest.
    for (const oldest of this.records.keys()) {
      if (this.records.size <= this.maxRecords) {
        break;
      }
      this.records.delete(oldest);
    }
    return record;
  }

  cleanup(now = Date.now()): void {
    for (const [id, r] of this.records) {
      if (now - r.createdAt > this.ttlMs) {
        this.records.delete(id);
      }
    }
  }
}
