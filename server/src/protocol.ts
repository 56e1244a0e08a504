import { z } from 'zod';
import { BOARD_SIZE } from '../../src/engine/data.js';
import { PLAYERS } from '../../src/engine/players.js';

const PlayerName = z.string().refine((name) => Object.hasOwn(PLAYERS, name), { message: 'Unknown player' });

export const WatchRequestSchema = z.object({
  rows: z.number().int().min(1).max(50).default(BOARD_SIZE),
  cols: z.number().int().min(1).max(50).default(BOARD_SIZE),
  shipCounts: z.array(z.number().int().min(0).max(100)).length(7).optional(),
  seed: z.number().int().min(0).max(0xffffffff).optional(),
  p1: PlayerName.default('probability'),
  p2: PlayerName.default('probability'),
  startingPlayer: z.union([z.literal(1), z.literal(2)]).default(1),
});

// Batches run on the request thread; this bounds how long one can hold it.
export const MAX_BATCH_CELLS = 20_000;

export const BatchRequestSchema = WatchRequestSchema.omit({ startingPlayer: true })
  .extend({
    count: z.number().int().min(1).max(1000).default(1),
  })
  .refine((r) => r.count * r.rows * r.cols <= MAX_BATCH_CELLS, {
    message: `Batch too large: count x rows x cols must not exceed ${MAX_BATCH_CELLS}`,
    path: ['count'],
  });

export const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  CORS_ORIGIN: z.string().default(''),
});

export type WatchRequest = z.infer<typeof WatchRequestSchema>;
export type BatchRequest = z.infer<typeof BatchRequestSchema>;
export type ServerEnv = z.infer<typeof ServerEnvSchema>;

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function safeParse<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
  const r = schema.safeParse(payload);
  if (!r.success) {
    throw new ValidationError(r.error.issues.map((i) => `${i.path.join('.') || 'payload'}: ${i.message}`).join(', '));
  }
  return r.data;
}
