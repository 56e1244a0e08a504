import { parseArgs } from 'node:util';
import { z } from 'zod';
import { BOARD_SIZE } from './engine/data';
import { normalizeShipCounts } from './engine/placement';
import { PLAYERS } from './engine/players';

export const USAGE = `Usage: naval-duel [options]

  -v, --verbose        print every move
  -c, --count N        number of battles (default 1)
  -W, --width N        board width (default ${BOARD_SIZE})
  -H, --height N       board height (default ${BOARD_SIZE})
  -l, --list A,B,...   ship counts for ids 1..7 (default: random fleet covering 30% of the board)
  -s, --seed N         base seed (env BATTLE_SEED)
      --log-dir DIR    write a text log per battle (env BATTLE_LOG_DIR)
      --render         print the defender's board after every move
      --p1 NAME        player 1 (${Object.keys(PLAYERS).join(' | ')}, default probability)
      --p2 NAME        player 2
      --watch URL      play one battle on a server and stream its moves
      --help           show this text
`;

const PlayerNameSchema = z
  .string()
  .refine((name) => Object.hasOwn(PLAYERS, name), (name) => ({ message: `Unknown player "${name}"` }));

export const CliOptionsSchema = z.object({
  help: z.boolean().default(false),
  verbose: z.boolean().default(false),
  count: z.coerce.number().int().min(1).max(1_000_000).default(1),
  width: z.coerce.number().int().min(1).max(100).default(BOARD_SIZE),
  height: z.coerce.number().int().min(1).max(100).default(BOARD_SIZE),
  list: z
    .string()
    .regex(/^\s*\d+(\s*,\s*\d+){6}\s*$/, 'Ship counts must be 7 comma-separated integers')
    .transform((s) => normalizeShipCounts(s.split(',').map((n) => Number(n.trim()))))
    .optional(),
  seed: z.coerce.number().int().min(0).max(0xffffffff).optional(),
  logDir: z.string().min(1).optional(),
  render: z.boolean().default(false),
  p1: PlayerNameSchema.default('probability'),
  p2: PlayerNameSchema.default('probability'),
  watch: z.string().url().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function loadCliOptions(argv: string[], env: NodeJS.ProcessEnv = process.env): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      help: { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      count: { type: 'string', short: 'c' },
      width: { type: 'string', short: 'W' },
      height: { type: 'string', short: 'H' },
      list: { type: 'string', short: 'l' },
      seed: { type: 'string', short: 's' },
      'log-dir': { type: 'string' },
      render: { type: 'boolean' },
      p1: { type: 'string' },
      p2: { type: 'string' },
      watch: { type: 'string' },
    },
  });

  const r = CliOptionsSchema.safeParse({
    help: values.help,
    verbose: values.verbose,
    count: values.count,
    width: values.width,
    height: values.height,
    list: values.list,
    seed: values.seed ?? (env.BATTLE_SEED || undefined),
    logDir: values['log-dir'] ?? (env.BATTLE_LOG_DIR || undefined),
    render: values.render,
    p1: values.p1,
    p2: values.p2,
    watch: values.watch,
  });
  if (!r.success) {
    throw new Error(r.error.issues.map((i) => `${i.path.join('.') || 'options'}: ${i.message}`).join(', '));
  }
  return r.data;
}
