import { type CliOptions, USAGE, loadCliOptions } from './config';
import { shipCountsToList } from './engine/placement';
import { formatMove, formatOutcome } from './log/battleLog';
import { OnlineClient } from './online/client';
import { simulate } from './simulate';

async function watchRemote(serverUrl: string, opts: CliOptions): Promise<void> {
  const client = new OnlineClient({ serverUrl });
  try {
    const summary = await client.watch(
      {
        rows: opts.height,
        cols: opts.width,
        shipCounts: opts.list ? shipCountsToList(opts.list) : undefined,
        seed: opts.seed,
        p1: opts.p1,
        p2: opts.p2,
      },
      (event) => console.log(formatMove(event))
    );
    console.log(formatOutcome(summary));
  } finally {
    client.close();
  }
}

async function main(argv: string[]): Promise<void> {
  const opts = loadCliOptions(argv);
  if (opts.help) {
    console.log(USAGE);
    return;
  }
  if (opts.watch) {
    await watchRemote(opts.watch, opts);
    return;
  }
  simulate(opts);
}

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error(`[battle] ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
});
