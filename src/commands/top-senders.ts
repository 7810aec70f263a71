import { StreamProgress } from '../progress.js';
import { formatTopSenders } from '../senders/format.js';
import { collectTopSenders, lookbackStart } from '../senders/top-senders.js';
import { CommandDeps } from './run.js';

export interface TopSendersCommandOptions {
  count: number;
  months: number;
}

export async function runTopSenders(
  deps: CommandDeps,
  options: TopSendersCommandOptions
): Promise<number> {
  const { provider, stdout, stderr } = deps;
  const now = deps.now?.() ?? new Date();
  const since = lookbackStart(options.months, now);

  stderr.write(`Fetching emails since ${since.toISOString().slice(0, 10)}...\n`);

  const session = await provider.resolveSession();
  const report = await collectTopSenders(
    { provider, session, progress: new StreamProgress(stderr), retry: deps.retry },
    { count: options.count, months: options.months, now }
  );

  if (report.senders.length === 0) {
    stderr.write('No emails found.\n');
    return 0;
  }

  for (const line of formatTopSenders(report.senders, options.count)) {
    stdout.write(`${line}\n`);
  }
  stderr.write(`\n  ${report.uniqueSenders} unique senders, ${report.emailsScanned} emails total\n`);
  return 0;
}
