import { MailboxContext } from '../context.js';
import { paginate } from '../pagination/paginator.js';
import { SenderCount } from '../types.js';
import { SenderTally } from './tally.js';

const DAY_MS = 24 * 60 * 60 * 1000;
// Months are approximated as 30 days
const DAYS_PER_MONTH = 30;

export interface TopSendersOptions {
  count: number;
  months: number;
  now?: Date;
}

export interface TopSendersReport {
  since: Date;
  senders: SenderCount[];
  uniqueSenders: number;
  emailsScanned: number;
  total: number | null;
}

export function lookbackStart(months: number, now: Date): Date {
  return new Date(now.getTime() - months * DAYS_PER_MONTH * DAY_MS);
}

/** UTC timestamp without milliseconds, as the `after` filter expects. */
export function formatUtcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export async function collectTopSenders(
  ctx: MailboxContext,
  options: TopSendersOptions
): Promise<TopSendersReport> {
  const since = lookbackStart(options.months, options.now ?? new Date());

  const result = await paginate({
    session: ctx.session,
    filter: { after: formatUtcTimestamp(since) },
    properties: ['from'],
    fetchPage: (session, request) => ctx.provider.fetchPage(session, request),
    refreshSession: () => ctx.provider.resolveSession(),
    progress: ctx.progress,
    label: 'fetched',
    retry: ctx.retry,
  });

  const tally = new SenderTally().addAll(result.items);

  return {
    since,
    senders: tally.top(options.count),
    uniqueSenders: tally.uniqueSenders,
    emailsScanned: result.position,
    total: result.total,
  };
}
