import { setTimeout as delay } from 'node:timers/promises';
import {
  AuthError,
  FetchOutcome,
  MailError,
  RetryableError,
  isRetryable,
} from '../errors.js';
import { createLogger } from '../logger.js';
import { ProgressReporter, silentProgress } from '../progress.js';
import { EmailFilter, EmailProperty, PageRequest, Session } from '../types.js';

const logger = createLogger('Paginator');

export const PAGE_SIZE = 50;

export interface RetryPolicy {
  maxRetries: number;
  /** First exponential delay; doubled on every further consecutive failure. */
  backoffBaseMs: number;
  /** Fixed pause before retrying after the session expired. */
  authRetryDelayMs: number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 5,
  backoffBaseMs: 2_000,
  authRetryDelayMs: 1_000,
  sleep: (ms) => delay(ms),
};

export type PageFetcher<T> = (session: Session, request: PageRequest) => Promise<FetchOutcome<T>>;

export interface PaginateOptions<T> {
  session: Session;
  filter: EmailFilter;
  properties: EmailProperty[];
  fetchPage: PageFetcher<T>;
  refreshSession: () => Promise<Session>;
  /** Stop once this many items are collected; 0 means no limit. */
  limit?: number;
  pageSize?: number;
  progress?: ProgressReporter;
  /** Verb shown in the progress line, e.g. "fetched" or "found". */
  label?: string;
  retry?: Partial<RetryPolicy>;
}

export interface PaginationResult<T> {
  items: T[];
  /** Number of items fetched from the server (before any limit truncation). */
  position: number;
  total: number | null;
  /** Latest session; differs from the input when it was refreshed mid-run. */
  session: Session;
}

type PaginatorState =
  | { kind: 'fetching' }
  | { kind: 'backoff'; delayMs: number }
  | { kind: 'done' }
  | { kind: 'failed'; error: MailError };

/**
 * Walk a paged query from position 0 until the server runs out of items.
 *
 * The total is requested only until the server first reports it. The run
 * ends on an empty page, once `position >= total`, or when `limit` items have
 * been collected. Auth and transport failures are retried with a session
 * refresh, up to `maxRetries` consecutive failures; protocol failures end the
 * run immediately.
 */
export async function paginate<T>(options: PaginateOptions<T>): Promise<PaginationResult<T>> {
  const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const pageSize = options.pageSize ?? PAGE_SIZE;
  const limit = options.limit ?? 0;
  const progress = options.progress ?? silentProgress;
  const label = options.label ?? 'fetched';

  let session = options.session;
  let items: T[] = [];
  let position = 0;
  let total: number | null = null;
  let retries = 0;
  let state: PaginatorState = { kind: 'fetching' };

  const fail = (error: RetryableError): PaginatorState => {
    retries += 1;
    if (retries > policy.maxRetries) {
      logger.debug(`Giving up after ${policy.maxRetries} retries`);
      return { kind: 'failed', error };
    }
    if (error instanceof AuthError) {
      progress.note('  session expired, refreshing...');
      return { kind: 'backoff', delayMs: policy.authRetryDelayMs };
    }
    const delayMs = policy.backoffBaseMs * 2 ** (retries - 1);
    progress.note(
      `  connection error, retrying in ${formatSeconds(delayMs)}s (${retries}/${policy.maxRetries})...`
    );
    return { kind: 'backoff', delayMs };
  };

  while (state.kind === 'fetching' || state.kind === 'backoff') {
    if (state.kind === 'backoff') {
      await policy.sleep(state.delayMs);
      try {
        session = await options.refreshSession();
        state = { kind: 'fetching' };
      } catch (error) {
        if (!isRetryable(error)) throw error;
        logger.debug('Session refresh failed:', error.message);
        state = fail(error);
      }
      continue;
    }

    const outcome = await options.fetchPage(session, {
      position,
      limit: pageSize,
      filter: options.filter,
      calculateTotal: total === null,
      properties: options.properties,
    });

    if (!outcome.ok) {
      const { error } = outcome;
      logger.debug(`Page at ${position} failed (${error.kind}):`, error.message);
      state = error.kind === 'protocol' ? { kind: 'failed', error } : fail(error);
      continue;
    }

    retries = 0;
    const { page } = outcome;
    if (total === null && page.total !== undefined) {
      total = page.total;
    }

    if (page.items.length === 0) {
      state = { kind: 'done' };
      continue;
    }

    items.push(...page.items);
    position += page.items.length;
    progress.update(`  ${label} ${position}/${total ?? '?'} emails...`);

    if (limit > 0 && items.length >= limit) {
      items = items.slice(0, limit);
      state = { kind: 'done' };
    } else if (total !== null && position >= total) {
      state = { kind: 'done' };
    }
  }

  progress.end();
  if (state.kind === 'failed') {
    throw state.error;
  }
  return { items, position, total, session };
}

function formatSeconds(ms: number): string {
  return Number.isInteger(ms / 1000) ? String(ms / 1000) : (ms / 1000).toFixed(1);
}
