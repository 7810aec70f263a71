import { describe, it, expect, vi } from 'vitest';
import { AuthError, ProtocolError, TransportError } from '../errors.js';
import { StreamProgress } from '../progress.js';
import { FakeMailbox, captureStream, makeEmails } from '../testing/fake-mailbox.js';
import { EmailSummary } from '../types.js';
import { PAGE_SIZE, PaginateOptions, paginate } from './paginator.js';

function setup(mailbox: FakeMailbox, overrides: Partial<PaginateOptions<EmailSummary>> = {}) {
  const sleep = vi.fn(async (_ms: number) => {});
  const run = async () =>
    paginate<EmailSummary>({
      session: await mailbox.resolveSession(),
      filter: { from: 'news@example.com' },
      properties: ['id', 'from', 'subject', 'receivedAt'],
      fetchPage: (session, request) => mailbox.fetchPage(session, request),
      refreshSession: () => mailbox.resolveSession(),
      retry: { sleep },
      ...overrides,
    });
  return { sleep, run };
}

describe('paginate', () => {
  it('walks 120 matches in pages of 50, 50 and 20', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    const { run } = setup(mailbox);

    const result = await run();

    expect(mailbox.fetchRequests.map((r) => r.position)).toEqual([0, 50, 100]);
    expect(mailbox.fetchRequests.map((r) => r.limit)).toEqual([PAGE_SIZE, PAGE_SIZE, PAGE_SIZE]);
    expect(result.items).toHaveLength(120);
    expect(result.position).toBe(120);
    expect(result.total).toBe(120);
    expect(result.items[0].id).toBe('e1');
    expect(result.items[119].id).toBe('e120');
  });

  it.each([0, 1, 49, 50, 51, 100, 149, 250])('fetches ceil(N/50) pages for N=%i', async (count) => {
    const mailbox = new FakeMailbox({ emails: makeEmails(count, 'news@example.com') });
    const { run } = setup(mailbox);

    const result = await run();

    expect(mailbox.fetchRequests).toHaveLength(Math.max(1, Math.ceil(count / PAGE_SIZE)));
    expect(result.items).toHaveLength(count);
    expect(result.position).toBe(count);
  });

  it('asks for the total only until it is known', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    const { run } = setup(mailbox);

    await run();

    expect(mailbox.fetchRequests.map((r) => r.calculateTotal)).toEqual([true, false, false]);
  });

  it('stops at the first empty page when the server never reports a total', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com'), reportTotal: false });
    const { run } = setup(mailbox);

    const result = await run();

    expect(mailbox.fetchRequests.map((r) => r.position)).toEqual([0, 50, 100, 120]);
    expect(mailbox.fetchRequests.every((r) => r.calculateTotal)).toBe(true);
    expect(result.items).toHaveLength(120);
    expect(result.total).toBeNull();
  });

  it('reports a zero total for an empty result', async () => {
    const mailbox = new FakeMailbox({ emails: [] });
    const { run } = setup(mailbox);

    const result = await run();

    expect(result).toMatchObject({ items: [], position: 0, total: 0 });
  });

  it('truncates to the limit and keeps the newest emails', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    const { run } = setup(mailbox, { limit: 60 });

    const result = await run();

    expect(mailbox.fetchRequests).toHaveLength(2);
    expect(result.items).toHaveLength(60);
    expect(result.items[59].id).toBe('e60');
    expect(result.position).toBe(100);
  });

  it('recovers from five consecutive transport errors with exponential backoff', async () => {
    const clean = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    const expected = await setup(clean).run();

    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    mailbox.failNextFetches(...Array.from({ length: 5 }, () => new TransportError('connection reset')));
    const { run, sleep } = setup(mailbox);

    const result = await run();

    expect(result.items).toEqual(expected.items);
    expect(result.total).toBe(expected.total);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 8000, 16000, 32000]);
    // one initial resolution plus one refresh per retry
    expect(mailbox.resolveCount).toBe(6);
  });

  it('gives up on the sixth consecutive transport error', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    const failure = new TransportError('connection reset');
    mailbox.failNextFetches(...Array.from({ length: 6 }, () => failure));
    const { run, sleep } = setup(mailbox);

    await expect(run()).rejects.toBe(failure);
    expect(sleep).toHaveBeenCalledTimes(5);
    expect(mailbox.fetchRequests).toHaveLength(6);
  });

  it('keeps nothing past the last successful page when it gives up', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    let calls = 0;
    const stderr = captureStream();
    const { run } = setup(mailbox, {
      progress: new StreamProgress(stderr),
      fetchPage: async (session, request) => {
        calls += 1;
        if (calls > 1) return { ok: false, error: new TransportError('timed out') };
        return mailbox.fetchPage(session, request);
      },
    });

    await expect(run()).rejects.toThrow('timed out');
    const updates = stderr.chunks.filter((chunk) => chunk.startsWith('\r'));
    expect(updates).toEqual(['\r  fetched 50/120 emails...']);
  });

  it('resets the retry counter after a successful page', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(120, 'news@example.com') });
    // five failures before page 1 and five more before page 2
    const script = [5, 5, 0];
    let page = 0;
    let failuresLeft = script[0];
    const { run, sleep } = setup(mailbox, {
      fetchPage: async (session, request) => {
        if (failuresLeft > 0) {
          failuresLeft -= 1;
          return { ok: false, error: new TransportError('flaky') };
        }
        page += 1;
        failuresLeft = script[page] ?? 0;
        return mailbox.fetchPage(session, request);
      },
    });

    const result = await run();

    expect(result.items).toHaveLength(120);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([
      2000, 4000, 8000, 16000, 32000, 2000, 4000, 8000, 16000, 32000,
    ]);
  });

  it('refreshes the session after an auth failure with a fixed short delay', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(70, 'news@example.com') });
    mailbox.failNextFetches(new AuthError('session expired', 401), new AuthError('session expired', 401));
    const { run, sleep } = setup(mailbox);

    const result = await run();

    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 1000]);
    expect(result.items).toHaveLength(70);
    expect(result.session.headers.Authorization).toBe('Bearer test-token-3');
    expect(mailbox.fetchSessions.map((s) => s.headers.Authorization)).toEqual([
      'Bearer test-token-1',
      'Bearer test-token-2',
      'Bearer test-token-3',
      'Bearer test-token-3',
    ]);
  });

  it('propagates an auth error once retries are exhausted', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(10, 'news@example.com') });
    mailbox.failNextFetches(...Array.from({ length: 6 }, () => new AuthError('bad token', 401)));
    const { run } = setup(mailbox);

    await expect(run()).rejects.toBeInstanceOf(AuthError);
  });

  it('fails immediately on a protocol error', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(10, 'news@example.com') });
    mailbox.failNextFetches(new ProtocolError('JMAP error for Email/get: invalidArguments'));
    const { run, sleep } = setup(mailbox);

    await expect(run()).rejects.toThrow('JMAP error for Email/get: invalidArguments');
    expect(sleep).not.toHaveBeenCalled();
    expect(mailbox.fetchRequests).toHaveLength(1);
  });

  it('counts a failed session refresh as another consecutive failure', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(10, 'news@example.com') });
    const { run, sleep } = setup(mailbox);
    // the first resolution (the initial session) succeeds
    const first = run();
    mailbox.failNextFetches(new TransportError('connection reset'));
    mailbox.failNextSessions(new TransportError('connection refused'));

    const result = await first;

    expect(result.items).toHaveLength(10);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000]);
  });

  it('does not retry a refresh that fails for a non-retryable reason', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(10, 'news@example.com') });
    const { run } = setup(mailbox);
    const pending = run();
    mailbox.failNextFetches(new TransportError('connection reset'));
    mailbox.failNextSessions(new Error('unexpected'));

    await expect(pending).rejects.toThrow('unexpected');
  });

  it('writes progress and retry notes to a single updating line', async () => {
    const mailbox = new FakeMailbox({ emails: makeEmails(60, 'news@example.com') });
    const stderr = captureStream();
    let calls = 0;
    const { run } = setup(mailbox, {
      label: 'found',
      progress: new StreamProgress(stderr),
      fetchPage: async (session, request) => {
        calls += 1;
        if (calls === 2) return { ok: false, error: new TransportError('connection reset') };
        return mailbox.fetchPage(session, request);
      },
    });

    await run();

    expect(stderr.text()).toBe(
      '\r  found 50/60 emails...' +
        '\n  connection error, retrying in 2s (1/5)...\n' +
        '\r  found 60/60 emails...\n'
    );
  });
});
