import { MailboxContext } from '../context.js';
import { paginate } from '../pagination/paginator.js';
import { EmailSummary, MoveSummary, Session } from '../types.js';
import { moveInBatches } from './mover.js';

export interface FindOptions {
  sender: string;
  /** 0 means every matching email. */
  limit: number;
}

export interface FoundEmails {
  emails: EmailSummary[];
  total: number | null;
  session: Session;
}

export interface DryRunEntry {
  date: string;
  subject: string;
}

/** Newest first, so a limit keeps the most recent emails. */
export async function findEmailsFromSender(
  ctx: MailboxContext,
  options: FindOptions
): Promise<FoundEmails> {
  const result = await paginate({
    session: ctx.session,
    filter: { from: options.sender },
    properties: ['id', 'subject', 'from', 'receivedAt'],
    fetchPage: (session, request) => ctx.provider.fetchPage(session, request),
    refreshSession: () => ctx.provider.resolveSession(),
    limit: options.limit,
    progress: ctx.progress,
    label: 'found',
    retry: ctx.retry,
  });

  return { emails: result.items, total: result.total, session: result.session };
}

export async function moveEmailsToTrash(
  ctx: MailboxContext,
  emails: EmailSummary[]
): Promise<MoveSummary> {
  const trash = await ctx.provider.findMailboxByRole(ctx.session, 'trash');
  return moveInBatches(
    ctx.provider,
    ctx.session,
    emails.map((email) => email.id),
    trash.id,
    ctx.progress
  );
}

export function describeForDryRun(email: EmailSummary): DryRunEntry {
  return {
    date: email.receivedAt ? email.receivedAt.slice(0, 10) : 'unknown date',
    subject: email.subject || '(no subject)',
  };
}

export function formatDryRun(emails: EmailSummary[]): string[] {
  return emails.map(describeForDryRun).map(({ date, subject }) => `  ${date}  ${subject}`);
}
