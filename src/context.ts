import { RetryPolicy } from './pagination/paginator.js';
import { ProgressReporter } from './progress.js';
import { MailProvider } from './providers/base.js';
import { Session } from './types.js';

/**
 * Everything an operation needs to talk to the mailbox. The session is passed
 * explicitly; operations return the session they ended with so callers can
 * keep using a refreshed one.
 */
export interface MailboxContext {
  provider: MailProvider;
  session: Session;
  progress: ProgressReporter;
  retry?: Partial<RetryPolicy>;
}
