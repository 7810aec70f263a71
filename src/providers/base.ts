import { FetchOutcome } from '../errors.js';
import { EmailSummary, Mailbox, MailboxRole, MoveOutcome, PageRequest, Session } from '../types.js';

export abstract class MailProvider {
  abstract readonly name: string;

  abstract resolveSession(): Promise<Session>;

  // Must not throw for auth/transport/protocol failures: they come back as outcomes
  abstract fetchPage(session: Session, request: PageRequest): Promise<FetchOutcome<EmailSummary>>;

  abstract findMailboxByRole(session: Session, role: MailboxRole): Promise<Mailbox>;

  abstract moveEmails(session: Session, ids: string[], mailboxId: string): Promise<MoveOutcome>;
}
