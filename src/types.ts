export interface Session {
  apiUrl: string;
  accountId: string;
  headers: Record<string, string>;
}

export type EmailFilter = { from: string } | { after: string };

export type EmailProperty = 'id' | 'from' | 'subject' | 'receivedAt';

export interface PageRequest {
  position: number;
  limit: number;
  filter: EmailFilter;
  calculateTotal: boolean;
  properties: EmailProperty[];
}

export interface PageResult<T> {
  items: T[];
  total?: number;
}

export const UNKNOWN_SENDER = 'unknown';

export interface EmailSummary {
  id: string;
  // First sender address, or UNKNOWN_SENDER
  from: string;
  subject?: string;
  receivedAt?: string;
}

export type MailboxRole = 'trash';

export interface Mailbox {
  id: string;
  name: string;
}

export interface SetFailure {
  type: string;
  description?: string | null;
}

export interface MoveOutcome {
  updated: string[];
  notUpdated: Record<string, SetFailure>;
}

export interface SenderCount {
  address: string;
  count: number;
}

export interface MoveSummary {
  moved: number;
  failed: number;
  batches: number;
}
