import { FetchOutcome, NotFoundError, ProtocolError, isFetchFailure } from '../errors.js';
import { createLogger } from '../logger.js';
import {
  EmailRecord,
  JMAP_USING,
  JmapResponse,
  MethodCall,
  emailGetResultSchema,
  emailSetResultSchema,
  extractMethodResponse,
  jmapResponseSchema,
  mailboxGetResultSchema,
  queryResultSchema,
  resultReference,
} from '../jmap/protocol.js';
import { resolveSession } from '../jmap/session.js';
import { FetchLike, HttpClient, requestJson } from '../jmap/transport.js';
import {
  EmailSummary,
  Mailbox,
  MailboxRole,
  MoveOutcome,
  PageRequest,
  Session,
  UNKNOWN_SENDER,
} from '../types.js';
import { MailProvider } from './base.js';

const logger = createLogger('JMAP');

export interface JmapProviderConfig {
  token: string;
  sessionUrl: string;
  requestTimeoutMs: number;
}

export class JmapProvider extends MailProvider {
  readonly name = 'jmap';
  private http: HttpClient;
  private config: JmapProviderConfig;

  constructor(config: JmapProviderConfig, fetchImpl: FetchLike = fetch) {
    super();
    this.config = config;
    this.http = { fetch: fetchImpl, timeoutMs: config.requestTimeoutMs };
  }

  async resolveSession(): Promise<Session> {
    return resolveSession(this.http, this.config.sessionUrl, this.config.token);
  }

  async fetchPage(session: Session, request: PageRequest): Promise<FetchOutcome<EmailSummary>> {
    const query: Record<string, unknown> = {
      accountId: session.accountId,
      filter: request.filter,
      sort: [{ property: 'receivedAt', isAscending: false }],
      position: request.position,
      limit: request.limit,
    };
    if (request.calculateTotal) {
      query.calculateTotal = true;
    }

    logger.debug(`Email/query position=${request.position} limit=${request.limit}`);

    try {
      const response = await this.call(session, [
        ['Email/query', query, '0'],
        [
          'Email/get',
          {
            accountId: session.accountId,
            '#ids': resultReference('0', 'Email/query'),
            properties: request.properties,
          },
          '1',
        ],
      ]);

      const { total } = extractMethodResponse(response, 0, 'Email/query', queryResultSchema);
      const { list } = extractMethodResponse(response, 1, 'Email/get', emailGetResultSchema);

      return { ok: true, page: { items: list.map(toSummary), total } };
    } catch (error) {
      if (isFetchFailure(error)) return { ok: false, error };
      throw error;
    }
  }

  async findMailboxByRole(session: Session, role: MailboxRole): Promise<Mailbox> {
    const response = await this.call(session, [
      ['Mailbox/query', { accountId: session.accountId, filter: { role } }, '0'],
      [
        'Mailbox/get',
        {
          accountId: session.accountId,
          '#ids': resultReference('0', 'Mailbox/query'),
          properties: ['id', 'name'],
        },
        '1',
      ],
    ]);

    extractMethodResponse(response, 0, 'Mailbox/query', queryResultSchema);
    const { list } = extractMethodResponse(response, 1, 'Mailbox/get', mailboxGetResultSchema);
    const mailbox = list[0];
    if (!mailbox) {
      throw new NotFoundError(`could not find ${capitalize(role)} mailbox`);
    }

    logger.debug(`Found ${role} mailbox ${mailbox.id} (${mailbox.name})`);
    return { id: mailbox.id, name: mailbox.name };
  }

  async moveEmails(session: Session, ids: string[], mailboxId: string): Promise<MoveOutcome> {
    const update: Record<string, { mailboxIds: Record<string, boolean> }> = {};
    for (const id of ids) {
      update[id] = { mailboxIds: { [mailboxId]: true } };
    }

    const response = await this.call(session, [
      ['Email/set', { accountId: session.accountId, update }, '0'],
    ]);
    const result = extractMethodResponse(response, 0, 'Email/set', emailSetResultSchema);

    return {
      updated: Object.keys(result.updated ?? {}),
      notUpdated: result.notUpdated ?? {},
    };
  }

  private async call(session: Session, methodCalls: MethodCall[]): Promise<JmapResponse> {
    const body = await requestJson(
      this.http,
      session.apiUrl,
      { method: 'POST', headers: session.headers, body: JSON.stringify({ using: JMAP_USING, methodCalls }) },
      `JMAP ${methodCalls[0]?.[0] ?? 'request'}`
    );

    const parsed = jmapResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProtocolError('JMAP response has no methodResponses array', { cause: parsed.error });
    }
    return parsed.data;
  }
}

function toSummary(record: EmailRecord): EmailSummary {
  const summary: EmailSummary = {
    id: record.id,
    from: record.from?.[0]?.email || UNKNOWN_SENDER,
  };
  if (record.subject != null) summary.subject = record.subject;
  if (record.receivedAt != null) summary.receivedAt = record.receivedAt;
  return summary;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
