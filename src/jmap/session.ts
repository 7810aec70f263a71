import { AuthError } from '../errors.js';
import { createLogger } from '../logger.js';
import { Session } from '../types.js';
import { JMAP_MAIL, sessionSchema } from './protocol.js';
import { HttpClient, requestJson } from './transport.js';

const logger = createLogger('JMAP');

export function authHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    'Content-Type': 'application/json',
  };
}

/**
 * Exchange a bearer token for the API endpoint and account id.
 *
 * Safe to call any number of times; each call returns a fresh Session.
 * Rejected credentials and malformed session resources raise AuthError,
 * connection failures raise TransportError.
 */
export async function resolveSession(
  http: HttpClient,
  sessionUrl: string,
  token: string
): Promise<Session> {
  const headers = authHeaders(token);
  const body = await requestJson(http, sessionUrl, { method: 'GET', headers }, 'JMAP session');

  const parsed = sessionSchema.safeParse(body);
  if (!parsed.success) {
    throw new AuthError('JMAP session response missing apiUrl or accounts', undefined, {
      cause: parsed.error,
    });
  }

  const { apiUrl, accounts, primaryAccounts } = parsed.data;
  const accountId = primaryAccounts?.[JMAP_MAIL] ?? Object.keys(accounts)[0];
  if (!accountId) {
    throw new AuthError('JMAP session response has no accounts');
  }

  logger.debug(`Session resolved for account ${accountId}`);
  return { apiUrl, accountId, headers };
}
