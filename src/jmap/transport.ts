import { AuthError, ProtocolError, TransportError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('JMAP');

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClient {
  fetch: FetchLike;
  timeoutMs: number;
}

const AUTH_STATUSES = new Set([401, 403]);
// Rate limiting and gateway hiccups clear up on their own
const TRANSIENT_STATUSES = new Set([429, 502, 503, 504]);

/**
 * Perform one HTTP exchange and decode its JSON body. Failures are mapped onto
 * the error taxonomy: 401/403 are auth failures, connection problems, timeouts
 * and transient statuses are transport failures, and anything else
 * (including an unreadable body) is a protocol failure.
 */
export async function requestJson(
  http: HttpClient,
  url: string,
  init: RequestInit,
  label: string
): Promise<unknown> {
  let response: Response;
  try {
    response = await http.fetch(url, { ...init, signal: AbortSignal.timeout(http.timeoutMs) });
  } catch (error) {
    logger.debug(`${label} failed before a response:`, error);
    throw new TransportError(`${label}: ${describeNetworkError(error)}`, undefined, { cause: error });
  }

  if (!response.ok) {
    const message = `${label} failed: ${response.status} ${response.statusText}`.trimEnd();
    if (AUTH_STATUSES.has(response.status)) {
      throw new AuthError(message, response.status);
    }
    if (TRANSIENT_STATUSES.has(response.status)) {
      throw new TransportError(message, response.status);
    }
    throw new ProtocolError(message);
  }

  try {
    return await response.json();
  } catch (error) {
    if (isTimeout(error)) {
      throw new TransportError(`${label}: request timed out`, undefined, { cause: error });
    }
    throw new ProtocolError(`${label}: response body is not valid JSON`, { cause: error });
  }
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function describeNetworkError(error: unknown): string {
  if (isTimeout(error)) return 'request timed out';
  if (error instanceof Error) return error.message;
  return 'connection failed';
}
