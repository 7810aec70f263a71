import { z } from 'zod';
import { ProtocolError } from '../errors.js';

export const JMAP_CORE = 'urn:ietf:params:jmap:core';
export const JMAP_MAIL = 'urn:ietf:params:jmap:mail';
export const JMAP_USING = [JMAP_CORE, JMAP_MAIL];

export type MethodCall = [name: string, args: Record<string, unknown>, callId: string];

export interface JmapRequest {
  using: string[];
  methodCalls: MethodCall[];
}

/** Back-reference to the ids produced by an earlier call in the same request. */
export function resultReference(callId: string, name: string, path = '/ids/*') {
  return { resultOf: callId, name, path };
}

export const sessionSchema = z.object({
  apiUrl: z.string().min(1),
  accounts: z.record(z.unknown()),
  primaryAccounts: z.record(z.string()).optional(),
});

export type JmapSessionResource = z.infer<typeof sessionSchema>;

export const jmapResponseSchema = z.object({
  methodResponses: z.array(z.tuple([z.string(), z.record(z.unknown()), z.string()])),
  sessionState: z.string().optional(),
});

export type JmapResponse = z.infer<typeof jmapResponseSchema>;

const methodErrorSchema = z.object({
  type: z.string().default('unknown'),
  description: z.string().optional(),
});

export const queryResultSchema = z.object({
  ids: z.array(z.string()),
  total: z.number().int().nonnegative().optional(),
});

const addressSchema = z.object({
  name: z.string().nullish(),
  email: z.string().nullish(),
});

export const emailRecordSchema = z.object({
  id: z.string(),
  from: z.array(addressSchema).nullish(),
  subject: z.string().nullish(),
  receivedAt: z.string().nullish(),
});

export type EmailRecord = z.infer<typeof emailRecordSchema>;

export const emailGetResultSchema = z.object({
  list: z.array(emailRecordSchema),
});

export const mailboxGetResultSchema = z.object({
  list: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
    })
  ),
});

const setErrorSchema = z.object({
  type: z.string(),
  description: z.string().nullish(),
});

export const emailSetResultSchema = z.object({
  updated: z.record(z.unknown()).nullish(),
  notUpdated: z.record(setErrorSchema).nullish(),
});

/**
 * Pull the result of the call at `index` out of a response and validate it.
 *
 * Method responses are `[name, result, callId]` tuples; a server-side failure
 * of one call comes back as `["error", { type, description }, callId]`.
 */
export function extractMethodResponse<S extends z.ZodTypeAny>(
  response: JmapResponse,
  index: number,
  methodName: string,
  schema: S
): z.infer<S> {
  const entry = response.methodResponses[index];
  if (!entry) {
    throw new ProtocolError(
      `JMAP response missing entry ${index} for ${methodName} ` +
        `(got ${response.methodResponses.length} response(s))`
    );
  }

  const [name, result] = entry;
  if (name === 'error') {
    const parsed = methodErrorSchema.safeParse(result);
    const type = parsed.success ? parsed.data.type : 'unknown';
    const description = parsed.success && parsed.data.description ? `: ${parsed.data.description}` : '';
    throw new ProtocolError(`JMAP error for ${methodName}: ${type}${description}`);
  }

  const parsed = schema.safeParse(result);
  if (!parsed.success) {
    throw new ProtocolError(`Malformed ${methodName} response`, { cause: parsed.error });
  }
  return parsed.data;
}
