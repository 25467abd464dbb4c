import { z } from 'zod';
import type { Context } from 'hono';
import { ValidationError } from './errors';

/**
 * A non-empty string whose every failure (absent, wrong type, empty)
 * reports the same client-facing message.
 */
const required = (message: string) =>
  z.string({ required_error: message, invalid_type_error: message }).min(1, message);

const body = <T extends z.ZodRawShape>(shape: T, message: string) =>
  z.object(shape, { required_error: message, invalid_type_error: message });

const MISSING_CREDENTIALS = 'Missing username or password';
const MISSING_MESSAGE_FIELDS = 'Missing recipient_username, sender_blob, or recipient_blob';

export const credentialsSchema = body({
  username: required(MISSING_CREDENTIALS).max(80, 'Username must be 80 characters or fewer.'),
  password: required(MISSING_CREDENTIALS),
}, MISSING_CREDENTIALS);

/** Login answers bad input with 401, so it carries no client messages. */
export const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const uploadKeySchema = body({
  public_key: required('Missing public_key'),
}, 'Missing public_key');

export const requestChatSchema = body({
  recipient_username: required('Missing recipient_username'),
}, 'Missing recipient_username');

export const acceptChatSchema = body({
  requester_username: required('Missing requester_username'),
}, 'Missing requester_username');

export const sendMessageSchema = body({
  recipient_username: required(MISSING_MESSAGE_FIELDS),
  sender_blob: required(MISSING_MESSAGE_FIELDS),
  recipient_blob: required(MISSING_MESSAGE_FIELDS),
}, MISSING_MESSAGE_FIELDS);

export const usernameQuerySchema = required('Missing username query parameter.');

const INVALID_SINCE_ID = 'Invalid since_id parameter, must be an integer.';

/** Absent or empty means 0. */
export const sinceIdSchema = z
  .string()
  .optional()
  .transform((raw) => (raw === undefined || raw === '' ? '0' : raw))
  .refine((raw) => /^[+-]?\d+$/.test(raw), INVALID_SINCE_ID)
  .transform((raw) => Number(raw))
  .refine((n) => Number.isSafeInteger(n), INVALID_SINCE_ID);

/**
 * Parse a value against a schema, raising ValidationError with the first
 * issue's message.
 */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid request');
  }
  return result.data;
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    // Body stream failures (e.g. the body limit) keep their own handling
    if (err instanceof SyntaxError) {
      throw new ValidationError('Invalid JSON body', 'INVALID_JSON');
    }
    throw err;
  }
}

export async function parseJsonBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> {
  return parseWith(schema, await readJsonBody(c));
}
