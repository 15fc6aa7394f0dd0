import { z } from 'zod';
import { ForwarderKind, HTTP_METHODS } from '../../types/forwarder';
import { ConfigError } from '../../utils/errors';

export const DEFAULT_RELAY_BASE_URL = 'https://forwarder.whatever.team';
export const DEFAULT_BOT_HANDLE = 'smsforwarderrobot';

// Tags written by earlier releases, still accepted on decode
export const LEGACY_TAGS: Record<string, ForwarderKind> = {
  StdoutForwarder: 'Stdout',
  HttpCallbackForwarder: 'HttpCallback',
  TelegramBotForwarder: 'TelegramBot',
  DeployedTelegramBotForwarder: 'ManagedRelay',
};

const absent = (value: unknown) => (value === null || value === '' ? undefined : value);

const payloadSchema = z.preprocess(absent, z.record(z.string()).default({}));

const methodSchema = z.preprocess(
  absent,
  z.enum(HTTP_METHODS, { errorMap: () => ({ message: 'Invalid HTTP method' }) }).default('POST')
);

export const httpCallbackSchema = z.object({
  callbackUrl: z.string({ required_error: 'Missing the callback url' }).min(1, 'Missing the callback url'),
  method: methodSchema,
  uriPayload: payloadSchema,
  jsonPayload: payloadSchema,
});

export const telegramBotSchema = z.object({
  token: z.string({ required_error: 'Missing the token' }).min(1, 'Missing the token'),
  chatId: z.union([z.number().int(), z.string().min(1)], {
    errorMap: (issue, ctx) =>
      issue.code === 'invalid_union' && ctx.data === undefined
        ? { message: 'Missing the chat id' }
        : { message: 'Invalid chat id' },
  }),
});

export const managedRelaySchema = z.object({
  tgCode: z.preprocess(absent, z.string().regex(/^[A-Z]{8}$/, 'Invalid confirmation code').optional()),
  baseUrl: z.preprocess(absent, z.string().default(DEFAULT_RELAY_BASE_URL)),
  tgHandle: z.preprocess(
    absent,
    z.string({ required_error: 'Missing the telegram handle' }).min(1, 'Missing the telegram handle')
  ),
  botHandle: z.preprocess(absent, z.string().default(DEFAULT_BOT_HANDLE)),
  uriPayload: payloadSchema,
  jsonPayload: payloadSchema,
});

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the variant's own fields whether the record arrives wrapped in its
 * tag (current or legacy) or as a flat object.
 */
export function unwrapFields(kind: ForwarderKind, raw: Record<string, unknown>): Record<string, unknown> {
  const keys = Object.keys(raw);
  if (keys.length === 1) {
    const [tag] = keys;
    const inner = raw[tag];
    if ((tag === kind || LEGACY_TAGS[tag] === kind) && isPlainObject(inner)) {
      return inner;
    }
  }
  return raw;
}

export function parseFields<S extends z.ZodTypeAny>(kind: ForwarderKind, schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ConfigError(`Invalid ${kind} config: ${issue.message}`, field || undefined);
  }
  return result.data;
}
