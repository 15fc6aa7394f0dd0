import { Request } from 'express';
import { SmsMessage } from '../../types/sms';

export type SmsProvider = 'twilio' | 'bandwidth';

export type WebhookRequest = Pick<Request, 'headers' | 'body' | 'originalUrl'>;

/** Turns a provider's inbound webhook into an {@link SmsMessage}. */
export interface InboundSmsAdapter {
  readonly provider: SmsProvider;
  parseInbound(payload: unknown): SmsMessage;
  validateWebhook(req: WebhookRequest): boolean;
}

export interface SmsSourceConfig {
  provider: SmsProvider;
  credentials: Record<string, string | undefined>;
  /** Clock for providers that do not timestamp their webhooks. */
  now?: () => number;
}
