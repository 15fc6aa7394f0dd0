import twilio from 'twilio';
import { z } from 'zod';
import { SmsMessage } from '../../types/sms';
import { ValidationError } from '../../utils/errors';
import { InboundSmsAdapter, SmsSourceConfig, WebhookRequest } from './sms.adapter';

const twilioInboundSchema = z.object({
  From: z.string().min(1),
  Body: z.string(),
  SmsSid: z.string().optional(),
  MessageSid: z.string().optional(),
});

export class TwilioInboundAdapter implements InboundSmsAdapter {
  readonly provider = 'twilio' as const;

  constructor(private config: SmsSourceConfig) {}

  parseInbound(payload: unknown): SmsMessage {
    const parsed = twilioInboundSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError('Missing From or Body');
    }

    const { From, Body, SmsSid, MessageSid } = parsed.data;
    const now = this.config.now ?? Date.now;
    return {
      sender: From,
      body: Body,
      timestamp: now(),
      threadId: SmsSid ?? MessageSid,
    };
  }

  validateWebhook(req: WebhookRequest): boolean {
    const signature = req.headers['x-twilio-signature'];
    const authToken = this.config.credentials.TWILIO_AUTH_TOKEN;
    const baseUrl = this.config.credentials.WEBHOOK_BASE_URL;

    if (typeof signature !== 'string' || !authToken || !baseUrl) {
      return false;
    }

    const url = `${baseUrl}${req.originalUrl}`;
    return twilio.validateRequest(authToken, signature, url, req.body);
  }
}
