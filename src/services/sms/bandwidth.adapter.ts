import crypto from 'crypto';
import { z } from 'zod';
import { SmsMessage } from '../../types/sms';
import { ValidationError } from '../../utils/errors';
import { InboundSmsAdapter, SmsSourceConfig, WebhookRequest } from './sms.adapter';

const bandwidthMessageSchema = z.object({
  id: z.string().optional(),
  from: z.string().min(1),
  text: z.string().default(''),
  time: z.string().optional(),
});

const bandwidthEventSchema = z.object({
  message: bandwidthMessageSchema,
});

export class BandwidthInboundAdapter implements InboundSmsAdapter {
  readonly provider = 'bandwidth' as const;

  constructor(private config: SmsSourceConfig) {}

  parseInbound(payload: unknown): SmsMessage {
    // Bandwidth delivers callbacks as an array of events
    const event = Array.isArray(payload) ? payload[0] : payload;
    const parsed = bandwidthEventSchema.safeParse(event);
    if (!parsed.success) {
      throw new ValidationError('Missing message.from');
    }

    const { id, from, text, time } = parsed.data.message;
    const sent = time ? Date.parse(time) : NaN;
    const now = this.config.now ?? Date.now;
    return {
      sender: from,
      body: text,
      timestamp: Number.isNaN(sent) ? now() : sent,
      threadId: id,
    };
  }

  validateWebhook(req: WebhookRequest): boolean {
    const signature = req.headers['x-bandwidth-signature'];
    const timestamp = req.headers['x-bandwidth-timestamp'];
    const apiSecret = this.config.credentials.BANDWIDTH_API_SECRET;

    if (typeof signature !== 'string' || typeof timestamp !== 'string' || !apiSecret) {
      return false;
    }

    const payload = JSON.stringify(req.body || {});
    const digest = crypto.createHmac('sha256', apiSecret).update(`${timestamp}.${payload}`).digest('base64');

    const expected = Buffer.from(digest);
    const received = Buffer.from(signature);
    return expected.length === received.length && crypto.timingSafeEqual(received, expected);
  }
}
