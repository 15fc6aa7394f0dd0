import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ForwardingService } from '../services/forwarding.service';
import { SmsSourceFactory } from '../services/sms/sms.factory';
import { InboundSmsAdapter, SmsProvider } from '../services/sms/sms.adapter';
import { SmsMessage } from '../types/sms';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { requireApiKey } from '../middleware/auth';

const genericInboundSchema = z.object({
  sender: z.string().min(1),
  body: z.string(),
  timestamp: z.number().int().nonnegative().optional(),
  threadId: z.union([z.number(), z.string()]).optional(),
});

function buildAdapter(provider: SmsProvider): InboundSmsAdapter {
  return SmsSourceFactory.create(provider, {
    provider,
    credentials: {
      TWILIO_AUTH_TOKEN: env.TWILIO_AUTH_TOKEN,
      BANDWIDTH_API_SECRET: env.BANDWIDTH_API_SECRET,
      WEBHOOK_BASE_URL: env.WEBHOOK_BASE_URL,
    },
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function webhookRoutes(forwarding: ForwardingService): Router {
  const router = Router();

  async function relay(sms: SmsMessage, provider: string) {
    logger.info('SMS received', { sender: sms.sender, provider });
    return forwarding.handleMessage(sms);
  }

  // Twilio sends form-encoded POSTs and retries anything but a 200
  router.post('/sms/twilio', async (req: Request, res: Response) => {
    try {
      const adapter = buildAdapter('twilio');
      if (!adapter.validateWebhook(req)) {
        return res.status(403).json({ error: 'Invalid signature' });
      }

      await relay(adapter.parseInbound(req.body), adapter.provider);
      res.type('text/xml').send('<Response></Response>');
    } catch (error: unknown) {
      logger.error('Twilio webhook error', { error: errorMessage(error) });
      res.type('text/xml').send('<Response></Response>');
    }
  });

  router.post('/sms/bandwidth', async (req: Request, res: Response) => {
    try {
      const adapter = buildAdapter('bandwidth');
      if (!adapter.validateWebhook(req)) {
        return res.status(403).json({ error: 'Invalid signature' });
      }

      const outcome = await relay(adapter.parseInbound(req.body), adapter.provider);
      res.json({ success: outcome.success });
    } catch (error: unknown) {
      logger.error('Bandwidth webhook error', { error: errorMessage(error) });
      res.status(200).json({ success: false });
    }
  });

  // No provider signature here, so callers need an API key
  router.post('/sms/generic', requireApiKey, async (req: Request, res: Response) => {
    const parsed = genericInboundSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ success: false, error: 'Invalid message', details: parsed.error.flatten().fieldErrors });
    }

    const { sender, body, timestamp, threadId } = parsed.data;
    const outcome = await relay({ sender, body, timestamp: timestamp ?? Date.now(), threadId }, 'generic');
    res.status(outcome.success ? 200 : 502).json({
      success: outcome.success,
      forwarder: outcome.forwarder,
      error: outcome.success ? undefined : outcome.failure.message,
    });
  });

  return router;
}
