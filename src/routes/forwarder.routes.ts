import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { ForwardingService } from '../services/forwarding.service';
import { ValidationError } from '../utils/errors';

const activateSchema = z.object({
  config: z.union([z.string().min(1), z.record(z.unknown())]),
});

export function forwarderRoutes(forwarding: ForwardingService): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const active = forwarding.getActive();
    res.json({
      success: true,
      forwarder: active?.kind ?? null,
      config: active ? active.toConfig() : null,
    });
  });

  router.put('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = activateSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError('Body must contain a config string or object');
      }

      const { config } = parsed.data;
      const blob = typeof config === 'string' ? config : JSON.stringify(config);
      const forwarder = await forwarding.activate(blob);
      res.json({ success: true, forwarder: forwarder.kind, config: forwarder.toConfig() });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await forwarding.deactivate();
      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  router.get('/setup', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, url: forwarding.getSetupUrl() });
    } catch (error) {
      next(error);
    }
  });

  router.post('/check', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const linked = await forwarding.checkLinked();
      res.json({ success: true, linked });
    } catch (error) {
      next(error);
    }
  });

  router.post('/test', async (_req: Request, res: Response) => {
    const outcome = await forwarding.handleMessage({
      sender: 'sms-relay',
      body: 'Test message',
      timestamp: Date.now(),
    });
    res.status(outcome.success ? 200 : 502).json({
      success: outcome.success,
      forwarder: outcome.forwarder,
      error: outcome.success ? undefined : outcome.failure.message,
    });
  });

  return router;
}
