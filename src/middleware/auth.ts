import { Request, Response, NextFunction } from 'express';
import { env } from '../config/env';

let validKeys: Set<string> | null = null;

function getValidKeys(): Set<string> {
  if (!validKeys) {
    const raw = env.API_KEYS || '';
    validKeys = new Set(
      raw
        .split(',')
        .map((k) => k.trim())
        .filter((k) => k.length > 0)
    );
  }
  return validKeys;
}

/** Guards the management API; provider webhooks carry their own signatures. */
export function apiKeyAuth(req: Request, res: Response, next: NextFunction) {
  if (!req.path.startsWith('/api')) {
    return next();
  }

  return requireApiKey(req, res, next);
}

export function requireApiKey(req: Request, res: Response, next: NextFunction) {
  const apiKey = req.headers['x-api-key'];

  if (typeof apiKey !== 'string' || apiKey.length === 0) {
    return res.status(401).json({ success: false, error: 'Missing API key' });
  }

  const keys = getValidKeys();
  if (keys.size === 0 || !keys.has(apiKey)) {
    return res.status(403).json({ success: false, error: 'Invalid API key' });
  }

  next();
}
