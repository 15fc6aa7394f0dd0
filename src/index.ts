import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { checkDatabaseHealth } from './config/database';
import { logger } from './utils/logger';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { FetchTransport } from './services/http/transport';
import { ForwardingService } from './services/forwarding.service';
import { SettingsService } from './services/settings.service';
import { webhookRoutes } from './routes/webhook.routes';
import { forwarderRoutes } from './routes/forwarder.routes';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const forwarding = new ForwardingService(
  new FetchTransport({ timeoutMs: env.HTTP_TIMEOUT_MS }),
  new SettingsService(),
  { seedConfig: env.FORWARDER_CONFIG }
);

const app = express();

// Middleware
app.use(helmet());
app.use(cors());

// Webhooks (Twilio form-encoded + Bandwidth JSON)
app.use('/webhook', express.urlencoded({ extended: false }));
app.use('/webhook', express.json());
app.use(express.json());

const limiter = rateLimit({
  windowMs: 60 * 1000,
  max: 100,
  standardHeaders: true,
  legacyHeaders: false,
});
app.use('/api', limiter);

app.use(apiKeyAuth);

// Routes
app.use('/webhook', webhookRoutes(forwarding));
app.use('/api/forwarder', forwarderRoutes(forwarding));

// Health check (no auth)
app.get('/health', async (_req, res) => {
  const database = await checkDatabaseHealth();
  const active = forwarding.getActive();
  res.status(database.status === 'healthy' ? 200 : 503).json({
    status: database.status === 'healthy' ? 'ok' : 'degraded',
    database,
    forwarder: active?.kind ?? null,
    timestamp: new Date().toISOString(),
  });
});

// Error handler
if (env.SENTRY_DSN) {
  Sentry.setupExpressErrorHandler(app);
}
app.use(errorHandler);

async function start() {
  try {
    await forwarding.load();
  } catch (error: unknown) {
    // Stays inactive until a new config is PUT to /api/forwarder
    logger.error('Stored forwarder config rejected, no forwarder active', {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  app.listen(parseInt(env.PORT), () => {
    logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});

export default app;
