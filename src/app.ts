import express from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { SessionRegistry } from './services/session-manager';
import { createOnboardingRouter } from './api/routes/onboarding';

export interface AppOptions {
  /** Requests per minute per client on the onboarding routes. */
  rateLimitPerMinute?: number;
}

export function createApp(registry: SessionRegistry, options: AppOptions = {}) {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(express.json());

  const onboardingLimiter = rateLimit({
    windowMs: 60_000,
    limit: options.rateLimitPerMinute ?? 60,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use('/api/onboarding', onboardingLimiter, createOnboardingRouter(registry));

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  return app;
}
