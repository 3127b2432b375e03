import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createAdminRouter } from './routes/admin.routes';
import { createChatRouter } from './routes/chat.routes';
import { createEmailRouter } from './routes/email.routes';
import { createSmsRouter } from './routes/sms.routes';
import { SessionService } from './services/session.service';
import { TwilioService } from './services/sms/twilio.service';
import { SendGridAdapter } from './services/email/sendgrid.adapter';

export interface AppDependencies {
  sessions: SessionService;
  sms: TwilioService;
  email: SendGridAdapter;
  apiKeys: string[];
  /** Requests per minute per client on /api; 0 disables the limiter. */
  rateLimitPerMinute?: number;
  /** Installed just before the JSON error handler (Sentry's express handler). */
  beforeErrorHandler?: (app: Express) => void;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  const perMinute = deps.rateLimitPerMinute ?? 100;
  if (perMinute > 0) {
    app.use(
      '/api',
      rateLimit({
        windowMs: 60 * 1000,
        max: perMinute,
        standardHeaders: true,
        legacyHeaders: false,
      })
    );
  }

  // Auth (skips health checks)
  app.use(apiKeyAuth(deps.apiKeys));

  app.use('/api/chat', createChatRouter(deps.sessions));
  app.use('/api/sms', createSmsRouter(deps.sms));
  app.use('/api/email', createEmailRouter(deps.email));
  app.use('/api/admin', createAdminRouter(deps.sessions));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  deps.beforeErrorHandler?.(app);
  app.use(errorHandler);

  return app;
}
