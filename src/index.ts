import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import v1Routes from './routes/v1/index.js';
import { createAuthMiddleware } from './middleware/auth.js';
import type { ApiServices } from './services.js';
import type { AppEnv } from './types.js';

export interface AppOptions {
  requestLogging?: boolean;
}

export function createApp(services: ApiServices, opts: AppOptions = {}): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  if (opts.requestLogging ?? true) {
    app.use(logger());
  }
  app.use(cors());

  app.use('*', async (c, next) => {
    c.set('services', services);
    await next();
  });

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      name: 'Prospect Pipeline API',
      version: '0.1.0',
      description: 'Lead qualification and cold email sequence API',
      endpoints: {
        v1: {
          health: 'GET /v1/health',
          classify_company: 'POST /v1/classify/company',
          filter_leads: 'POST /v1/filter/leads',
          generate_email_sequence: 'POST /v1/generate/email-sequence',
          prospect_stats: 'GET /v1/prospects/stats',
          prospects_by_status: 'GET /v1/prospects?status=<status>',
          update_prospect_status: 'PATCH /v1/prospects/:id/status',
        },
      },
    });
  });

  // Everything under /v1 except health needs the API key
  const auth = createAuthMiddleware(services.apiKey);
  app.use('/v1/classify/*', auth);
  app.use('/v1/filter/*', auth);
  app.use('/v1/generate/*', auth);
  app.use('/v1/prospects/*', auth);

  app.route('/v1', v1Routes);

  return app;
}
