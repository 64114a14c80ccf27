import type { Context, MiddlewareHandler, Next } from 'hono';
import type { AppEnv } from '../types.js';

function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const [scheme, token] = header.split(' ');
  return scheme === 'Bearer' && token ? token : null;
}

/**
 * Static API key auth: `?api_key=<key>` or `Authorization: Bearer <key>`.
 */
export function createAuthMiddleware(expectedKey: string): MiddlewareHandler<AppEnv> {
  return async (c: Context<AppEnv>, next: Next) => {
    const providedKey = c.req.query('api_key') || bearerToken(c.req.header('Authorization'));

    if (!providedKey) {
      return c.json({ error: 'Missing API key. Use ?api_key=<key> or Authorization: Bearer <key>' }, 401);
    }

    if (!expectedKey || providedKey !== expectedKey) {
      return c.json({ error: 'Invalid API key' }, 401);
    }

    c.set('apiKey', providedKey);
    await next();
  };
}
