import { Hono } from 'hono';
import type { Context } from 'hono';
import { errorMessage } from '../../../lib/errors.js';
import type { AppEnv } from '../../../types.js';

/**
 * GET /v1/prospects/stats
 */
export async function handleProspectStats(c: Context<AppEnv>) {
  const { store } = c.get('services');

  try {
    const [total, byStatus] = await Promise.all([store.countProspects(), store.countByStatus()]);
    return c.json({ success: true, data: { total, by_status: byStatus } });
  } catch (error) {
    console.error('Prospect stats error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

const app = new Hono<AppEnv>();
app.get('/', handleProspectStats);

export default app;
