import { Hono } from 'hono';
import type { Context } from 'hono';
import { isLeadStatus } from '../../../lib/prospects.js';
import { errorMessage } from '../../../lib/errors.js';
import { isRecord, readString } from '../../../utils/parsing.js';
import type { AppEnv } from '../../../types.js';

const VALID_STATUSES = 'ready, sent, replied, interested, bounced, not_interested';

/**
 * GET /v1/prospects?status=replied
 */
export async function handleListByStatus(c: Context<AppEnv>) {
  const status = c.req.query('status');
  if (!isLeadStatus(status)) {
    return c.json({ error: `Query parameter status must be one of: ${VALID_STATUSES}` }, 400);
  }

  try {
    const prospects = await c.get('services').store.getProspectsByStatus(status);
    return c.json({ success: true, data: { status, count: prospects.length, prospects } });
  } catch (error) {
    console.error('Prospect listing error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

/**
 * PATCH /v1/prospects/:id/status
 * { "status": "replied" }
 * Records what happened after a send; identity fields are never touched.
 */
export async function handleStatusUpdate(c: Context<AppEnv, '/:id/status'>) {
  const id = c.req.param('id');
  const body: unknown = await c.req.json().catch(() => null);
  const status = isRecord(body) ? readString(body, 'status') : undefined;

  if (!isLeadStatus(status)) {
    return c.json({ error: `Field status must be one of: ${VALID_STATUSES}` }, 400);
  }

  try {
    await c.get('services').store.updateStatus(id, status);
    console.log(`📝 Prospect ${id} → ${status}`);
    return c.json({ success: true, data: { id, status } });
  } catch (error) {
    console.error('Prospect status update error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

const app = new Hono<AppEnv>();
app.get('/', handleListByStatus);
app.patch('/:id/status', handleStatusUpdate);

export default app;
