import { Hono } from 'hono';
import type { Context } from 'hono';
import { buildIdentitySet, filterDuplicates } from '../../../filters/dedupe.js';
import { buildLastContactMap, filterCooldown } from '../../../filters/cooldown.js';
import { rowToLead } from '../../../lib/prospects.js';
import { errorMessage } from '../../../lib/errors.js';
import { isRecord, readNumber } from '../../../utils/parsing.js';
import type { AppEnv, Lead } from '../../../types.js';

/**
 * POST /v1/filter/leads
 * Runs the identity dedupe and cooldown gates against the prospects table.
 * { "leads": [{ "company_domain": "acme.io", "email": "jane@acme.io", ... }], "cooldown_days": 90 }
 */
export async function handleLeadFiltering(c: Context<AppEnv>) {
  const body: unknown = await c.req.json().catch(() => null);
  if (!isRecord(body) || !Array.isArray(body.leads)) {
    return c.json({ error: 'Missing required field: leads (array)' }, 400);
  }

  const leads: Lead[] = [];
  for (const item of body.leads) {
    const lead = rowToLead(item);
    if (!lead) {
      return c.json({ error: 'Every entry in leads must be an object' }, 400);
    }
    leads.push(lead);
  }

  const { store, cooldownDays } = c.get('services');
  const windowDays = readNumber(body, 'cooldown_days') ?? cooldownDays;
  if (windowDays < 0) {
    return c.json({ error: 'cooldown_days must be zero or more' }, 400);
  }

  try {
    const existing = buildIdentitySet(await store.getExistingContacts());
    const lastContacts = buildLastContactMap(await store.getContactHistory());

    const deduped = filterDuplicates(leads, existing);
    const ready = filterCooldown(deduped, lastContacts, windowDays);

    return c.json({
      success: true,
      data: {
        leads: ready,
        counts: {
          input: leads.length,
          after_dedupe: deduped.length,
          after_cooldown: ready.length,
        },
      },
    });
  } catch (error) {
    console.error('Lead filtering error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

const app = new Hono<AppEnv>();
app.post('/', handleLeadFiltering);

export default app;
