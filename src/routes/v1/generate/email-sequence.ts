import { Hono } from 'hono';
import type { Context } from 'hono';
import { rowToLead } from '../../../lib/prospects.js';
import { errorMessage } from '../../../lib/errors.js';
import { isRecord } from '../../../utils/parsing.js';
import type { AppEnv } from '../../../types.js';

export async function handleEmailSequenceGeneration(c: Context<AppEnv>) {
  const requestStartTime = Date.now();

  const body: unknown = await c.req.json().catch(() => null);
  const lead = isRecord(body) ? rowToLead(body.lead) : null;

  // Validate required fields
  if (!lead) {
    return c.json({ error: 'Missing required field: lead' }, 400);
  }
  if (!lead.company_name) {
    return c.json({ error: 'Missing required field: lead.company_name' }, 400);
  }

  try {
    console.log(`\n📧 Generating email sequence for ${lead.company_name}`);

    const { sequence, origin, version } = await c.get('services').sequences.generate(lead);

    const responseTimeMs = Date.now() - requestStartTime;
    console.log(`✅ Email sequence generated in ${responseTimeMs}ms (${origin})`);

    return c.json({
      success: true,
      data: { ...sequence, origin, version },
      response_time_ms: responseTimeMs,
    });
  } catch (error) {
    console.error('Email sequence generation error:', error);
    return c.json({ success: false, error: errorMessage(error) }, 500);
  }
}

const app = new Hono<AppEnv>();
app.post('/', handleEmailSequenceGeneration);

export default app;
