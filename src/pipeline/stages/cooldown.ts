import type { PipelineContext } from '../context.js';
import { currentTime } from '../context.js';
import { filterCooldown } from '../../filters/cooldown.js';

export async function runCooldown(ctx: PipelineContext): Promise<number> {
  const before = ctx.leads.length;
  ctx.leads = filterCooldown(ctx.leads, ctx.lastContactByDomain, ctx.options.cooldownDays, currentTime(ctx));

  console.log(`   ✅ ${ctx.leads.length} leads ready (filtered ${before - ctx.leads.length} in cooldown)`);
  return ctx.leads.length;
}
