import type { PipelineContext } from '../context.js';
import { filterDuplicates } from '../../filters/dedupe.js';

export async function runIdentityDedupe(ctx: PipelineContext): Promise<number> {
  const before = ctx.leads.length;
  ctx.leads = filterDuplicates(ctx.leads, ctx.existingIdentityKeys);

  console.log(`   ✅ ${ctx.leads.length} new leads (filtered ${before - ctx.leads.length} duplicates)`);
  return ctx.leads.length;
}
