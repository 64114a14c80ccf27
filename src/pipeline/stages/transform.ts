import type { PipelineContext } from '../context.js';
import { toCanonicalLead } from '../../utils/transform.js';

export async function runTransform(ctx: PipelineContext): Promise<number> {
  const { source, count, keywords } = ctx.options;
  const limit = source === 'profiles' ? count : count * keywords.length;

  ctx.leads = ctx.rawRecords.slice(0, limit).map(toCanonicalLead);

  console.log(`   ✅ ${ctx.leads.length} companies ready for enrichment`);
  return ctx.leads.length;
}
