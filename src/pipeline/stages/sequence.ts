import type { PipelineContext } from '../context.js';
import type { Lead } from '../../types.js';

export async function runSequence(ctx: PipelineContext): Promise<number> {
  const withSequences: Lead[] = [];

  for (const lead of ctx.leads) {
    console.log(`   ✍️  Generating sequence for ${lead.company_name}...`);
    const { sequence, origin } = await ctx.services.sequences.generate(lead);
    ctx.sequenceOrigins[origin] += 1;
    withSequences.push({ ...lead, ...sequence });
  }

  ctx.leads = withSequences;
  const { ai, fallback, template } = ctx.sequenceOrigins;
  console.log(`   ✅ Generated ${withSequences.length} sequences (ai: ${ai}, fallback: ${fallback}, template: ${template})`);
  return ctx.leads.length;
}
