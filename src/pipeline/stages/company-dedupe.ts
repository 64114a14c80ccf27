import type { PipelineContext } from '../context.js';
import { dedupeByCompanyName } from '../../filters/dedupe.js';
import type { RawLeadRecord } from '../../types.js';

function companyNameOf(record: RawLeadRecord): string | undefined {
  switch (record.kind) {
    case 'job_posting':
      return record.posting.company_name;
    case 'profile':
      return record.profile.companyName || record.profile.currentCompany?.name;
  }
}

export async function runCompanyDedupe(ctx: PipelineContext): Promise<number> {
  const before = ctx.rawRecords.length;
  ctx.rawRecords = dedupeByCompanyName(ctx.rawRecords, companyNameOf);

  console.log(`   ✅ ${ctx.rawRecords.length} unique companies (dropped ${before - ctx.rawRecords.length})`);
  return ctx.rawRecords.length;
}
