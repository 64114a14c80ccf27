import type { PipelineContext } from '../context.js';
import { errorMessage } from '../../lib/errors.js';

export const PERSIST_BATCH_SIZE = 100;

/**
 * Inserts in batches. A failing batch is counted as not persisted and the
 * remaining batches still run.
 */
export async function runPersist(ctx: PipelineContext): Promise<number> {
  const { store } = ctx.services;

  for (let start = 0; start < ctx.leads.length; start += PERSIST_BATCH_SIZE) {
    const batch = ctx.leads.slice(start, start + PERSIST_BATCH_SIZE);
    const batchNumber = start / PERSIST_BATCH_SIZE + 1;

    try {
      const inserted = await store.insertProspects(batch);
      ctx.persisted += inserted;
      console.log(`   💾 Batch ${batchNumber}: saved ${inserted} prospects`);
    } catch (error) {
      ctx.persistFailed += batch.length;
      console.error(`   ❌ Batch ${batchNumber} failed: ${errorMessage(error)}`);
    }
  }

  console.log(`   ✅ Saved ${ctx.persisted} prospects (${ctx.persistFailed} not persisted)`);
  return ctx.persisted;
}
