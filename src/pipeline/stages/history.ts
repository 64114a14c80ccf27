import type { PipelineContext } from '../context.js';
import { buildIdentitySet } from '../../filters/dedupe.js';
import { buildLastContactMap } from '../../filters/cooldown.js';

/**
 * Loads known contacts before any paid call. A store failure here is fatal:
 * without history the dedupe and cooldown gates cannot be trusted.
 */
export async function runHistory(ctx: PipelineContext): Promise<void> {
  const { store } = ctx.services;

  const contacts = await store.getExistingContacts();
  ctx.existingIdentityKeys = buildIdentitySet(contacts);

  const history = await store.getContactHistory();
  ctx.lastContactByDomain = buildLastContactMap(history);

  console.log(`   ✅ ${ctx.existingIdentityKeys.size} existing contacts`);
  console.log(`   ✅ ${ctx.lastContactByDomain.size} companies with a contact history`);
}
