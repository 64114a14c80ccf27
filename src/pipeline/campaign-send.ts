import type { ProspectStore } from '../lib/prospects.js';
import type { CampaignClient, CampaignUploadStats } from '../lib/smartlead.js';
import { errorMessage } from '../lib/errors.js';
import { toCampaignPayload } from '../utils/transform.js';
import { readString } from '../utils/parsing.js';
import type { JsonRecord } from '../utils/parsing.js';
import type { Lead } from '../types.js';

export type SendOutcome = 'no_prospects' | 'cancelled' | 'sent';

export interface SendResult extends CampaignUploadStats {
  outcome: SendOutcome;
  marked_sent: number;
  failed_batches: number;
  // Campaign record read back after the upload; absent when the lookup failed
  campaign?: JsonRecord;
}

export interface SendOptions {
  store: ProspectStore;
  campaign: CampaignClient;
  count: number;
  // Omitted when the caller already agreed (--yes)
  confirm?: (prospects: Lead[]) => Promise<boolean>;
  now?: () => Date;
}

const SAMPLE_SIZE = 3;

function emptyResult(outcome: SendOutcome): SendResult {
  return { outcome, total: 0, added: 0, duplicates: 0, invalid: 0, marked_sent: 0, failed_batches: 0 };
}

function printSample(prospects: Lead[]): void {
  console.log(`\n   📋 Sample (first ${Math.min(SAMPLE_SIZE, prospects.length)}):`);
  for (const prospect of prospects.slice(0, SAMPLE_SIZE)) {
    console.log(`\n   ${prospect.first_name} ${prospect.last_name} - ${prospect.company_name}`);
    console.log(`      Email: ${prospect.email}`);
    console.log(`      Subject: ${prospect.subject_line}`);
    console.log(`      Email 1: ${prospect.email_1.slice(0, 100)}...`);
  }
}

/**
 * Pushes ready B2B prospects into the campaign. Only prospects from batches
 * the campaign accepted are marked as sent.
 */
export async function sendReadyProspects(opts: SendOptions): Promise<SendResult> {
  const { store, campaign, count } = opts;

  const prospects = await store.getReadyProspects(count);
  if (prospects.length === 0) {
    console.log('   ⚠️  No ready prospects found');
    return emptyResult('no_prospects');
  }
  console.log(`   ✅ Found ${prospects.length} ready prospects`);

  printSample(prospects);

  if (opts.confirm && !(await opts.confirm(prospects))) {
    console.log('\n   ❌ Cancelled');
    return emptyResult('cancelled');
  }

  const { batches, stats } = await campaign.addLeads(prospects.map(toCampaignPayload), {
    ignoreDuplicatesInOtherCampaigns: true,
  });

  const sentAt = (opts.now ? opts.now() : new Date()).toISOString();
  let markedSent = 0;
  let failedBatches = 0;

  for (const batch of batches) {
    if (!batch.ok) {
      failedBatches += 1;
      continue;
    }

    const ids: string[] = [];
    for (const prospect of prospects.slice(batch.start, batch.start + batch.size)) {
      if (prospect.id !== undefined) ids.push(prospect.id);
    }

    try {
      await store.markSent(ids, sentAt);
      markedSent += ids.length;
    } catch (error) {
      console.error(`   ❌ Could not mark batch at ${batch.start} as sent: ${errorMessage(error)}`);
    }
  }

  console.log(`\n   📊 Total: ${stats.total}, added: ${stats.added}, duplicates: ${stats.duplicates}, invalid: ${stats.invalid}`);
  console.log(`   ✅ Marked ${markedSent} prospects as sent`);

  const result: SendResult = { outcome: 'sent', ...stats, marked_sent: markedSent, failed_batches: failedBatches };
  try {
    result.campaign = await campaign.getCampaignStats();
    console.log(`   📈 Campaign status: ${readString(result.campaign, 'status') ?? 'unknown'}`);
  } catch (error) {
    console.warn(`   ⚠️  Could not read campaign stats: ${errorMessage(error)}`);
  }
  return result;
}
