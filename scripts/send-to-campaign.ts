import 'dotenv/config';
import { createInterface } from 'readline/promises';
import { loadConfig, requireConfig } from '../src/config.js';
import { buildCampaignClient, buildStore } from '../src/services.js';
import { sendReadyProspects } from '../src/pipeline/campaign-send.js';
import type { SendOptions } from '../src/pipeline/campaign-send.js';
import { errorMessage } from '../src/lib/errors.js';
import type { Lead } from '../src/types.js';
import { parseSendArgs } from './cli-args.js';

const DEFAULT_COUNT = 50;

async function askToSend(prospects: Lead[]): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`\nSend ${prospects.length} prospects to the campaign? (yes/no): `);
    return answer.trim().toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  let options: SendOptions;

  try {
    const args = parseSendArgs(process.argv.slice(2));
    const settings = loadConfig();
    requireConfig(settings, ['supabaseUrl', 'supabaseKey', 'smartleadApiKey', 'smartleadCampaignId']);

    options = {
      store: buildStore(settings),
      campaign: buildCampaignClient(settings),
      count: args.count ?? DEFAULT_COUNT,
      confirm: args.yes ? undefined : askToSend,
    };
    console.log('='.repeat(80));
    console.log(`📤 SEND TO CAMPAIGN ${settings.smartleadCampaignId}`);
    console.log('='.repeat(80));
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  console.log(`\n📊 Fetching up to ${options.count} ready prospects...`);
  const result = await sendReadyProspects(options);

  if (result.outcome === 'no_prospects') return 1;
  if (result.outcome === 'sent') {
    console.log(`\n✅ Done: ${result.added} added, ${result.marked_sent} marked as sent`);
    if (result.failed_batches > 0) {
      console.log(`   ⚠️  ${result.failed_batches} batch(es) rejected; those prospects stay ready`);
    }
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`❌ Send failed: ${errorMessage(error)}`);
    process.exit(1);
  });
