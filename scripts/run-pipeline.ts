import 'dotenv/config';
import { loadConfig, requireConfig } from '../src/config.js';
import { buildPipelineServices } from '../src/services.js';
import { printReport, runLeadPipeline } from '../src/pipeline/orchestrator.js';
import type { PipelineOptions, PipelineServices } from '../src/pipeline/context.js';
import { errorMessage } from '../src/lib/errors.js';
import { parsePipelineArgs } from './cli-args.js';

// Go-to-market leadership roles
const DEFAULT_KEYWORDS = [
  'VP Sales',
  'Head of Growth',
  'CRO',
  'CMO',
  'VP Marketing',
  'Head of Sales',
  'Director of Sales',
  'Revenue Operations',
  'Head of RevOps',
  'Demand Generation Manager',
];

const DEFAULT_LOCATION = 'France';
const DEFAULT_GEO_ID = '105015875';
const DEFAULT_COUNT = 500;

async function main(): Promise<number> {
  let options: PipelineOptions;
  let services: PipelineServices;

  try {
    const args = parsePipelineArgs(process.argv.slice(2));
    const settings = loadConfig();
    requireConfig(settings, ['supabaseUrl', 'supabaseKey', 'aiGatewayApiKey', 'hunterApiKey', 'apifyApiKey']);

    options = {
      source: args.source ?? 'jobs',
      keywords: args.keywords ?? DEFAULT_KEYWORDS,
      count: args.count ?? DEFAULT_COUNT,
      location: args.location ?? DEFAULT_LOCATION,
      geoId: args.geoId ?? DEFAULT_GEO_ID,
      searchUrl: args.searchUrl,
      searchLabel: args.searchUrl ? 'profile search' : undefined,
      cooldownDays: args.cooldownDays ?? settings.cooldownDays,
      scrapeDelayMs: settings.scrapeDelayMs,
    };
    services = buildPipelineServices({ ...settings, sequenceMode: args.sequenceMode ?? settings.sequenceMode });
  } catch (error) {
    console.error(`❌ ${errorMessage(error)}`);
    return 1;
  }

  console.log('='.repeat(80));
  console.log('🚀 LEAD PIPELINE');
  console.log('='.repeat(80));
  if (options.source === 'profiles') {
    console.log(`   Source: profile search (${options.count} profiles max)`);
  } else {
    console.log(`   Source: job postings in ${options.location}`);
    console.log(`   Keywords: ${options.keywords.join(', ')}`);
    console.log(`   Target: ${options.count} jobs per keyword`);
  }
  console.log(`   Cooldown: ${options.cooldownDays} days`);

  const report = await runLeadPipeline(services, options);
  printReport(report);

  return report.outcome === 'failed' ? 1 : 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(`❌ Pipeline crashed: ${errorMessage(error)}`);
    process.exit(1);
  });
