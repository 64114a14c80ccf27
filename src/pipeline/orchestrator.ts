import { createContext } from './context.js';
import type {
  EnrichmentCounters,
  PipelineContext,
  PipelineOptions,
  PipelineServices,
  StageName,
} from './context.js';
import type { SequenceOrigin } from '../lib/sequence.js';
import { errorMessage } from '../lib/errors.js';

import { runHistory } from './stages/history.js';
import { runScrape } from './stages/scrape.js';
import { runCompanyDedupe } from './stages/company-dedupe.js';
import { runTransform } from './stages/transform.js';
import { runEnrich } from './stages/enrich.js';
import { runIdentityDedupe } from './stages/identity-dedupe.js';
import { runCooldown } from './stages/cooldown.js';
import { runSequence } from './stages/sequence.js';
import { runPersist } from './stages/persist.js';

export type PipelineOutcome = 'completed' | 'no_leads' | 'failed';

export interface PipelineReport {
  outcome: PipelineOutcome;
  stage?: StageName; // where a no_leads or failed run stopped
  error?: string;
  counts: Partial<Record<StageName, number>>;
  skips: EnrichmentCounters;
  sequenceOrigins: Record<SequenceOrigin, number>;
  persisted: number;
  persistFailed: number;
  timings: Record<string, number>;
  totalMs: number;
}

interface StageDefinition {
  name: StageName;
  title: string;
  run: (ctx: PipelineContext) => Promise<number | void>;
}

// Lead-producing stages return their output size; zero ends the run
const STAGES: StageDefinition[] = [
  { name: 'history', title: 'Loading existing contacts', run: runHistory },
  { name: 'scrape', title: 'Scraping LinkedIn', run: runScrape },
  { name: 'company_dedupe', title: 'Deduplicating companies', run: runCompanyDedupe },
  { name: 'transform', title: 'Extracting leads', run: runTransform },
  { name: 'enrich', title: 'Enriching with Hunter', run: runEnrich },
  { name: 'identity_dedupe', title: 'Filtering duplicates', run: runIdentityDedupe },
  { name: 'cooldown', title: 'Filtering cooldown', run: runCooldown },
  { name: 'sequence', title: 'Generating email sequences', run: runSequence },
  { name: 'persist', title: 'Saving prospects', run: runPersist },
];

/**
 * Wraps a pipeline stage with timing and logging. Errors are re-thrown:
 * a stage only throws when its dependency is unusable.
 */
async function runStage<T>(ctx: PipelineContext, name: StageName, fn: () => Promise<T>): Promise<T> {
  ctx.timing.start(name);
  try {
    return await fn();
  } catch (error) {
    console.error(`\n❌ Stage '${name}' failed: ${errorMessage(error)}`);
    throw error;
  } finally {
    ctx.timing.end(name);
  }
}

function buildReport(ctx: PipelineContext, outcome: PipelineOutcome, stage?: StageName, error?: string): PipelineReport {
  return {
    outcome,
    stage,
    error,
    counts: { ...ctx.counts },
    skips: { ...ctx.skips },
    sequenceOrigins: { ...ctx.sequenceOrigins },
    persisted: ctx.persisted,
    persistFailed: ctx.persistFailed,
    timings: ctx.timing.toRecord(),
    totalMs: ctx.timing.totalMs,
  };
}

/**
 * Runs every stage strictly in order. Never throws: an unusable dependency
 * ends the run as `failed`, an empty stage as `no_leads`.
 */
export async function runLeadPipeline(services: PipelineServices, options: PipelineOptions): Promise<PipelineReport> {
  const ctx = createContext(services, options);

  for (const [index, stage] of STAGES.entries()) {
    console.log(`\n${index + 1}. ${stage.title}...`);

    let produced: number | void;
    try {
      produced = await runStage(ctx, stage.name, () => stage.run(ctx));
    } catch (error) {
      return buildReport(ctx, 'failed', stage.name, errorMessage(error));
    }

    if (typeof produced !== 'number') continue;
    ctx.counts[stage.name] = produced;

    if (produced === 0 && stage.name !== 'persist') {
      console.log(`\n⚠️  No leads left after ${stage.name} - stopping`);
      return buildReport(ctx, 'no_leads', stage.name);
    }
  }

  return buildReport(ctx, 'completed');
}

export function printReport(report: PipelineReport): void {
  console.log('\n' + '='.repeat(80));
  console.log(`PIPELINE ${report.outcome.toUpperCase()}${report.stage ? ` (${report.stage})` : ''}`);
  console.log('='.repeat(80));
  if (report.error) {
    console.log(`   ❌ ${report.error}`);
  }
  for (const [stage, count] of Object.entries(report.counts)) {
    const ms = report.timings[stage] ?? 0;
    console.log(`   📊 ${stage.padEnd(16)} ${String(count).padStart(6)}   ${(ms / 1000).toFixed(1)}s`);
  }
  console.log(`   💾 Saved: ${report.persisted} (${report.persistFailed} not persisted)`);
  console.log(`   ⏱️  Total: ${(report.totalMs / 1000).toFixed(1)}s`);
}
