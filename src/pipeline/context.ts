import type { LeadScraper } from '../lib/apify.js';
import type { ContactResolver } from '../lib/hunter.js';
import type { CorporateSizeClassifier } from '../lib/company-size.js';
import type { TextGenerator } from '../lib/ai.js';
import type { SequenceGenerator, SequenceOrigin } from '../lib/sequence.js';
import type { ProspectStore } from '../lib/prospects.js';
import type { Lead, RawLeadRecord } from '../types.js';

// ============================================================================
// TIMING TRACKER - Tracks milliseconds per stage
// ============================================================================

export class TimingTracker {
  private startTime: number;
  private stageStarts: Map<string, number> = new Map();
  private stageDurations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  start(stage: string): void {
    this.stageStarts.set(stage, Date.now());
  }

  end(stage: string): number {
    const start = this.stageStarts.get(stage);
    if (start === undefined) return 0;
    const duration = Date.now() - start;
    this.stageDurations.set(stage, duration);
    return duration;
  }

  toRecord(): Record<string, number> {
    return Object.fromEntries(this.stageDurations);
  }

  get totalMs(): number {
    return Date.now() - this.startTime;
  }
}

// ============================================================================
// PIPELINE CONTEXT - Shared state that flows through all pipeline stages
// ============================================================================

export type StageName =
  | 'history'
  | 'scrape'
  | 'company_dedupe'
  | 'transform'
  | 'enrich'
  | 'identity_dedupe'
  | 'cooldown'
  | 'sequence'
  | 'persist';

export type EnrichSkipReason =
  | 'large_brand'
  | 'no_domain'
  | 'duplicate_domain'
  | 'large_company'
  | 'b2c'
  | 'no_contact'
  | 'unverified';

export type EnrichmentCounters = Record<EnrichSkipReason | 'errors', number>;

export type LeadSourceKind = 'jobs' | 'profiles';

export interface PipelineServices {
  scraper: LeadScraper;
  resolver: ContactResolver;
  sizeClassifier: CorporateSizeClassifier;
  generateText: TextGenerator;
  sequences: SequenceGenerator;
  store: ProspectStore;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export interface PipelineOptions {
  source: LeadSourceKind;
  keywords: string[];
  count: number;
  location: string;
  geoId: string;
  searchUrl?: string;
  searchLabel?: string;
  cooldownDays: number;
  scrapeDelayMs: number;
}

export interface PipelineContext {
  // --- Inputs (set once at creation) ---
  services: PipelineServices;
  options: PipelineOptions;

  // --- Accumulated state (stages read and write these) ---
  existingIdentityKeys: Set<string>;
  lastContactByDomain: Map<string, string>;
  claimedDomains: Set<string>;
  rawRecords: RawLeadRecord[];
  leads: Lead[];
  persisted: number;
  persistFailed: number;

  // --- Cross-cutting concerns ---
  counts: Partial<Record<StageName, number>>;
  skips: EnrichmentCounters;
  sequenceOrigins: Record<SequenceOrigin, number>;
  timing: TimingTracker;
}

export function createContext(services: PipelineServices, options: PipelineOptions): PipelineContext {
  return {
    services,
    options,

    existingIdentityKeys: new Set(),
    lastContactByDomain: new Map(),
    claimedDomains: new Set(),
    rawRecords: [],
    leads: [],
    persisted: 0,
    persistFailed: 0,

    counts: {},
    skips: {
      large_brand: 0,
      no_domain: 0,
      duplicate_domain: 0,
      large_company: 0,
      b2c: 0,
      no_contact: 0,
      unverified: 0,
      errors: 0,
    },
    sequenceOrigins: { ai: 0, fallback: 0, template: 0 },
    timing: new TimingTracker(),
  };
}

export function pause(ctx: PipelineContext, ms: number): Promise<void> {
  if (ctx.services.sleep) return ctx.services.sleep(ms);
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function currentTime(ctx: PipelineContext): Date {
  return ctx.services.now ? ctx.services.now() : new Date();
}
