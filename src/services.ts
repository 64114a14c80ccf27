import type { AppConfig } from './config.js';
import { ApifyScraper } from './lib/apify.js';
import { HunterClient } from './lib/hunter.js';
import { createGatewayTextGenerator } from './lib/ai.js';
import type { TextGenerator } from './lib/ai.js';
import { createCorporateSizeClassifier } from './lib/company-size.js';
import type { CorporateSizeClassifier } from './lib/company-size.js';
import { loadReferenceData } from './lib/reference-data.js';
import { createSequenceGenerator, loadSequenceLibrary } from './lib/sequence.js';
import type { SequenceGenerator } from './lib/sequence.js';
import { createSupabase } from './lib/supabase.js';
import { SupabaseProspectStore } from './lib/prospects.js';
import type { ProspectStore } from './lib/prospects.js';
import { SmartleadClient } from './lib/smartlead.js';
import type { CampaignClient } from './lib/smartlead.js';
import type { PipelineServices } from './pipeline/context.js';

/**
 * What the HTTP routes need. Handed to the app at construction so tests can
 * pass fakes.
 */
export interface ApiServices {
  apiKey: string;
  cooldownDays: number;
  sizeClassifier: CorporateSizeClassifier;
  generateText: TextGenerator;
  sequences: SequenceGenerator;
  store: ProspectStore;
}

export function buildSizeClassifier(config: AppConfig): CorporateSizeClassifier {
  return createCorporateSizeClassifier(loadReferenceData(config.disqualificationListPath || undefined));
}

export function buildTextGenerator(config: AppConfig): TextGenerator {
  return createGatewayTextGenerator({
    apiKey: config.aiGatewayApiKey,
    modelId: config.aiModel,
    timeoutMs: config.requestTimeoutMs,
  });
}

export function buildSequenceGenerator(config: AppConfig, generateText: TextGenerator): SequenceGenerator {
  return createSequenceGenerator({
    mode: config.sequenceMode,
    generate: generateText,
    library: loadSequenceLibrary(),
    language: config.sequenceLanguage,
    senderName: config.senderName,
  });
}

export function buildStore(config: AppConfig): ProspectStore {
  return new SupabaseProspectStore(createSupabase(config), config.prospectsTable);
}

export function buildCampaignClient(config: AppConfig): CampaignClient {
  return new SmartleadClient({
    apiKey: config.smartleadApiKey,
    campaignId: config.smartleadCampaignId,
    timeoutMs: config.requestTimeoutMs,
  });
}

export function buildApiServices(config: AppConfig): ApiServices {
  const generateText = buildTextGenerator(config);
  return {
    apiKey: config.apiKey,
    cooldownDays: config.cooldownDays,
    sizeClassifier: buildSizeClassifier(config),
    generateText,
    sequences: buildSequenceGenerator(config, generateText),
    store: buildStore(config),
  };
}

export function buildPipelineServices(config: AppConfig): PipelineServices {
  const generateText = buildTextGenerator(config);
  return {
    scraper: new ApifyScraper({ apiKey: config.apifyApiKey, timeoutMs: config.scrapeTimeoutMs }),
    resolver: new HunterClient({ apiKey: config.hunterApiKey, timeoutMs: config.requestTimeoutMs }),
    sizeClassifier: buildSizeClassifier(config),
    generateText,
    sequences: buildSequenceGenerator(config, generateText),
    store: buildStore(config),
  };
}
