import { ConfigError } from './lib/errors.js';

export type SequenceMode = 'ai' | 'templates';

export interface AppConfig {
  supabaseUrl: string;
  supabaseKey: string;
  prospectsTable: string;
  aiGatewayApiKey: string;
  aiModel: string;
  hunterApiKey: string;
  apifyApiKey: string;
  smartleadApiKey: string;
  smartleadCampaignId: string;
  apiKey: string;
  port: number;
  cooldownDays: number;
  sequenceMode: SequenceMode;
  sequenceLanguage: string;
  senderName: string;
  requestTimeoutMs: number;
  scrapeTimeoutMs: number;
  scrapeDelayMs: number;
  disqualificationListPath: string;
}

// Settings that are credentials; entry points pick the ones they need
export type RequiredSetting =
  | 'supabaseUrl'
  | 'supabaseKey'
  | 'aiGatewayApiKey'
  | 'hunterApiKey'
  | 'apifyApiKey'
  | 'smartleadApiKey'
  | 'smartleadCampaignId'
  | 'apiKey';

const ENV_NAMES: Record<RequiredSetting, string> = {
  supabaseUrl: 'SUPABASE_URL',
  supabaseKey: 'SUPABASE_SERVICE_ROLE_KEY',
  aiGatewayApiKey: 'AI_GATEWAY_API_KEY',
  hunterApiKey: 'HUNTER_API_KEY',
  apifyApiKey: 'APIFY_API_KEY',
  smartleadApiKey: 'SMARTLEAD_API_KEY',
  smartleadCampaignId: 'SMARTLEAD_CAMPAIGN_ID',
  apiKey: 'API_KEY',
};

function numberSetting(raw: string | undefined, fallback: number): number {
  const value = Number(raw);
  return raw && Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    supabaseUrl: env.SUPABASE_URL || '',
    // Service role key bypasses RLS for backend writes
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_KEY || '',
    prospectsTable: env.PROSPECTS_TABLE || 'prospects',
    aiGatewayApiKey: env.AI_GATEWAY_API_KEY || '',
    aiModel: env.AI_MODEL || 'anthropic/claude-sonnet-4',
    hunterApiKey: env.HUNTER_API_KEY || '',
    apifyApiKey: env.APIFY_API_KEY || '',
    smartleadApiKey: env.SMARTLEAD_API_KEY || '',
    smartleadCampaignId: env.SMARTLEAD_CAMPAIGN_ID || '',
    apiKey: env.API_KEY || '',
    port: numberSetting(env.PORT, 8787),
    cooldownDays: numberSetting(env.COOLDOWN_DAYS, 90),
    sequenceMode: env.SEQUENCE_MODE === 'templates' ? 'templates' : 'ai',
    sequenceLanguage: env.SEQUENCE_LANGUAGE || 'French',
    senderName: env.SENDER_NAME || '',
    requestTimeoutMs: numberSetting(env.REQUEST_TIMEOUT_MS, 30_000),
    scrapeTimeoutMs: numberSetting(env.SCRAPE_TIMEOUT_MS, 300_000),
    scrapeDelayMs: numberSetting(env.SCRAPE_DELAY_MS, 2_000),
    disqualificationListPath: env.DISQUALIFICATION_LIST_PATH || '',
  };
}

/**
 * Throws ConfigError naming every missing setting (by its env variable).
 */
export function requireConfig(config: AppConfig, keys: RequiredSetting[]): void {
  const missing = keys.filter((key) => !config[key]).map((key) => ENV_NAMES[key]);
  if (missing.length > 0) {
    throw new ConfigError(missing);
  }
}
